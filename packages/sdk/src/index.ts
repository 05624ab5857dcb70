// @keyrelay/sdk: chat and image generation through short-lived proxy credentials
//
// Key exports:
// - createInferenceSession(): per-user session with chat streaming and image generation
// - parseModelAndProvider() : "model:provider" selector parsing
// - formatErrorMessage()    : chat-friendly error line

export {
  createInferenceSession,
  DEFAULT_CHAT_PARAMETERS,
  DEFAULT_IMAGE_PARAMETERS,
  type ChatMessageOptions,
  type ChatTurnOptions,
  type ImageOptions,
  type InferenceSession,
  type ReportQueue,
  type SessionDeps,
} from "./session.js";

export {
  formatErrorMessage,
  formatUserFacingError,
  hasAllowedOrganization,
  parseModelAndProvider,
} from "./helpers.js";

export {
  UserFacingError,
  type ChatMessage,
  type ImageArtifact,
  type StreamChunk,
  type StreamSummary,
} from "@keyrelay/shared";
