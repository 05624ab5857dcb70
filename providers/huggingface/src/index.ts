// @keyrelay/provider-huggingface: adapters for the Hugging Face inference router

export {
  ChatRequestSchema,
  createHuggingFaceChatAdapter,
  routedModelId,
  type HuggingFaceChatOptions,
} from "./chat.js";

export {
  ImageRequestSchema,
  buildImagePayload,
  createHuggingFaceImageAdapter,
  type HuggingFaceImageOptions,
  type ImagePayload,
} from "./image.js";

export { toProviderCallError } from "./errors.js";
