// Inference session: one per interactive user
// Owns its provisioner, reporter and executor; nothing is shared between sessions

import {
  assertProxyConfigured,
  createLogger,
  type Config,
  type Logger,
} from "@keyrelay/kernel";
import {
  createHuggingFaceChatAdapter,
  createHuggingFaceImageAdapter,
} from "@keyrelay/provider-huggingface";
import { CredentialProvisioner, OutcomeReporter } from "@keyrelay/proxy-client";
import {
  ResilientExecutor,
  type CallAdapter,
  type CredentialSource,
  type OutcomeSink,
  type StreamingCallAdapter,
} from "@keyrelay/resilience";
import {
  RANDOM_SEED,
  UserFacingError,
  type ChatCallRequest,
  type ChatMessage,
  type ChatParameters,
  type ImageArtifact,
  type ImageCallRequest,
  type Result,
  type StreamChunk,
  type StreamSummary,
} from "@keyrelay/shared";
import { formatUserFacingError, parseModelAndProvider } from "./helpers.js";

export const DEFAULT_CHAT_PARAMETERS: ChatParameters = {
  temperature: 0.7,
  topP: 0.95,
  maxTokens: 512,
};

export const DEFAULT_IMAGE_PARAMETERS = {
  width: 1024,
  height: 1024,
  steps: 20,
  guidanceScale: 7.5,
  seed: RANDOM_SEED,
} as const;

export interface ChatMessageOptions extends Partial<ChatParameters> {
  /** Earlier turns, oldest first */
  history: readonly ChatMessage[];
  message: string;
  /** "model" or "model:provider" */
  model: string;
  /** Overrides any provider suffix on `model` */
  provider?: string;
  systemMessage?: string;
  signal?: AbortSignal;
}

export type ChatTurnOptions = Omit<ChatMessageOptions, "history" | "message">;

export interface ImageOptions {
  prompt: string;
  negativePrompt?: string;
  /** "model" or "model:provider" */
  model: string;
  provider?: string;
  width?: number;
  height?: number;
  steps?: number;
  guidanceScale?: number;
  /** -1 lets the provider choose */
  seed?: number;
  signal?: AbortSignal;
}

/** Outcome sink whose in-flight reports can be awaited */
export interface ReportQueue extends OutcomeSink {
  pendingCount(): number;
  drain(timeoutMs: number): Promise<number>;
}

/** Replaceable collaborators, mainly for tests */
export interface SessionDeps {
  /** Used for proxy and image requests */
  fetch?: typeof fetch;
  provisioner?: CredentialSource;
  reporter?: ReportQueue;
  chatAdapter?: StreamingCallAdapter<ChatCallRequest>;
  imageAdapter?: CallAdapter<ImageCallRequest, ImageArtifact>;
  logger?: Logger;
}

export interface InferenceSession {
  /** Stream a reply. Throws `UserFacingError` when the call fails. */
  sendChatMessage(options: ChatMessageOptions): AsyncGenerator<StreamChunk, StreamSummary, undefined>;
  /** Single (non-streamed) reply */
  completeChatMessage(options: ChatMessageOptions): Promise<Result<string, UserFacingError>>;
  /**
   * Conversation snapshots for a chat UI: history, the user's message and
   * the assistant's reply so far. Failures end with the formatted error as
   * the assistant's message.
   */
  submitChatTurn(
    history: readonly ChatMessage[],
    message: string,
    options: ChatTurnOptions,
  ): AsyncGenerator<ChatMessage[], void, undefined>;
  generateImage(options: ImageOptions): Promise<Result<ImageArtifact, UserFacingError>>;
  /** Outcome reports still in flight */
  pendingReports(): number;
  /** Wait (bounded) for pending outcome reports */
  close(): Promise<void>;
}

function buildChatRequest(options: ChatMessageOptions): ChatCallRequest {
  const parsed = parseModelAndProvider(options.model);
  const messages: ChatMessage[] = [];
  if (options.systemMessage !== undefined && options.systemMessage.trim() !== "") {
    messages.push({ role: "system", content: options.systemMessage });
  }
  messages.push(...options.history, { role: "user", content: options.message });

  return {
    capability: "chat",
    model: parsed.model,
    provider: options.provider ?? parsed.provider,
    messages,
    temperature: options.temperature ?? DEFAULT_CHAT_PARAMETERS.temperature,
    topP: options.topP ?? DEFAULT_CHAT_PARAMETERS.topP,
    maxTokens: options.maxTokens ?? DEFAULT_CHAT_PARAMETERS.maxTokens,
  };
}

function buildImageRequest(options: ImageOptions): ImageCallRequest {
  const parsed = parseModelAndProvider(options.model);
  return {
    capability: "image",
    model: parsed.model,
    provider: options.provider ?? parsed.provider,
    prompt: options.prompt,
    negativePrompt: options.negativePrompt,
    width: options.width ?? DEFAULT_IMAGE_PARAMETERS.width,
    height: options.height ?? DEFAULT_IMAGE_PARAMETERS.height,
    steps: options.steps ?? DEFAULT_IMAGE_PARAMETERS.steps,
    guidanceScale: options.guidanceScale ?? DEFAULT_IMAGE_PARAMETERS.guidanceScale,
    seed: options.seed ?? DEFAULT_IMAGE_PARAMETERS.seed,
  };
}

/**
 * Create a session from loaded configuration.
 * Throws `ConfigError` when no proxy key is configured.
 */
export function createInferenceSession(config: Config, deps: SessionDeps = {}): InferenceSession {
  assertProxyConfigured(config);

  const log = deps.logger ?? createLogger({ name: "session" });
  const { proxy, executor: limits, inference } = config;

  const provisioner =
    deps.provisioner ??
    new CredentialProvisioner({
      baseUrl: proxy.baseUrl,
      apiKey: proxy.apiKey,
      service: proxy.service,
      timeoutMs: proxy.provisionTimeoutMs,
      fetch: deps.fetch,
      logger: deps.logger,
    });
  const reporter =
    deps.reporter ??
    new OutcomeReporter({
      baseUrl: proxy.baseUrl,
      apiKey: proxy.apiKey,
      service: proxy.service,
      timeoutMs: proxy.reportTimeoutMs,
      clientName: proxy.clientName,
      fetch: deps.fetch,
      logger: deps.logger,
    });
  const chatAdapter =
    deps.chatAdapter ??
    createHuggingFaceChatAdapter({ baseUrl: inference.chatBaseUrl, logger: deps.logger });
  const imageAdapter =
    deps.imageAdapter ??
    createHuggingFaceImageAdapter({
      baseUrl: inference.imageBaseUrl,
      defaultProvider: inference.defaultImageProvider,
      fetch: deps.fetch,
      logger: deps.logger,
    });

  const executor = new ResilientExecutor(
    { provisioner, reporter, logger: deps.logger },
    {
      maxAttempts: limits.maxAttempts,
      inferenceTimeoutMs: limits.inferenceTimeoutMs,
      streamIdleTimeoutMs: limits.streamIdleTimeoutMs,
    },
  );

  let closed = false;

  function sendChatMessage(
    options: ChatMessageOptions,
  ): AsyncGenerator<StreamChunk, StreamSummary, undefined> {
    return executor.executeStream(buildChatRequest(options), chatAdapter, {
      signal: options.signal,
    });
  }

  return {
    sendChatMessage,

    completeChatMessage(options) {
      return executor.execute(buildChatRequest(options), chatAdapter, {
        signal: options.signal,
      });
    },

    async *submitChatTurn(history, message, options) {
      if (message.trim() === "") {
        yield [...history];
        return;
      }

      const withUser: ChatMessage[] = [...history, { role: "user", content: message }];
      let partial = "";
      try {
        for await (const chunk of sendChatMessage({ ...options, history, message })) {
          partial = chunk.cumulativeContent;
          yield [...withUser, { role: "assistant", content: partial }];
        }
      } catch (error) {
        if (!(error instanceof UserFacingError)) throw error;
        const notice = formatUserFacingError(error);
        // Keep what was already shown when the stream broke off
        const content =
          error.code === "STREAM_INTERRUPTED" && partial !== "" ? `${partial}\n\n${notice}` : notice;
        yield [...withUser, { role: "assistant", content }];
      }
    },

    generateImage(options) {
      return executor.execute(buildImageRequest(options), imageAdapter, {
        signal: options.signal,
      });
    },

    pendingReports() {
      return reporter.pendingCount();
    },

    async close() {
      if (closed) return;
      closed = true;
      const remaining = await reporter.drain(limits.reportDrainTimeoutMs);
      if (remaining > 0) {
        log.warn("Session closed with outcome reports still pending", { remaining });
      } else {
        log.debug("Session closed");
      }
    },
  };
}
