// Chat completion through the OpenAI-compatible Hugging Face router

import OpenAI from "openai";
import { z } from "zod";
import { createLogger, type Logger } from "@keyrelay/kernel";
import type { StreamingCallAdapter } from "@keyrelay/resilience";
import {
  AUTO_PROVIDER,
  InvalidRequestError,
  err,
  ok,
  type ChatCallRequest,
  type ChatMessage,
  type Credential,
} from "@keyrelay/shared";
import { describeIssue, toProviderCallError } from "./errors.js";

export const ChatRequestSchema = z.object({
  model: z.string().trim().min(1, "is required"),
  provider: z.string().trim().min(1, "is required"),
  messages: z
    .array(
      z.object({
        role: z.enum(["system", "user", "assistant"]),
        content: z.string(),
      }),
    )
    .min(1, "must not be empty"),
  temperature: z.number().min(0, "must be at least 0").max(2, "must be at most 2"),
  topP: z.number().gt(0, "must be greater than 0").max(1, "must be at most 1"),
  maxTokens: z.number().int("must be an integer").min(1, "must be at least 1"),
});

export interface HuggingFaceChatOptions {
  /** OpenAI-compatible router endpoint */
  baseUrl: string;
  logger?: Logger;
}

/** Model id understood by the router: `model` under "auto", else `model:provider` */
export function routedModelId(model: string, provider: string): string {
  return provider === AUTO_PROVIDER ? model : `${model}:${provider}`;
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

/**
 * Creates the chat adapter. A client is built per call because every
 * attempt carries a different short-lived credential; SDK retries are off
 * since retrying is the executor's job.
 */
export function createHuggingFaceChatAdapter(
  options: HuggingFaceChatOptions,
): StreamingCallAdapter<ChatCallRequest> {
  const log = options.logger ?? createLogger({ name: "hf-chat" });

  function clientFor(credential: Credential): OpenAI {
    return new OpenAI({ apiKey: credential.value, baseURL: options.baseUrl, maxRetries: 0 });
  }

  function params(request: ChatCallRequest) {
    return {
      model: routedModelId(request.model, request.provider),
      messages: request.messages.map(toMessageParam),
      temperature: request.temperature,
      top_p: request.topP,
      max_tokens: request.maxTokens,
    };
  }

  return {
    capability: "chat",

    validate(request) {
      const parsed = ChatRequestSchema.safeParse(request);
      if (parsed.success) return ok(request);
      const { field, message } = describeIssue(parsed.error);
      return err(new InvalidRequestError(message, field));
    },

    async perform(credential, request, signal) {
      const client = clientFor(credential);
      try {
        const completion = await client.chat.completions.create(
          { ...params(request), stream: false },
          { signal },
        );
        return completion.choices[0]?.message.content ?? "";
      } catch (error) {
        throw toProviderCallError(error, "Chat completion");
      }
    },

    async *stream(credential, request, signal) {
      const client = clientFor(credential);
      log.debug("Opening chat stream", {
        model: routedModelId(request.model, request.provider),
        messages: request.messages.length,
      });
      try {
        const stream = await client.chat.completions.create(
          { ...params(request), stream: true },
          { signal },
        );
        for await (const chunk of stream) {
          const delta = chunk.choices[0]?.delta?.content;
          if (delta) yield delta;
        }
      } catch (error) {
        throw toProviderCallError(error, "Chat completion");
      }
    },
  };
}
