// Text-to-image through the Hugging Face router's per-provider model endpoints

import { z } from "zod";
import { createLogger, type Logger } from "@keyrelay/kernel";
import { classifyFailureStatus, type CallAdapter } from "@keyrelay/resilience";
import {
  AUTO_PROVIDER,
  InvalidRequestError,
  ProviderCallError,
  RANDOM_SEED,
  err,
  ok,
  type ImageArtifact,
  type ImageCallRequest,
} from "@keyrelay/shared";
import { describeIssue, toProviderCallError } from "./errors.js";

const dimension = z
  .number()
  .int("must be an integer")
  .positive("must be positive")
  .refine((value) => value % 8 === 0, "must be a multiple of 8");

export const ImageRequestSchema = z.object({
  model: z.string().trim().min(1, "is required"),
  provider: z.string().trim().min(1, "is required"),
  prompt: z.string().trim().min(1, "must not be empty"),
  negativePrompt: z.string().optional(),
  width: dimension,
  height: dimension,
  steps: z.number().int("must be an integer").min(1, "must be at least 1"),
  guidanceScale: z.number().min(0, "must be at least 0"),
  seed: z.number().int("must be an integer").min(RANDOM_SEED, "must be -1 or a non-negative integer"),
});

/** JSON body of a text-to-image request */
export interface ImagePayload {
  inputs: string;
  parameters: {
    negative_prompt?: string;
    width: number;
    height: number;
    num_inference_steps: number;
    guidance_scale: number;
    seed?: number;
  };
}

export interface HuggingFaceImageOptions {
  /** Router root, e.g. https://router.huggingface.co */
  baseUrl: string;
  /** Provider used when the request says "auto" */
  defaultProvider: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

const MAX_DETAIL_LENGTH = 200;

export function buildImagePayload(request: ImageCallRequest): ImagePayload {
  const payload: ImagePayload = {
    inputs: request.prompt,
    parameters: {
      width: request.width,
      height: request.height,
      num_inference_steps: request.steps,
      guidance_scale: request.guidanceScale,
    },
  };
  if (request.negativePrompt && request.negativePrompt.trim() !== "") {
    payload.parameters.negative_prompt = request.negativePrompt;
  }
  if (request.seed !== RANDOM_SEED) {
    payload.parameters.seed = request.seed;
  }
  return payload;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Pull a short error description out of a failed response */
async function readErrorDetail(response: Response): Promise<string | undefined> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return undefined;
  }
  if (text.trim() === "") return undefined;

  const body = parseJson(text);
  const detail =
    typeof body === "object" && body !== null && "error" in body && typeof body.error === "string"
      ? body.error
      : text;
  return detail.length > MAX_DETAIL_LENGTH ? `${detail.slice(0, MAX_DETAIL_LENGTH)}…` : detail;
}

export function createHuggingFaceImageAdapter(
  options: HuggingFaceImageOptions,
): CallAdapter<ImageCallRequest, ImageArtifact> {
  const fetchFn = options.fetch ?? fetch;
  const log = options.logger ?? createLogger({ name: "hf-image" });
  const baseUrl = options.baseUrl.replace(/\/+$/, "");

  return {
    capability: "image",

    validate(request) {
      const parsed = ImageRequestSchema.safeParse(request);
      if (parsed.success) return ok(request);
      const { field, message } = describeIssue(parsed.error);
      return err(new InvalidRequestError(message, field));
    },

    async perform(credential, request, signal) {
      const provider =
        request.provider === AUTO_PROVIDER ? options.defaultProvider : request.provider;
      const url = `${baseUrl}/${encodeURIComponent(provider)}/models/${request.model}`;
      log.debug("Requesting image", { model: request.model, provider });

      let response: Response;
      try {
        response = await fetchFn(url, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${credential.value}`,
            "Content-Type": "application/json",
            Accept: "image/png",
          },
          body: JSON.stringify(buildImagePayload(request)),
          signal,
        });
      } catch (error) {
        throw toProviderCallError(error, "Image generation");
      }

      if (!response.ok) {
        const detail = await readErrorDetail(response);
        throw new ProviderCallError(
          classifyFailureStatus(response.status),
          `Image generation failed (HTTP ${response.status})${detail ? `: ${detail}` : ""}`,
          response.status,
        );
      }

      const mimeType = response.headers.get("content-type")?.split(";")[0]?.trim() || "image/png";
      if (!mimeType.startsWith("image/")) {
        throw new ProviderCallError(
          "transport_failure",
          `Unexpected response type ${mimeType}`,
          response.status,
        );
      }

      const data = new Uint8Array(await response.arrayBuffer());
      return { data, mimeType, model: request.model, provider };
    },
  };
}
