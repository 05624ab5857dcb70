// @keyrelay/shared: Shared types, utils, and constants

// ─── Result Type (no try/catch for business logic) ───
export interface Ok<T> { readonly ok: true; readonly value: T }
export interface Err<E> { readonly ok: false; readonly error: E }
export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> { return { ok: true, value }; }
export function err<E>(error: E): Err<E> { return { ok: false, error }; }

// ─── Capabilities ───

/** What an inference call produces; credentials are provisioned per capability */
export type Capability = "chat" | "image";

// ─── Call Outcomes ───

/** Terminal classification of one call attempt, reported back to the proxy */
export type Outcome =
  | "success"
  | "auth_failure"
  | "quota_failure"
  | "transport_failure"
  | "invalid_request";

export type FailureOutcome = Exclude<Outcome, "success">;

/** Failures that a fresh credential may fix */
export const CREDENTIAL_OUTCOMES: readonly FailureOutcome[] = ["auth_failure", "quota_failure"];

export function isCredentialOutcome(outcome: Outcome): boolean {
  return outcome === "auth_failure" || outcome === "quota_failure";
}

// ─── Credentials ───

/**
 * Short-lived credential issued by the token proxy.
 * `value` is the secret and must never be logged; `id` is the handle used in reports.
 */
export interface Credential {
  readonly id: string;
  readonly value: string;
}

// ─── Requests ───

export interface ChatMessage {
  readonly role: "system" | "user" | "assistant";
  readonly content: string;
}

/** Sampling parameters for chat completion */
export interface ChatParameters {
  readonly temperature: number;
  readonly topP: number;
  readonly maxTokens: number;
}

export interface ChatCallRequest extends ChatParameters {
  readonly capability: "chat";
  /** Model identifier, opaque to this library */
  readonly model: string;
  /** Provider identifier, or "auto" to let the router choose */
  readonly provider: string;
  /** Full message list: system message, history, then the new user message */
  readonly messages: readonly ChatMessage[];
}

export interface ImageCallRequest {
  readonly capability: "image";
  readonly model: string;
  readonly provider: string;
  readonly prompt: string;
  readonly negativePrompt?: string;
  readonly width: number;
  readonly height: number;
  readonly steps: number;
  readonly guidanceScale: number;
  /** -1 lets the provider pick a random seed */
  readonly seed: number;
}

export type CallRequest = ChatCallRequest | ImageCallRequest;

/** Provider value meaning "let the inference router choose" */
export const AUTO_PROVIDER = "auto";

/** Seed value meaning "let the provider choose" */
export const RANDOM_SEED = -1;

// ─── Results ───

/** Incremental fragment of generated text */
export interface StreamChunk {
  /** Zero-based position within the delivered stream */
  readonly index: number;
  /** Text of this fragment */
  readonly content: string;
  /** All text delivered so far, this fragment included */
  readonly cumulativeContent: string;
  /** Attempt number that produced the fragment (1-indexed) */
  readonly attempt: number;
}

/** Returned by a finished stream */
export interface StreamSummary {
  readonly content: string;
  readonly chunkCount: number;
  readonly attempts: number;
  readonly timeToFirstChunkMs: number;
  readonly totalDurationMs: number;
}

/** Decoded image produced by a text-to-image call */
export interface ImageArtifact {
  readonly data: Uint8Array;
  readonly mimeType: string;
  readonly model: string;
  readonly provider: string;
}

// ─── Errors ───
export {
  ConfigError,
  InvalidRequestError,
  ProviderCallError,
  ProxyUnavailableError,
  UserFacingError,
  USER_FACING_TITLES,
  type UserFacingErrorCode,
} from "./errors.js";
