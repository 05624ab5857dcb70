// Outcome classification for failed provider calls

import { TimeoutError } from "@keyrelay/kernel";
import { ProviderCallError, type FailureOutcome, type Outcome } from "@keyrelay/shared";

/** A failure reduced to what the executor and the proxy need to know */
export interface ClassifiedFailure {
  outcome: FailureOutcome;
  status?: number;
  message: string;
}

/** Network error codes that mean the request never completed */
const TRANSPORT_ERROR_CODES = [
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
];

const MAX_MESSAGE_LENGTH = 200;

/** Map an HTTP status to an outcome */
export function classifyStatus(status: number): Outcome {
  if (status >= 200 && status < 300) return "success";
  if (status === 401 || status === 403) return "auth_failure";
  if (status === 402 || status === 429) return "quota_failure";
  if (status === 408) return "transport_failure";
  if (status >= 400 && status < 500) return "invalid_request";
  return "transport_failure";
}

/** Outcome for a failed call with the given status; a 2xx here still failed in transit */
export function classifyFailureStatus(status: number): FailureOutcome {
  const outcome = classifyStatus(status);
  return outcome === "success" ? "transport_failure" : outcome;
}

function hasNumericStatus(error: unknown): error is { status: number } {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function hasErrorCode(error: unknown): error is { code: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  );
}

function truncate(message: string): string {
  return message.length > MAX_MESSAGE_LENGTH ? `${message.slice(0, MAX_MESSAGE_LENGTH)}…` : message;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Classify anything thrown by an adapter.
 * Adapters normally throw `ProviderCallError`; SDK errors carrying a numeric
 * `status` are classified by it; everything else counts as a transport failure.
 */
export function classifyError(error: unknown): ClassifiedFailure {
  if (error instanceof ProviderCallError) {
    return { outcome: error.outcome, status: error.status, message: truncate(error.message) };
  }

  if (hasNumericStatus(error)) {
    return {
      outcome: classifyFailureStatus(error.status),
      status: error.status,
      message: truncate(messageOf(error)),
    };
  }

  if (error instanceof TimeoutError) {
    return { outcome: "transport_failure", message: error.message };
  }

  // fetch wraps socket errors: TypeError("fetch failed", { cause: { code } })
  const cause = error instanceof Error ? error.cause : undefined;
  for (const candidate of [error, cause]) {
    if (hasErrorCode(candidate) && TRANSPORT_ERROR_CODES.includes(candidate.code)) {
      return { outcome: "transport_failure", message: `Connection error (${candidate.code})` };
    }
  }

  return { outcome: "transport_failure", message: truncate(messageOf(error)) };
}
