// Error taxonomy for credential provisioning and inference calls

import type { FailureOutcome } from "./index.js";

/** The token proxy could not issue a credential */
export class ProxyUnavailableError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "ProxyUnavailableError";
  }
}

/** An inference call failed and the failure has been classified */
export class ProviderCallError extends Error {
  constructor(
    public readonly outcome: FailureOutcome,
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "ProviderCallError";
  }
}

/** Caller parameters rejected before any network call */
export class InvalidRequestError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

/** Startup configuration is missing or invalid */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type UserFacingErrorCode =
  | "SERVICE_UNAVAILABLE"
  | "INVALID_REQUEST"
  | "ATTEMPTS_EXHAUSTED"
  | "STREAM_INTERRUPTED"
  | "CANCELLED";

export const USER_FACING_TITLES: Record<UserFacingErrorCode, string> = {
  SERVICE_UNAVAILABLE: "Service Unavailable",
  INVALID_REQUEST: "Invalid Request",
  ATTEMPTS_EXHAUSTED: "Generation Failed",
  STREAM_INTERRUPTED: "Generation Interrupted",
  CANCELLED: "Cancelled",
};

/**
 * The single error a caller sees when a call ends in failure.
 * Messages never carry credential values or proxy internals.
 */
export class UserFacingError extends Error {
  readonly title: string;

  constructor(
    public readonly code: UserFacingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "UserFacingError";
    this.title = USER_FACING_TITLES[code];
  }

  static serviceUnavailable(): UserFacingError {
    return new UserFacingError(
      "SERVICE_UNAVAILABLE",
      "Service temporarily unavailable, please retry.",
    );
  }

  static invalidRequest(detail: string): UserFacingError {
    return new UserFacingError("INVALID_REQUEST", `Request invalid: ${detail}`);
  }

  static attemptsExhausted(attempts: number): UserFacingError {
    const noun = attempts === 1 ? "attempt" : "attempts";
    return new UserFacingError(
      "ATTEMPTS_EXHAUSTED",
      `Generation failed after ${attempts} ${noun}.`,
    );
  }

  static streamInterrupted(): UserFacingError {
    return new UserFacingError(
      "STREAM_INTERRUPTED",
      "Generation stopped before the response was complete. The partial response above may be cut off; please retry.",
    );
  }

  static cancelled(): UserFacingError {
    return new UserFacingError("CANCELLED", "Generation was cancelled.");
  }
}
