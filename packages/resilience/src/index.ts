// @keyrelay/resilience: credential-rotating calls against inference providers

import type {
  Capability,
  CallRequest,
  Credential,
  InvalidRequestError,
  Outcome,
  ProxyUnavailableError,
  Result,
} from "@keyrelay/shared";

// ─── Provider-Call Adapter Contracts ───
// One adapter per capability; the executor owns credentials, retries and reports

/** Performs one inference call with the credential it is handed */
export interface CallAdapter<TRequest extends CallRequest, TResult> {
  readonly capability: Capability;

  /** Local parameter checks, run before any credential is provisioned */
  validate?(request: TRequest): Result<TRequest, InvalidRequestError>;

  /**
   * Make the call. Throw `ProviderCallError` for classified failures;
   * anything else is treated as a transport failure.
   */
  perform(credential: Credential, request: TRequest, signal: AbortSignal): Promise<TResult>;
}

/** Adapter that can also stream text fragments */
export interface StreamingCallAdapter<TRequest extends CallRequest>
  extends CallAdapter<TRequest, string> {
  stream(credential: Credential, request: TRequest, signal: AbortSignal): AsyncIterable<string>;
}

// ─── Proxy Seams ───

/** Where credentials come from */
export interface CredentialSource {
  provision(
    capability: Capability,
    signal?: AbortSignal,
  ): Promise<Result<Credential, ProxyUnavailableError>>;
}

/** Extra detail sent with an outcome report */
export interface ReportDetails {
  error?: string;
  status?: number;
  cancelled?: boolean;
}

/** Where attempt outcomes go; must return without waiting on the network */
export interface OutcomeSink {
  report(credential: Credential, outcome: Outcome, details?: ReportDetails): void;
}

// ─── Re-exports ───

export {
  ResilientExecutor,
  type ExecuteOptions,
  type ExecutorDeps,
  type ExecutorOptions,
} from "./executor.js";

export {
  classifyError,
  classifyFailureStatus,
  classifyStatus,
  type ClassifiedFailure,
} from "./classify.js";

export { relayStream, RelayAbortedError, type RelayOptions } from "./relay.js";
