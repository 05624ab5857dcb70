import { z } from "zod";
import type { FailureOutcome, Outcome } from "@keyrelay/shared";
import type { Logger } from "@keyrelay/kernel";

/** Body returned by the proxy's provisioning endpoint */
export const ProvisionResponseSchema = z.object({
  token: z.string().min(1),
  token_id: z.string().min(1),
});

export type ProvisionResponse = z.infer<typeof ProvisionResponseSchema>;

/** Error category understood by the proxy's rotation logic */
export type ReportErrorType =
  | "invalid_credentials"
  | "credits_exceeded"
  | "transport_error"
  | "invalid_request";

export const REPORT_ERROR_TYPES: Record<FailureOutcome, ReportErrorType> = {
  auth_failure: "invalid_credentials",
  quota_failure: "credits_exceeded",
  transport_failure: "transport_error",
  invalid_request: "invalid_request",
};

/** Body sent to the proxy's report endpoint */
export interface ReportPayload {
  token_id: string;
  status: "success" | "error";
  outcome: Outcome;
  error?: string;
  error_type?: ReportErrorType;
  http_status?: number;
  cancelled?: boolean;
  client_name?: string;
}

/** Extra detail attached to an outcome report */
export interface ReportMetadata {
  /** Short description of the failure, never a credential value */
  error?: string;
  /** HTTP status returned by the provider */
  status?: number;
  /** The attempt ended because the caller cancelled it */
  cancelled?: boolean;
}

/** Fetch implementation, replaced in tests */
export type FetchFn = typeof fetch;

/** Connection settings shared by the provisioner and the reporter */
export interface ProxyClientOptions {
  /** Proxy base URL, e.g. http://localhost:8000 */
  baseUrl: string;
  /** Key authenticating this client to the proxy */
  apiKey: string;
  /** Service the credentials are issued for */
  service: string;
  /** Per-request timeout (ms) */
  timeoutMs: number;
  fetch?: FetchFn;
  logger?: Logger;
}
