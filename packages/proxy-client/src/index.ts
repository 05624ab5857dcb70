// @keyrelay/proxy-client: talks to the token proxy

export { CredentialProvisioner, joinUrl } from "./provisioner.js";
export { OutcomeReporter, buildReportPayload, type OutcomeReporterOptions } from "./reporter.js";
export {
  ProvisionResponseSchema,
  REPORT_ERROR_TYPES,
  type FetchFn,
  type ProvisionResponse,
  type ProxyClientOptions,
  type ReportErrorType,
  type ReportMetadata,
  type ReportPayload,
} from "./types.js";
