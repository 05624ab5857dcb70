// Outcome reporting
// Reports are detached from the caller and tracked so teardown can drain them

import {
  Deadline,
  TimeoutError,
  createLogger,
  createTimeoutController,
  type Logger,
} from "@keyrelay/kernel";
import {
  ProxyUnavailableError,
  err,
  ok,
  type Credential,
  type Outcome,
  type Result,
} from "@keyrelay/shared";
import { joinUrl } from "./provisioner.js";
import {
  REPORT_ERROR_TYPES,
  type FetchFn,
  type ProxyClientOptions,
  type ReportMetadata,
  type ReportPayload,
} from "./types.js";

/** Build the JSON body for one outcome report */
export function buildReportPayload(
  credentialId: string,
  outcome: Outcome,
  metadata: ReportMetadata = {},
  clientName?: string,
): ReportPayload {
  const payload: ReportPayload = {
    token_id: credentialId,
    status: outcome === "success" ? "success" : "error",
    outcome,
  };

  if (outcome !== "success") {
    payload.error_type = REPORT_ERROR_TYPES[outcome];
    if (metadata.error !== undefined) payload.error = metadata.error;
  }
  if (metadata.status !== undefined) payload.http_status = metadata.status;
  if (metadata.cancelled) payload.cancelled = true;
  if (clientName) payload.client_name = clientName;

  return payload;
}

export interface OutcomeReporterOptions extends ProxyClientOptions {
  /** Sent with every report so the proxy can attribute usage */
  clientName?: string;
}

export class OutcomeReporter {
  private readonly fetchFn: FetchFn;
  private readonly log: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly options: OutcomeReporterOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.log = options.logger ?? createLogger({ name: "reporter" });
  }

  /**
   * Report the outcome of one attempt. Returns immediately; the request runs
   * in the background and its failure is only logged.
   */
  report(credential: Credential, outcome: Outcome, metadata: ReportMetadata = {}): void {
    const payload = buildReportPayload(credential.id, outcome, metadata, this.options.clientName);

    const task: Promise<void> = this.send(payload)
      .then((result) => {
        if (result.ok) {
          this.log.debug("Outcome reported", { credentialId: credential.id, outcome });
        } else {
          this.log.warn("Outcome report failed", {
            credentialId: credential.id,
            outcome,
            error: result.error.message,
          });
        }
      })
      .finally(() => {
        this.pending.delete(task);
      });

    this.pending.add(task);
  }

  /** Reports still in flight */
  pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Wait for in-flight reports, giving up after `timeoutMs`.
   * Resolves with the number of reports still pending.
   */
  async drain(timeoutMs: number): Promise<number> {
    if (this.pending.size === 0) return 0;

    const deadline = new Deadline(timeoutMs, "report-drain");
    try {
      await deadline.run(Promise.allSettled([...this.pending]), "pending-reports");
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      this.log.warn("Report drain deadline reached", {
        pending: this.pending.size,
        timeoutMs,
      });
    }
    return this.pending.size;
  }

  private async send(payload: ReportPayload): Promise<Result<void, Error>> {
    const url = joinUrl(
      this.options.baseUrl,
      `keys/report/${encodeURIComponent(this.options.service)}`,
    );
    const timeout = createTimeoutController(this.options.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: timeout.signal,
      });
      if (!response.ok) {
        return err(
          new ProxyUnavailableError(`Proxy returned HTTP ${response.status}`, response.status),
        );
      }
      return ok(undefined);
    } catch (error) {
      if (timeout.timedOut()) {
        return err(new TimeoutError("report", url, this.options.timeoutMs));
      }
      return err(error instanceof Error ? error : new Error(String(error)));
    } finally {
      timeout.cleanup();
    }
  }
}
