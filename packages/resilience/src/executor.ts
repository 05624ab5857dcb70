// Resilient call executor
// Provisions a fresh credential per attempt, reports every attempt's outcome,
// and retries credential failures up to the attempt ceiling.

import { randomUUID } from "node:crypto";
import {
  createLogger,
  createTimeoutController,
  type ExecutorConfig,
  type Logger,
} from "@keyrelay/kernel";
import {
  UserFacingError,
  err,
  isCredentialOutcome,
  ok,
  type CallRequest,
  type Capability,
  type Credential,
  type Outcome,
  type Result,
  type StreamChunk,
  type StreamSummary,
} from "@keyrelay/shared";
import { classifyError, type ClassifiedFailure } from "./classify.js";
import { relayStream } from "./relay.js";
import type {
  CallAdapter,
  CredentialSource,
  OutcomeSink,
  ReportDetails,
  StreamingCallAdapter,
} from "./index.js";

/** Executor limits, taken from the `executor` config section */
export type ExecutorOptions = Pick<
  ExecutorConfig,
  "maxAttempts" | "inferenceTimeoutMs" | "streamIdleTimeoutMs"
>;

export interface ExecutorDeps {
  provisioner: CredentialSource;
  reporter: OutcomeSink;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Caller cancellation */
  signal?: AbortSignal;
}

const CANCELLED_REPORT: ReportDetails = { error: "cancelled by caller", cancelled: true };

/** Executor state for one request */
type ExecutorState = "idle" | "provisioning" | "calling" | "retrying" | "succeeded" | "failed";

export class ResilientExecutor {
  private readonly log: Logger;

  constructor(
    private readonly deps: ExecutorDeps,
    private readonly options: ExecutorOptions,
  ) {
    this.log = deps.logger ?? createLogger({ name: "executor" });
  }

  /** Run a single-response call. Every failure comes back as one `UserFacingError`. */
  async execute<TRequest extends CallRequest, TResult>(
    request: TRequest,
    adapter: CallAdapter<TRequest, TResult>,
    options: ExecuteOptions = {},
  ): Promise<Result<TResult, UserFacingError>> {
    const { signal } = options;
    const log = this.requestLogger(request);

    const validation = adapter.validate?.(request);
    if (validation && !validation.ok) {
      log.info("Request rejected before provisioning", { error: validation.error.message });
      return err(UserFacingError.invalidRequest(validation.error.message));
    }

    const usedCredentials = new Set<string>();

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const acquired = await this.acquire(request, adapter, attempt, usedCredentials, log, signal);
      if (!acquired.ok) return acquired;
      const credential = acquired.value;
      const attemptLog = log.child({ attempt, credentialId: credential.id });

      const timeout = createTimeoutController(this.options.inferenceTimeoutMs, signal);
      this.transition(attemptLog, "calling");
      try {
        const value = await adapter.perform(credential, request, timeout.signal);
        this.deps.reporter.report(credential, "success");
        this.transition(attemptLog, "succeeded");
        return ok(value);
      } catch (error) {
        if (signal?.aborted) {
          this.deps.reporter.report(credential, "transport_failure", CANCELLED_REPORT);
          attemptLog.info("Call cancelled by caller");
          return err(UserFacingError.cancelled());
        }

        const failure = this.classify(error, timeout.timedOut());
        this.deps.reporter.report(credential, failure.outcome, {
          error: failure.message,
          status: failure.status,
        });

        if (isCredentialOutcome(failure.outcome) && attempt < this.options.maxAttempts) {
          attemptLog.warn("Credential failure, retrying with a fresh credential", {
            outcome: failure.outcome,
            status: failure.status,
          });
          this.transition(attemptLog, "retrying");
          continue;
        }

        attemptLog.warn("Call failed", { outcome: failure.outcome, status: failure.status });
        this.transition(attemptLog, "failed");
        return err(this.userFacing(failure, attempt));
      } finally {
        timeout.cleanup();
      }
    }

    return err(UserFacingError.attemptsExhausted(this.options.maxAttempts));
  }

  /**
   * Run a streaming call. Fragments are yielded as they arrive; a failure
   * after the first fragment is surfaced instead of retried, so output from
   * two credentials is never spliced. Failures are thrown as `UserFacingError`.
   */
  async *executeStream<TRequest extends CallRequest>(
    request: TRequest,
    adapter: StreamingCallAdapter<TRequest>,
    options: ExecuteOptions = {},
  ): AsyncGenerator<StreamChunk, StreamSummary, undefined> {
    const { signal } = options;
    const log = this.requestLogger(request);

    const validation = adapter.validate?.(request);
    if (validation && !validation.ok) {
      log.info("Request rejected before provisioning", { error: validation.error.message });
      throw UserFacingError.invalidRequest(validation.error.message);
    }

    const startTime = Date.now();
    const usedCredentials = new Set<string>();
    let firstChunkAt: number | null = null;
    let content = "";
    let index = 0;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const acquired = await this.acquire(request, adapter, attempt, usedCredentials, log, signal);
      if (!acquired.ok) throw acquired.error;
      const credential = acquired.value;
      const attemptLog = log.child({ attempt, credentialId: credential.id });

      const timeout = createTimeoutController(this.options.inferenceTimeoutMs, signal);
      let reported = false;
      let completed = false;
      const report = (outcome: Outcome, details?: ReportDetails): void => {
        if (reported) return;
        reported = true;
        this.deps.reporter.report(credential, outcome, details);
      };

      this.transition(attemptLog, "calling");
      try {
        const source = adapter.stream(credential, request, timeout.signal);
        for await (const text of relayStream(source, {
          signal: timeout.signal,
          idleTimeoutMs: this.options.streamIdleTimeoutMs,
          logger: attemptLog,
        })) {
          if (text.length === 0) continue;
          // The inference deadline covers opening the stream; from here the idle timer applies
          timeout.disarm();
          if (firstChunkAt === null) {
            firstChunkAt = Date.now();
            attemptLog.debug("First chunk received", { timeToFirstChunkMs: firstChunkAt - startTime });
          }
          content += text;
          yield { index, content: text, cumulativeContent: content, attempt };
          index++;
        }

        completed = true;
        report("success");
        this.transition(attemptLog, "succeeded");
        return {
          content,
          chunkCount: index,
          attempts: attempt,
          timeToFirstChunkMs: firstChunkAt === null ? 0 : firstChunkAt - startTime,
          totalDurationMs: Date.now() - startTime,
        };
      } catch (error) {
        if (signal?.aborted) {
          report("transport_failure", CANCELLED_REPORT);
          attemptLog.info("Stream cancelled by caller", { chunksDelivered: index });
          throw UserFacingError.cancelled();
        }

        const failure = this.classify(error, timeout.timedOut());
        report(failure.outcome, { error: failure.message, status: failure.status });

        if (index > 0) {
          attemptLog.warn("Stream failed after output was delivered", {
            outcome: failure.outcome,
            chunksDelivered: index,
          });
          this.transition(attemptLog, "failed");
          throw UserFacingError.streamInterrupted();
        }

        if (isCredentialOutcome(failure.outcome) && attempt < this.options.maxAttempts) {
          attemptLog.warn("Credential failure, retrying with a fresh credential", {
            outcome: failure.outcome,
            status: failure.status,
          });
          this.transition(attemptLog, "retrying");
          continue;
        }

        attemptLog.warn("Stream failed", { outcome: failure.outcome, status: failure.status });
        this.transition(attemptLog, "failed");
        throw this.userFacing(failure, attempt);
      } finally {
        if (!completed) timeout.controller.abort();
        // Consumer stopped pulling (break or return) mid-stream
        if (!reported) {
          attemptLog.info("Stream abandoned by consumer", { chunksDelivered: index });
          report("transport_failure", CANCELLED_REPORT);
        }
        timeout.cleanup();
      }
    }

    throw UserFacingError.attemptsExhausted(this.options.maxAttempts);
  }

  /** Provision a credential for the next attempt */
  private async acquire(
    request: CallRequest,
    adapter: { readonly capability: Capability },
    attempt: number,
    usedCredentials: Set<string>,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<Result<Credential, UserFacingError>> {
    if (signal?.aborted) {
      return err(UserFacingError.cancelled());
    }

    this.transition(log, "provisioning", { attempt });
    const provisioned = await this.deps.provisioner.provision(adapter.capability, signal);
    if (!provisioned.ok) {
      if (signal?.aborted) return err(UserFacingError.cancelled());
      log.error("Credential provisioning failed", {
        attempt,
        model: request.model,
        error: provisioned.error.message,
        status: provisioned.error.status,
      });
      this.transition(log, "failed");
      return err(UserFacingError.serviceUnavailable());
    }

    const credential = provisioned.value;
    if (usedCredentials.has(credential.id)) {
      // Never became an attempt, so nothing is reported for it
      log.warn("Proxy re-issued a credential already used for this request", {
        attempt,
        credentialId: credential.id,
      });
      this.transition(log, "failed");
      return err(UserFacingError.attemptsExhausted(attempt - 1));
    }
    usedCredentials.add(credential.id);
    return ok(credential);
  }

  private classify(error: unknown, timedOut: boolean): ClassifiedFailure {
    if (timedOut) {
      return {
        outcome: "transport_failure",
        message: `No response within ${this.options.inferenceTimeoutMs}ms`,
      };
    }
    return classifyError(error);
  }

  private userFacing(failure: ClassifiedFailure, attempt: number): UserFacingError {
    switch (failure.outcome) {
      case "invalid_request":
        return UserFacingError.invalidRequest(failure.message);
      case "transport_failure":
        return UserFacingError.serviceUnavailable();
      case "auth_failure":
      case "quota_failure":
        return UserFacingError.attemptsExhausted(attempt);
    }
  }

  private requestLogger(request: CallRequest): Logger {
    return this.log.child({
      requestId: randomUUID(),
      capability: request.capability,
      model: request.model,
      provider: request.provider,
    });
  }

  private transition(log: Logger, state: ExecutorState, context?: Record<string, unknown>): void {
    log.trace("Executor state", { state, ...context });
  }
}
