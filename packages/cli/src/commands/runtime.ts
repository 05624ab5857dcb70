// Command runtime: session setup, Ctrl-C handling and option coercion shared by commands

import pc from "picocolors";

import {
  SHUTDOWN_PRIORITIES,
  assertProxyConfigured,
  createConfigManager,
  createDrainHandler,
  createShutdownManager,
  initLogger,
  shutdownLogger,
  type Config,
  type Logger,
  type ShutdownManager,
} from "@keyrelay/kernel";
import {
  createInferenceSession,
  formatUserFacingError,
  type InferenceSession,
} from "@keyrelay/sdk";
import { InvalidRequestError, UserFacingError } from "@keyrelay/shared";

/** Options every command accepts */
export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

/** Where command output goes; process.stdout in production */
export interface TextOutput {
  write(text: string): unknown;
}

export interface CommandContext {
  session: InferenceSession;
  stdout: TextOutput;
  stderr: TextOutput;
  /** Aborted on Ctrl-C */
  signal?: AbortSignal;
  verbose?: boolean;
}

/** Exit status after a signal-triggered cancellation */
export const EXIT_CANCELLED = 130;

export function exitCodeFor(error: UserFacingError): number {
  return error.code === "CANCELLED" ? EXIT_CANCELLED : 1;
}

export function printUserFacingError(stderr: TextOutput, error: UserFacingError): void {
  stderr.write(`${pc.red(formatUserFacingError(error))}\n`);
}

/** Numeric flag as a number; cac already converts most of them */
export function parseNumberOption(value: unknown, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === "number" ? value : Number(value);
  if (typeof value === "boolean" || Number.isNaN(parsed)) {
    throw new InvalidRequestError(`--${flag} must be a number`, flag);
  }
  return parsed;
}

/** String flag as a string; numeric-looking values come back from cac as numbers */
export function parseStringOption(value: unknown): string | undefined {
  if (value === undefined || typeof value === "boolean") return undefined;
  return String(value);
}

const NEGATIVE_NUMBER = /^-\d+(\.\d+)?$/;

/**
 * Join `--flag -1` into `--flag=-1`. Without this cac reads `-1` as a short
 * flag and the option arrives as a bare `true`.
 */
export function joinNegativeNumbers(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === undefined) continue;
    const next = argv[i + 1];
    if (
      token.startsWith("--") &&
      !token.includes("=") &&
      token !== "--" &&
      next !== undefined &&
      NEGATIVE_NUMBER.test(next)
    ) {
      out.push(`${token}=${next}`);
      i++;
    } else {
      out.push(token);
    }
  }
  return out;
}

export function requireModel(value: unknown): string {
  const model = parseStringOption(value)?.trim();
  if (!model) {
    throw new InvalidRequestError("--model is required", "model");
  }
  return model;
}

/** Load configuration and open a session. Throws `ConfigError` without a proxy key. */
export function openSession(
  options: CommonOptions,
  env: NodeJS.ProcessEnv = process.env,
): { config: Config; session: InferenceSession; logger: Logger } {
  const config = createConfigManager(options.config, env).load(
    options.verbose ? { logging: { level: "debug" } } : {},
  );
  assertProxyConfigured(config);

  const logger = initLogger(config.logging).child({ component: "cli" });
  const session = createInferenceSession(config, { logger });
  return { config, session, logger };
}

export interface CommandShutdownOptions {
  session: InferenceSession;
  controller: AbortController;
  logger: Logger;
  drainTimeoutMs: number;
  signals?: NodeJS.Signals[];
  exit?: (code: number) => void;
}

/**
 * Ctrl-C stops the generation first, then waits for outcome reports
 * and flushes logs before the process exits.
 */
export function createCommandShutdown(options: CommandShutdownOptions): ShutdownManager {
  const { session, controller, logger, drainTimeoutMs } = options;
  const shutdown = createShutdownManager({
    logger,
    timeoutMs: drainTimeoutMs + 1000,
    signals: options.signals,
    exit: options.exit,
  });

  shutdown.register("generation", () => controller.abort(), SHUTDOWN_PRIORITIES.IMMEDIATE);
  shutdown.register(
    "outcome-reports",
    createDrainHandler("outcome-reports", () => session.pendingReports(), {
      maxWaitMs: drainTimeoutMs,
      logger,
    }),
    SHUTDOWN_PRIORITIES.NORMAL,
  );
  shutdown.register("logger", () => shutdownLogger(), SHUTDOWN_PRIORITIES.FINAL);

  return shutdown;
}

/** Run one command against a fresh session with Ctrl-C handling installed */
export async function withSession(
  options: CommonOptions,
  run: (context: CommandContext) => Promise<number>,
): Promise<number> {
  const { config, session, logger } = openSession(options);
  const controller = new AbortController();
  const shutdown = createCommandShutdown({
    session,
    controller,
    logger,
    drainTimeoutMs: config.executor.reportDrainTimeoutMs,
  });

  try {
    return await run({
      session,
      stdout: process.stdout,
      stderr: process.stderr,
      signal: controller.signal,
      verbose: options.verbose,
    });
  } finally {
    await session.close();
    shutdown.dispose();
  }
}
