// Graceful shutdown for CLI sessions
// Cancels in-flight generations and drains outcome reports before the process exits

import type { Logger } from "./logger.js";

/** Shutdown handler function */
export type ShutdownHandler = () => void | Promise<void>;

/** Shutdown options */
export interface ShutdownOptions {
  /** Timeout before remaining handlers are skipped (ms) */
  timeoutMs?: number;
  /** Logger instance */
  logger?: Logger;
  /** Exit code after a signal-triggered shutdown */
  signalExitCode?: number;
  /** Exit code on error */
  errorExitCode?: number;
  /** Signals to handle */
  signals?: NodeJS.Signals[];
  /** Process exit hook, replaced in tests */
  exit?: (code: number) => void;
}

/** Shutdown manager state */
export interface ShutdownManager {
  /** Register a shutdown handler */
  register(name: string, handler: ShutdownHandler, priority?: number): void;

  /** Unregister a shutdown handler */
  unregister(name: string): void;

  /** Manually trigger shutdown */
  shutdown(reason?: string): Promise<void>;

  /** Check if shutdown is in progress */
  isShuttingDown(): boolean;

  /** Get registered handler names, highest priority first */
  getHandlers(): string[];

  /** Remove process signal listeners */
  dispose(): void;
}

const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  trace: () => {},
  fatal: () => {},
  child: () => noopLogger,
  level: "silent",
  flush: () => {},
};

/** Default shutdown options */
const DEFAULT_OPTIONS: Required<ShutdownOptions> = {
  timeoutMs: 10000,
  logger: noopLogger,
  // 130 = terminated by Ctrl-C
  signalExitCode: 130,
  errorExitCode: 1,
  signals: ["SIGINT", "SIGTERM"],
  exit: (code) => process.exit(code),
};

/** Create a shutdown manager */
export function createShutdownManager(options: ShutdownOptions = {}): ShutdownManager {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const log = opts.logger;

  const handlers = new Map<string, { handler: ShutdownHandler; priority: number }>();
  const listeners = new Map<NodeJS.Signals, () => void>();
  let shuttingDown = false;

  function sortedEntries(): [string, { handler: ShutdownHandler; priority: number }][] {
    return Array.from(handlers.entries()).sort((a, b) => b[1].priority - a[1].priority);
  }

  /** Run all shutdown handlers in priority order */
  async function runHandlers(reason: string): Promise<void> {
    if (shuttingDown) {
      log.warn("Shutdown already in progress");
      return;
    }

    shuttingDown = true;
    log.info("Starting graceful shutdown", { reason });

    const entries = sortedEntries();
    const startTime = Date.now();

    for (const [index, [name, { handler }]] of entries.entries()) {
      const remaining = opts.timeoutMs - (Date.now() - startTime);

      if (remaining <= 0) {
        log.warn("Shutdown timeout reached, skipping remaining handlers", {
          skipped: entries.slice(index).map(([n]) => n),
        });
        break;
      }

      let timer: NodeJS.Timeout | undefined;
      try {
        log.debug("Running shutdown handler", { name });
        const handlerStart = Date.now();

        await Promise.race([
          Promise.resolve(handler()),
          new Promise<void>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Handler ${name} timed out`)), remaining);
          }),
        ]);

        log.debug("Shutdown handler completed", { name, durationMs: Date.now() - handlerStart });
      } catch (error) {
        log.error("Shutdown handler failed", { name, error: String(error) });
      } finally {
        clearTimeout(timer);
      }
    }

    log.info("Graceful shutdown completed", { durationMs: Date.now() - startTime });
  }

  /** Handle shutdown signal */
  function handleSignal(signal: NodeJS.Signals): void {
    log.info("Received shutdown signal", { signal });
    runHandlers(signal)
      .then(() => opts.exit(opts.signalExitCode))
      .catch((error: unknown) => {
        log.error("Shutdown error", { error: String(error) });
        opts.exit(opts.errorExitCode);
      });
  }

  /** Register signal handlers */
  function registerSignalHandlers(): void {
    if (listeners.size > 0) return;

    for (const signal of opts.signals) {
      const listener = () => handleSignal(signal);
      listeners.set(signal, listener);
      process.once(signal, listener);
    }

    log.debug("Signal handlers registered", { signals: opts.signals });
  }

  return {
    register(name: string, handler: ShutdownHandler, priority = 0): void {
      handlers.set(name, { handler, priority });
      log.debug("Shutdown handler registered", { name, priority });
      registerSignalHandlers();
    },

    unregister(name: string): void {
      handlers.delete(name);
      log.debug("Shutdown handler unregistered", { name });
    },

    async shutdown(reason = "manual"): Promise<void> {
      await runHandlers(reason);
    },

    isShuttingDown(): boolean {
      return shuttingDown;
    },

    getHandlers(): string[] {
      return sortedEntries().map(([name]) => name);
    },

    dispose(): void {
      for (const [signal, listener] of listeners) {
        process.removeListener(signal, listener);
      }
      listeners.clear();
    },
  };
}

/** Predefined shutdown priorities */
export const SHUTDOWN_PRIORITIES = {
  /** Stop in-flight generations first */
  IMMEDIATE: 100,
  /** Flush outcome reports */
  NORMAL: 50,
  /** Close logs last */
  FINAL: 0,
} as const;

/** Create a shutdown handler that waits for pending operations */
export function createDrainHandler(
  name: string,
  getPendingCount: () => number,
  options: {
    checkIntervalMs?: number;
    maxWaitMs?: number;
    logger?: Logger;
  } = {},
): ShutdownHandler {
  const { checkIntervalMs = 50, maxWaitMs = 5000, logger } = options;

  return async () => {
    const startTime = Date.now();

    while (getPendingCount() > 0) {
      if (Date.now() - startTime >= maxWaitMs) {
        logger?.warn(`Max wait time reached with ${getPendingCount()} pending operations`, {
          name,
          pending: getPendingCount(),
          maxWaitMs,
        });
        break;
      }

      await new Promise((resolve) => setTimeout(resolve, checkIntervalMs));
    }
  };
}
