// Timeout Enforcement Utilities
// Every external call must have an explicit timeout

// ─── TYPES ──────────────────────────────────────────────────

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly target: string,
    public readonly durationMs: number,
  ) {
    super(`Timeout after ${durationMs}ms for ${operation} on ${target}`);
    this.name = "TimeoutError";
  }
}

// ─── TIMEOUT WRAPPER ────────────────────────────────────────

/**
 * Execute a promise with a timeout.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  target: string,
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(operation, target, timeoutMs));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

/** AbortController that fires on timeout or when a parent signal aborts */
export interface TimeoutController {
  controller: AbortController;
  signal: AbortSignal;
  /** True once the timer (not the parent or a manual abort) ended the operation */
  timedOut(): boolean;
  /** Stop the timer; the parent signal stays linked */
  disarm(): void;
  cleanup: () => void;
}

/**
 * Create an AbortController with timeout.
 * When `parent` is given, aborting the parent aborts this controller too.
 */
export function createTimeoutController(
  timeoutMs: number,
  parent?: AbortSignal,
): TimeoutController {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new TimeoutError("operation", "deadline", timeoutMs));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  return {
    controller,
    signal: controller.signal,
    timedOut: () => expired,
    disarm: () => clearTimeout(timer),
    cleanup: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

// ─── DEADLINE UTILITY ───────────────────────────────────────

/**
 * Create a deadline tracker for multi-step operations.
 */
export class Deadline {
  private readonly deadline: number;
  private readonly operation: string;

  constructor(timeoutMs: number, operation: string) {
    this.deadline = Date.now() + timeoutMs;
    this.operation = operation;
  }

  /**
   * Check if deadline has passed.
   */
  isExpired(): boolean {
    return Date.now() >= this.deadline;
  }

  /**
   * Get remaining time in ms.
   */
  remaining(): number {
    return Math.max(0, this.deadline - Date.now());
  }

  /**
   * Execute a promise with remaining deadline time.
   */
  async run<T>(promise: Promise<T>, stepName: string): Promise<T> {
    const remaining = this.remaining();
    if (remaining <= 0) {
      throw new TimeoutError(this.operation, stepName, 0);
    }
    return withTimeout(promise, remaining, this.operation, stepName);
  }
}
