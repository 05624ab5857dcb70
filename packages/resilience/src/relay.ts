// Stream relay
// Forwards provider text fragments as they arrive and releases the source on every exit path

import { TimeoutError, createLogger, type Logger } from "@keyrelay/kernel";

export interface RelayOptions {
  /** Aborting stops the relay before the next fragment */
  signal?: AbortSignal;
  /** Longest wait for the next fragment (ms) */
  idleTimeoutMs: number;
  logger?: Logger;
}

/** Raised when the relay stops because its signal was aborted */
export class RelayAbortedError extends Error {
  constructor(public readonly reason: unknown) {
    super("Stream relay aborted");
    this.name = "RelayAbortedError";
  }
}

/**
 * Relay an async iterable of text fragments.
 * Each pull races the abort signal and a per-fragment idle timer; the
 * source iterator's `return()` is always called when the relay ends.
 */
export async function* relayStream(
  source: AsyncIterable<string>,
  options: RelayOptions,
): AsyncGenerator<string, void, undefined> {
  const log = options.logger ?? createLogger({ name: "relay" });
  const iterator = source[Symbol.asyncIterator]();
  let pulling = false;

  const pull = (): Promise<IteratorResult<string>> =>
    new Promise((resolve, reject) => {
      const { signal, idleTimeoutMs } = options;
      if (signal?.aborted) {
        reject(new RelayAbortedError(signal.reason));
        return;
      }

      const onAbort = (): void => {
        cleanup();
        reject(new RelayAbortedError(signal?.reason));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError("stream", "next chunk", idleTimeoutMs));
      }, idleTimeoutMs);
      function cleanup(): void {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      pulling = true;
      iterator.next().then(
        (result) => {
          pulling = false;
          cleanup();
          resolve(result);
        },
        (error: unknown) => {
          pulling = false;
          cleanup();
          reject(error);
        },
      );
    });

  try {
    while (true) {
      const result = await pull();
      if (result.done) return;
      yield result.value;
    }
  } finally {
    const release = iterator.return?.();
    if (release && pulling) {
      // The abandoned pull settles once the owner aborts the request
      release.then(undefined, (error: unknown) => {
        log.debug("Stream release failed", { error: String(error) });
      });
    } else if (release) {
      try {
        await release;
      } catch (error) {
        log.debug("Stream release failed", { error: String(error) });
      }
    }
  }
}
