/**
 * Concurrency helpers
 *
 * Bounded worker pools for the search and fetch stages, plus the
 * cancellation checks shared by every stage of a research run.
 */

import { ResearchCancelledError } from "../services/research-engine/errors";

/**
 * Runs async tasks with at most `concurrency` of them in flight
 */
export interface Limiter {
  run<T>(task: () => Promise<T>): Promise<T>;
  readonly active: number;
  readonly pending: number;
}

/**
 * Create a limiter with a fixed number of slots
 */
export function createLimiter(concurrency: number): Limiter {
  const slots = Math.max(1, Math.floor(concurrency));
  const queue: Array<() => void> = [];
  let active = 0;

  const next = (): void => {
    if (active >= slots) return;
    const start = queue.shift();
    if (start) {
      active++;
      start();
    }
  };

  return {
    run<T>(task: () => Promise<T>): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        queue.push(() => {
          Promise.resolve()
            .then(task)
            .then(resolve, reject)
            .finally(() => {
              active--;
              next();
            });
        });
        next();
      });
    },
    get active() {
      return active;
    },
    get pending() {
      return queue.length;
    },
  };
}

/**
 * Throw if the run has been cancelled
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ResearchCancelledError(signal.reason);
  }
}

/**
 * Resolve after `ms`, or reject early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ResearchCancelledError(signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(new ResearchCancelledError(signal?.reason));
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Create a controller that aborts after `timeoutMs` or when the parent aborts.
 * Call `dispose` once the guarded work is done.
 */
export function createTimeoutController(
  timeoutMs: number,
  parent?: AbortSignal
): { signal: AbortSignal; didTimeout: () => boolean; dispose: () => void } {
  const controller = new AbortController();
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    didTimeout: () => timedOut,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
