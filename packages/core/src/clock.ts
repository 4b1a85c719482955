/**
 * Clock abstraction: injectable for deterministic testing.
 *
 * Production code uses globalThis timers via `defaultClock`.
 * Tests inject a fake clock that controls time explicitly.
 */

export type TimerHandle = ReturnType<typeof globalThis.setTimeout> | number;

export interface Clock {
  readonly now: () => number;
  readonly setTimeout: (fn: () => void, ms: number) => TimerHandle;
  readonly clearTimeout: (id: TimerHandle) => void;
}

export const defaultClock: Clock = {
  now: () => Date.now(),
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
};

/**
 * Resolve after `ms` on the given clock. Rejects with the signal's reason
 * (an `AbortError` by default) when the signal fires first.
 */
export function sleep(ms: number, clock: Clock = defaultClock, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clock.clearTimeout(id);
      reject(abortReason(signal));
    };
    const id = clock.setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const error = new Error(typeof reason === "string" ? reason : "The operation was aborted");
  error.name = "AbortError";
  return error;
}

/**
 * True for the errors produced by an aborted signal.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
