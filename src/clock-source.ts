export interface ClockSource {
  /** Monotonic milliseconds. */
  now(): number;
  /** Resolves no earlier than `delayMs` from now, or as soon as `signal` aborts. */
  sleep(delayMs: number, signal?: AbortSignal): Promise<void>;
}

interface SystemClockDeps {
  now?: () => number;
  setTimeoutFn?: (callback: () => void, delayMs: number) => ReturnType<typeof setTimeout>;
  clearTimeoutFn?: (id: ReturnType<typeof setTimeout>) => void;
}

export function createSystemClock({
  now = () => performance.now(),
  setTimeoutFn = (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimeoutFn = (id) => clearTimeout(id),
}: SystemClockDeps = {}): ClockSource {
  return {
    now,
    sleep(delayMs, signal) {
      return new Promise<void>((resolve) => {
        if (signal?.aborted) {
          resolve();
          return;
        }

        const onAbort = () => {
          clearTimeoutFn(timerId);
          resolve();
        };
        // Timers truncate fractional delays; rounding up keeps the wake at or after the due time.
        const timerId = setTimeoutFn(() => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        }, Math.max(0, Math.ceil(delayMs)));
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    },
  };
}
