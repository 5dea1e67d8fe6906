import { describe, expect, it, vi } from 'vitest';
import { createSystemClock } from './clock-source';

function createFakeTimers() {
  const callbacks = new Map<number, () => void>();
  const delays: number[] = [];
  let nextId = 1;

  return {
    delays,
    callbacks,
    setTimeoutFn: vi.fn((callback: () => void, delayMs: number) => {
      const id = nextId++;
      callbacks.set(id, callback);
      delays.push(delayMs);
      return id as unknown as ReturnType<typeof setTimeout>;
    }),
    clearTimeoutFn: vi.fn((id: ReturnType<typeof setTimeout>) => {
      callbacks.delete(Number(id));
    }),
    runAll() {
      const pending = [...callbacks.values()];
      callbacks.clear();
      pending.forEach((callback) => callback());
    },
  };
}

describe('createSystemClock', () => {
  it('reads time from the injected source', () => {
    let current = 41;
    const clock = createSystemClock({ now: () => current });

    current = 42;

    expect(clock.now()).toBe(42);
  });

  it('rounds fractional delays up and never schedules negative ones', async () => {
    const timers = createFakeTimers();
    const clock = createSystemClock(timers);

    const first = clock.sleep(521.74);
    const second = clock.sleep(-3);
    timers.runAll();
    await Promise.all([first, second]);

    expect(timers.delays).toEqual([522, 0]);
  });

  it('resolves early and clears its timer when aborted', async () => {
    const timers = createFakeTimers();
    const clock = createSystemClock(timers);
    const controller = new AbortController();

    const sleeping = clock.sleep(1000, controller.signal);
    controller.abort();
    await sleeping;

    expect(timers.clearTimeoutFn).toHaveBeenCalledTimes(1);
    expect(timers.callbacks.size).toBe(0);
  });

  it('does not start a timer for an already aborted signal', async () => {
    const timers = createFakeTimers();
    const clock = createSystemClock(timers);
    const controller = new AbortController();
    controller.abort();

    await clock.sleep(1000, controller.signal);

    expect(timers.setTimeoutFn).not.toHaveBeenCalled();
  });
});
