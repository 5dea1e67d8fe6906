import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createSystemClock, type ClockSource } from './clock-source';
import { createCommandChannel } from './command-channel';
import { adjustTempo, quit, setTempo, startStop, testSound, toggleRandom } from './metronome-commands';
import { createInitialMetronomeState } from './metronome-state';
import { createRandomTempoPolicy } from './random-tempo-policy';
import { createSoundBank } from './sound-bank';
import { createTickScheduler, type TickSchedulerDeps } from './tick-scheduler';
import type { TickEvent } from './types';

function createHarness(overrides: Partial<TickSchedulerDeps> = {}) {
  const channel = createCommandChannel();
  const ticks: TickEvent[] = [];
  const soundBackend = { play: vi.fn() };
  const scheduler = createTickScheduler({
    channel,
    clock: createSystemClock({ now: () => Date.now() }),
    soundBank: createSoundBank(),
    soundBackend,
    randomTempoPolicy: createRandomTempoPolicy({ random: () => 0.5 }),
    onTick: (event) => ticks.push(event),
    ...overrides,
  });
  return { channel, ticks, soundBackend, scheduler };
}

/** Clock whose sleeps complete instantly by jumping time forward; `suspendNextSleep` adds an extra jump. */
function createSteppingClock() {
  let nowMs = 0;
  const extraDelays: number[] = [];
  const clock: ClockSource = {
    now: () => nowMs,
    sleep: async (delayMs) => {
      nowMs += Math.max(0, delayMs) + (extraDelays.shift() ?? 0);
    },
  };
  return {
    clock,
    suspendNextSleep(delayMs: number) {
      extraDelays.push(delayMs);
    },
  };
}

describe('createTickScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires the first tick one interval after start', async () => {
    const { channel, ticks, scheduler } = createHarness();
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(499);
    expect(ticks).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(ticks).toEqual([
      {
        source: 'scheduled',
        soundIndex: 0,
        soundId: 'beep',
        volume: 70,
        timestampMs: 500,
        scheduledAtMs: 500,
        tickNumber: 1,
      },
    ]);

    channel.push(quit());
    await running;
  });

  it('keeps 100 ticks at 120 BPM on exact 500 ms multiples', async () => {
    const { channel, ticks, scheduler } = createHarness();
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(50_000);

    expect(ticks).toHaveLength(100);
    ticks.forEach((tick, index) => {
      expect(tick.scheduledAtMs).toBe((index + 1) * 500);
      expect(tick.timestampMs).toBe((index + 1) * 500);
      expect(tick.tickNumber).toBe(index + 1);
    });

    channel.push(quit());
    await running;
  });

  it('does not accumulate drift at a tempo with a fractional interval', async () => {
    const { channel, ticks, scheduler } = createHarness();
    channel.push(setTempo(115));
    channel.push(startStop());
    const running = scheduler.run();
    const intervalMs = 60000 / 115;

    await vi.advanceTimersByTimeAsync(50 * 522);

    expect(ticks).toHaveLength(50);
    ticks.forEach((tick, index) => {
      const idealMs = (index + 1) * intervalMs;
      expect(tick.scheduledAtMs).toBeCloseTo(idealMs, 6);
      expect(tick.timestampMs - idealMs).toBeGreaterThanOrEqual(0);
      expect(tick.timestampMs - idealMs).toBeLessThan(1.5);
    });

    channel.push(quit());
    await running;
  });

  it('moves the pending tick when the tempo changes mid-wait', async () => {
    const { channel, ticks, scheduler } = createHarness();
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(250);
    channel.push(adjustTempo(-5));
    await vi.advanceTimersByTimeAsync(271);
    expect(ticks).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(ticks.map((tick) => tick.timestampMs)).toEqual([522]);
    expect(ticks[0].scheduledAtMs).toBeCloseTo(60000 / 115, 6);

    await vi.advanceTimersByTimeAsync(522);
    expect(ticks.map((tick) => tick.timestampMs)).toEqual([522, 1044]);
    expect(ticks[1].scheduledAtMs - ticks[0].scheduledAtMs).toBeCloseTo(60000 / 115, 6);
    expect(scheduler.getSnapshot().tempoBpm).toBe(115);

    channel.push(quit());
    await running;
  });

  it('keeps the first due time when the new one has already passed', async () => {
    const { channel, ticks, scheduler } = createHarness();
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(400);
    channel.push(setTempo(400));
    await vi.advanceTimersByTimeAsync(99);
    expect(ticks).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(ticks.map((tick) => [tick.timestampMs, tick.scheduledAtMs])).toEqual([[500, 500]]);

    await vi.advanceTimersByTimeAsync(150);
    expect(ticks.map((tick) => tick.timestampMs)).toEqual([500, 650]);

    channel.push(quit());
    await running;
  });

  it('stops ticking when stopped and restarts the count one interval after restart', async () => {
    const { channel, ticks, scheduler } = createHarness();
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(700);
    channel.push(startStop());
    await vi.advanceTimersByTimeAsync(300);
    expect(ticks).toHaveLength(1);
    expect(vi.getTimerCount()).toBe(0);
    expect(scheduler.getSnapshot().running).toBe(false);

    channel.push(startStop());
    await vi.advanceTimersByTimeAsync(500);
    expect(ticks.map((tick) => [tick.timestampMs, tick.tickNumber])).toEqual([
      [500, 1],
      [1500, 1],
    ]);

    channel.push(quit());
    await running;
  });

  it('re-rolls the tempo before each tick in random mode', async () => {
    const { channel, ticks, scheduler } = createHarness({
      randomTempoPolicy: createRandomTempoPolicy({ random: () => 0 }),
    });
    channel.push(toggleRandom());
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(500);
    expect(scheduler.getSnapshot().tempoBpm).toBe(100);

    await vi.advanceTimersByTimeAsync(600);
    await vi.advanceTimersByTimeAsync(750);
    expect(ticks.map((tick) => tick.scheduledAtMs)).toEqual([500, 1100, 1850]);
    expect(scheduler.getSnapshot().tempoBpm).toBe(60);

    channel.push(quit());
    await running;
  });

  it('never leaves 20-400 BPM during a random walk', async () => {
    const { channel, ticks, scheduler } = createHarness({
      initialState: { ...createInitialMetronomeState(8), randomMode: true, randomSpread: 50 },
      randomTempoPolicy: createRandomTempoPolicy(),
    });
    const tempos: number[] = [];
    scheduler.subscribeSnapshot((snapshot) => tempos.push(snapshot.tempoBpm));
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(60_000);

    expect(ticks.length).toBeGreaterThanOrEqual(20);
    tempos.forEach((tempo) => {
      expect(tempo).toBeGreaterThanOrEqual(20);
      expect(tempo).toBeLessThanOrEqual(400);
    });

    channel.push(quit());
    await running;
  });

  it('plays a test sound immediately while stopped', async () => {
    const { channel, ticks, soundBackend, scheduler } = createHarness();
    channel.push(testSound());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(0);

    expect(ticks).toEqual([
      {
        source: 'test',
        soundIndex: 0,
        soundId: 'beep',
        volume: 70,
        timestampMs: 0,
        scheduledAtMs: 0,
        tickNumber: 0,
      },
    ]);
    expect(soundBackend.play).toHaveBeenCalledWith('beep', 70);
    expect(scheduler.getSnapshot().running).toBe(false);
    expect(vi.getTimerCount()).toBe(0);

    channel.push(quit());
    await running;
  });

  it('finishes when quit arrives while stopped', async () => {
    const { channel, scheduler } = createHarness();
    const running = scheduler.run();

    channel.push(quit());
    await running;

    expect(scheduler.isFinished()).toBe(true);
    expect(channel.isClosed()).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('finishes during a wait without firing the pending tick', async () => {
    const { channel, ticks, scheduler } = createHarness();
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(100);
    channel.push(quit());
    await running;

    expect(ticks).toEqual([]);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('ignores commands queued behind a quit', async () => {
    const { channel, scheduler } = createHarness();
    channel.push(quit());
    channel.push(setTempo(200));

    await scheduler.run();

    expect(scheduler.getSnapshot().tempoBpm).toBe(120);
  });

  it('finishes when the channel is closed', async () => {
    const { channel, scheduler } = createHarness();
    const running = scheduler.run();

    channel.close();
    await running;

    expect(scheduler.isFinished()).toBe(true);
  });

  it('refuses to run twice', async () => {
    const { channel, scheduler } = createHarness();
    const running = scheduler.run();

    await expect(scheduler.run()).rejects.toThrow('Tick scheduler can only run once.');

    channel.push(quit());
    await running;
  });

  it('logs a failing tick listener and still plays the sound', async () => {
    const logError = vi.fn();
    const listenerError = new Error('listener broke');
    const { channel, soundBackend, scheduler } = createHarness({
      logError,
      onTick: () => {
        throw listenerError;
      },
    });
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(500);

    expect(logError).toHaveBeenCalledWith('[scheduler] Tick listener failed:', listenerError);
    expect(soundBackend.play).toHaveBeenCalledWith('beep', 70);

    channel.push(quit());
    await running;
  });

  it('keeps ticking when the sound backend throws', async () => {
    const logError = vi.fn();
    const playbackError = new Error('device busy');
    const { channel, ticks, scheduler } = createHarness({
      logError,
      soundBackend: {
        play: () => {
          throw playbackError;
        },
      },
    });
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(1000);

    expect(ticks.map((tick) => tick.timestampMs)).toEqual([500, 1000]);
    expect(logError).toHaveBeenCalledTimes(2);
    expect(logError).toHaveBeenCalledWith('[sound] Tick playback failed:', playbackError);

    channel.push(quit());
    await running;
    expect(scheduler.isFinished()).toBe(true);
  });

  it('publishes snapshots with the tick count and beat position', async () => {
    const { channel, scheduler } = createHarness();
    channel.push(startStop());
    const running = scheduler.run();

    await vi.advanceTimersByTimeAsync(2500);

    expect(scheduler.getSnapshot()).toMatchObject({ running: true, tickCount: 5, beatInBar: 1, intervalMs: 500 });

    channel.push(quit());
    await running;
  });
});

describe('createTickScheduler after a host suspend', () => {
  it('resyncs to the current time instead of bursting through missed ticks', async () => {
    const stepping = createSteppingClock();
    const channel = createCommandChannel();
    const ticks: TickEvent[] = [];
    const scheduler = createTickScheduler({
      channel,
      clock: stepping.clock,
      soundBank: createSoundBank(),
      soundBackend: { play: vi.fn() },
      randomTempoPolicy: createRandomTempoPolicy(),
      onTick: (event) => {
        ticks.push(event);
        if (event.tickNumber === 1) stepping.suspendNextSleep(2000);
        if (event.tickNumber === 3) channel.push(quit());
      },
    });

    channel.push(startStop());
    await scheduler.run();

    expect(ticks.map((tick) => [tick.timestampMs, tick.scheduledAtMs])).toEqual([
      [500, 500],
      [3000, 1000],
      [3500, 3500],
    ]);
  });
});
