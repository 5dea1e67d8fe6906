/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import type { ClockSource } from './clock-source';
import type { CommandChannel } from './command-channel';
import { buildMetronomeCommandPlan } from './metronome-command-plan';
import {
  computeTickIntervalMs,
  createInitialMetronomeState,
  createMetronomeSnapshot,
  isSameMetronomeSnapshot,
} from './metronome-state';
import type { RandomTempoPolicy } from './random-tempo-policy';
import { createSignal } from './reactive/signal';
import type { SoundBackend } from './sound-backend';
import type { SoundBank } from './sound-bank';
import type { MetronomeSnapshot, MetronomeState, TickEvent, TickSource } from './types';

export interface TickSchedulerDeps {
  channel: CommandChannel;
  clock: ClockSource;
  soundBank: SoundBank;
  soundBackend: SoundBackend;
  randomTempoPolicy: RandomTempoPolicy;
  initialState?: MetronomeState;
  onTick?: (event: TickEvent) => void;
  logError?: (...args: unknown[]) => void;
}

export interface TickScheduler {
  /** Runs until a quit command is applied or the channel is closed. Can only be called once. */
  run(): Promise<void>;
  getSnapshot(): MetronomeSnapshot;
  subscribeSnapshot(subscriber: (snapshot: MetronomeSnapshot) => void): () => void;
  isFinished(): boolean;
}

type SchedulerPhase = 'idle' | 'active' | 'finished';

export function createTickScheduler(deps: TickSchedulerDeps): TickScheduler {
  const { channel, clock, soundBank, soundBackend, randomTempoPolicy, onTick, logError = console.error } = deps;

  let state: MetronomeState = { ...(deps.initialState ?? createInitialMetronomeState(soundBank.count())) };
  const snapshotSignal = createSignal(createMetronomeSnapshot(state, soundBank), isSameMetronomeSnapshot);
  let phase: SchedulerPhase = 'idle';
  // Due time of the tick in flight is baselineMs + interval; the baseline only ever advances by whole intervals.
  let baselineMs = clock.now();
  let pendingDueAtMs: number | null = null;

  function publishSnapshot() {
    snapshotSignal.set(createMetronomeSnapshot(state, soundBank));
  }

  function buildTickEvent(source: TickSource, timestampMs: number, scheduledAtMs: number): TickEvent {
    return {
      source,
      soundIndex: state.soundIndex,
      soundId: soundBank.resolve(state.soundIndex).id,
      volume: state.volume,
      timestampMs,
      scheduledAtMs,
      tickNumber: source === 'scheduled' ? state.tickCount : 0,
    };
  }

  function emitTick(event: TickEvent) {
    try {
      onTick?.(event);
    } catch (error) {
      logError('[scheduler] Tick listener failed:', error);
    }
    try {
      soundBackend.play(event.soundId, event.volume);
    } catch (error) {
      logError('[sound] Tick playback failed:', error);
    }
  }

  /** Applies queued commands in arrival order. Returns true once a quit has been applied. */
  function applyPendingCommands() {
    const commands = channel.drain();
    if (commands.length === 0) return false;

    let shouldQuit = false;
    for (const command of commands) {
      const plan = buildMetronomeCommandPlan(state, command, soundBank.count());
      state = plan.nextState;

      if (plan.resetBaseline) {
        baselineMs = clock.now();
        pendingDueAtMs = null;
      }
      if (plan.playTestSound) {
        const nowMs = clock.now();
        emitTick(buildTickEvent('test', nowMs, nowMs));
      }
      if (plan.quit) {
        shouldQuit = true;
        break;
      }
    }

    publishSnapshot();
    return shouldQuit;
  }

  /**
   * A tempo change during a wait moves the due time to baseline + new interval, unless that
   * time has already passed; then the wait keeps the due time it started with.
   */
  function resolveDueAtMs(nowMs: number) {
    const candidateMs = baselineMs + computeTickIntervalMs(state.tempoBpm);
    if (pendingDueAtMs === null || candidateMs >= nowMs) {
      pendingDueAtMs = candidateMs;
    }
    return pendingDueAtMs;
  }

  function fireScheduledTick(dueAtMs: number) {
    if (state.randomMode) {
      state = { ...state, tempoBpm: randomTempoPolicy.next(state.tempoBpm, state.randomSpread) };
    }
    state = { ...state, tickCount: state.tickCount + 1 };

    const nowMs = clock.now();
    emitTick(buildTickEvent('scheduled', nowMs, dueAtMs));

    baselineMs = dueAtMs;
    pendingDueAtMs = null;
    // Resync instead of bursting through ticks missed while the host was suspended.
    if (nowMs - baselineMs >= computeTickIntervalMs(state.tempoBpm)) {
      baselineMs = nowMs;
    }
    publishSnapshot();
  }

  async function waitForCommandOrTimeout(timeoutMs: number | null) {
    const controller = new AbortController();
    const waits = [channel.waitForCommand(controller.signal)];
    if (timeoutMs !== null) {
      waits.push(clock.sleep(timeoutMs, controller.signal));
    }

    try {
      await Promise.race(waits);
    } finally {
      controller.abort();
    }
  }

  async function run() {
    if (phase !== 'idle') {
      throw new Error('Tick scheduler can only run once.');
    }
    phase = 'active';

    try {
      while (!applyPendingCommands() && !channel.isClosed()) {
        if (!state.running) {
          await waitForCommandOrTimeout(null);
          continue;
        }

        const nowMs = clock.now();
        const dueAtMs = resolveDueAtMs(nowMs);
        if (dueAtMs > nowMs) {
          await waitForCommandOrTimeout(dueAtMs - nowMs);
          continue;
        }
        fireScheduledTick(dueAtMs);
      }
    } finally {
      phase = 'finished';
      channel.close();
    }
  }

  return {
    run,
    getSnapshot: () => snapshotSignal.get(),
    subscribeSnapshot: (subscriber) => snapshotSignal.subscribe(subscriber),
    isFinished: () => phase === 'finished',
  };
}
