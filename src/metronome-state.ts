/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import {
  BEATS_PER_BAR,
  DEFAULT_RANDOM_SPREAD,
  DEFAULT_SOUND_INDEX,
  DEFAULT_TEMPO_BPM,
  DEFAULT_VOLUME,
  MAX_TEMPO_BPM,
  MAX_VOLUME,
  MIN_TEMPO_BPM,
  MIN_VOLUME,
  RANDOM_SPREAD_STEP,
} from './constants';
import type { SoundBank } from './sound-bank';
import type { MetronomeSnapshot, MetronomeState } from './types';

/** Infinite values clamp to the nearest bound; only NaN takes the fallback. */
export function clampTempoBpm(bpm: number, fallback = DEFAULT_TEMPO_BPM) {
  if (Number.isNaN(bpm)) return fallback;
  return Math.max(MIN_TEMPO_BPM, Math.min(MAX_TEMPO_BPM, Math.round(bpm)));
}

export function clampVolume(volume: number, fallback = DEFAULT_VOLUME) {
  if (Number.isNaN(volume)) return fallback;
  return Math.max(MIN_VOLUME, Math.min(MAX_VOLUME, Math.round(volume)));
}

/** Rounds to the nearest multiple of the spread step and floors at 0. */
export function normalizeRandomSpread(spread: number, fallback = DEFAULT_RANDOM_SPREAD) {
  if (!Number.isFinite(spread)) return fallback;
  const stepped = Math.round(spread / RANDOM_SPREAD_STEP) * RANDOM_SPREAD_STEP;
  return Math.max(0, stepped);
}

export function wrapSoundIndex(index: number, soundCount: number) {
  const whole = Math.trunc(index);
  return ((whole % soundCount) + soundCount) % soundCount;
}

export function computeTickIntervalMs(tempoBpm: number) {
  return 60000 / clampTempoBpm(tempoBpm);
}

export interface MetronomeStateOverrides {
  tempoBpm?: number;
  soundIndex?: number;
  volume?: number;
  randomMode?: boolean;
  randomSpread?: number;
}

export function createInitialMetronomeState(
  soundCount: number,
  overrides: MetronomeStateOverrides = {}
): MetronomeState {
  return {
    tempoBpm: clampTempoBpm(overrides.tempoBpm ?? DEFAULT_TEMPO_BPM),
    running: false,
    soundIndex: wrapSoundIndex(overrides.soundIndex ?? DEFAULT_SOUND_INDEX, soundCount),
    volume: clampVolume(overrides.volume ?? DEFAULT_VOLUME),
    randomMode: overrides.randomMode ?? false,
    randomSpread: normalizeRandomSpread(overrides.randomSpread ?? DEFAULT_RANDOM_SPREAD),
    tickCount: 0,
  };
}

export function getBeatInBar(tickCount: number) {
  if (tickCount <= 0) return 0;
  return ((tickCount - 1) % BEATS_PER_BAR) + 1;
}

export function createMetronomeSnapshot(state: MetronomeState, soundBank: SoundBank): MetronomeSnapshot {
  const sound = soundBank.resolve(state.soundIndex);
  return Object.freeze({
    tempoBpm: state.tempoBpm,
    intervalMs: computeTickIntervalMs(state.tempoBpm),
    running: state.running,
    soundIndex: state.soundIndex,
    soundName: sound.name,
    soundIcon: sound.icon,
    volume: state.volume,
    randomMode: state.randomMode,
    randomSpread: state.randomSpread,
    tickCount: state.tickCount,
    beatInBar: getBeatInBar(state.tickCount),
  });
}

export function isSameMetronomeSnapshot(left: MetronomeSnapshot, right: MetronomeSnapshot) {
  return (
    left.tempoBpm === right.tempoBpm &&
    left.running === right.running &&
    left.soundIndex === right.soundIndex &&
    left.volume === right.volume &&
    left.randomMode === right.randomMode &&
    left.randomSpread === right.randomSpread &&
    left.tickCount === right.tickCount
  );
}
