/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */

// --- TEMPO ---
export const MIN_TEMPO_BPM = 20;
export const MAX_TEMPO_BPM = 400;
export const DEFAULT_TEMPO_BPM = 120;
export const COARSE_TEMPO_STEP = 5;
export const FINE_TEMPO_STEP = 1;
export const TEMPO_PRESETS = [60, 120, 180, 200] as const;
export const BEATS_PER_BAR = 4;

// --- VOLUME ---
export const MIN_VOLUME = 0;
export const MAX_VOLUME = 100;
export const DEFAULT_VOLUME = 70;
export const VOLUME_STEP = 10;

// --- RANDOM MODE ---
export const RANDOM_SPREAD_STEP = 10;
export const DEFAULT_RANDOM_SPREAD = 20;

// --- SOUND ---
export const DEFAULT_SOUND_INDEX = 0;
export const TICK_SAMPLE_RATE = 44100;

// --- RUNTIME ---
export const COMMAND_CHANNEL_CAPACITY = 64;
export const RENDER_INTERVAL_MS = 16;
export const STATUS_MESSAGE_TTL_MS = 4000;
