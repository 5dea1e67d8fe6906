/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */

export type SoundId = 'beep' | 'kick' | 'click' | 'cowbell' | 'hihat' | 'square' | 'triangle' | 'woodblock';

export interface SoundDefinition {
  id: SoundId;
  name: string;
  icon: string;
}

export type MetronomeCommand =
  | { readonly kind: 'start_stop' }
  | { readonly kind: 'adjust_tempo'; readonly delta: number }
  | { readonly kind: 'set_tempo'; readonly bpm: number }
  | { readonly kind: 'next_sound' }
  | { readonly kind: 'prev_sound' }
  | { readonly kind: 'test_sound' }
  | { readonly kind: 'volume_up' }
  | { readonly kind: 'volume_down' }
  | { readonly kind: 'toggle_random' }
  | { readonly kind: 'adjust_random_spread'; readonly delta: number }
  | { readonly kind: 'quit' };

export interface MetronomeState {
  tempoBpm: number;
  running: boolean;
  soundIndex: number;
  volume: number;
  randomMode: boolean;
  randomSpread: number;
  tickCount: number;
}

/** Read-only copy of the state handed to the display. */
export interface MetronomeSnapshot {
  readonly tempoBpm: number;
  readonly intervalMs: number;
  readonly running: boolean;
  readonly soundIndex: number;
  readonly soundName: string;
  readonly soundIcon: string;
  readonly volume: number;
  readonly randomMode: boolean;
  readonly randomSpread: number;
  readonly tickCount: number;
  readonly beatInBar: number;
}

export type TickSource = 'scheduled' | 'test';

export interface TickEvent {
  source: TickSource;
  soundIndex: number;
  soundId: SoundId;
  volume: number;
  /** Clock time when the tick was emitted. */
  timestampMs: number;
  /** Clock time the tick was due; equals timestampMs for test sounds. */
  scheduledAtMs: number;
  /** 1-based count since the metronome was last started; 0 for test sounds. */
  tickNumber: number;
}
