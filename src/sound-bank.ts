import type { SoundDefinition } from './types';

export const DEFAULT_SOUND_DEFINITIONS: readonly SoundDefinition[] = [
  { id: 'beep', name: 'Beep', icon: '🔔' },
  { id: 'kick', name: 'Kick', icon: '🥁' },
  { id: 'click', name: 'Click', icon: '🖱️' },
  { id: 'cowbell', name: 'Cowbell', icon: '🐄' },
  { id: 'hihat', name: 'Hi-hat', icon: '🎩' },
  { id: 'square', name: 'Square', icon: '⬜' },
  { id: 'triangle', name: 'Triangle', icon: '🔺' },
  { id: 'woodblock', name: 'Woodblock', icon: '🪵' },
];

export interface SoundBank {
  count(): number;
  /** Throws on an index outside [0, count - 1]: callers wrap indices before resolving. */
  resolve(index: number): SoundDefinition;
  /** Returns -1 when no sound matches the id or display name (case-insensitive). */
  indexOf(idOrName: string): number;
  list(): readonly SoundDefinition[];
}

export function createSoundBank(definitions: readonly SoundDefinition[] = DEFAULT_SOUND_DEFINITIONS): SoundBank {
  if (definitions.length === 0) {
    throw new Error('Sound bank requires at least one sound.');
  }
  const entries = Object.freeze(definitions.map((definition) => Object.freeze({ ...definition })));

  return {
    count: () => entries.length,
    resolve: (index: number) => {
      const entry = Number.isInteger(index) ? entries[index] : undefined;
      if (!entry) {
        throw new Error(`Sound index ${index} is outside the sound bank (0-${entries.length - 1}).`);
      }
      return entry;
    },
    indexOf: (idOrName: string) => {
      const needle = idOrName.trim().toLowerCase();
      return entries.findIndex((entry) => entry.id === needle || entry.name.toLowerCase() === needle);
    },
    list: () => entries,
  };
}

