import { COARSE_TEMPO_STEP, FINE_TEMPO_STEP, RANDOM_SPREAD_STEP, TEMPO_PRESETS } from './constants';
import {
  adjustRandomSpread,
  adjustTempo,
  nextSound,
  prevSound,
  quit,
  setTempo,
  startStop,
  testSound,
  toggleRandom,
  volumeDown,
  volumeUp,
} from './metronome-commands';
import type { MetronomeCommand } from './types';

/** Shape of the key object emitted by `readline.emitKeypressEvents`. */
export interface KeyPress {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export interface KeyBindingHelpEntry {
  keys: string;
  description: string;
}

const NAMED_KEY_COMMANDS: Record<string, () => MetronomeCommand> = {
  space: startStop,
  return: startStop,
  enter: startStop,
  escape: quit,
  q: quit,
  up: () => adjustTempo(COARSE_TEMPO_STEP),
  down: () => adjustTempo(-COARSE_TEMPO_STEP),
  right: () => adjustTempo(FINE_TEMPO_STEP),
  left: () => adjustTempo(-FINE_TEMPO_STEP),
  r: toggleRandom,
  s: nextSound,
  n: nextSound,
  a: prevSound,
  p: prevSound,
  t: testSound,
  v: volumeUp,
  c: volumeDown,
};

const SEQUENCE_COMMANDS: Record<string, () => MetronomeCommand> = {
  ' ': startStop,
  '+': () => adjustRandomSpread(RANDOM_SPREAD_STEP),
  '=': () => adjustRandomSpread(RANDOM_SPREAD_STEP),
  '-': () => adjustRandomSpread(-RANDOM_SPREAD_STEP),
  _: () => adjustRandomSpread(-RANDOM_SPREAD_STEP),
};

TEMPO_PRESETS.forEach((bpm, index) => {
  NAMED_KEY_COMMANDS[`f${index + 1}`] = () => setTempo(bpm);
  NAMED_KEY_COMMANDS[String(index + 1)] = () => setTempo(bpm);
});

export const KEY_BINDING_HELP: readonly KeyBindingHelpEntry[] = [
  { keys: 'SPACE/ENTER', description: 'Start/Stop metronome' },
  { keys: 'R', description: 'Toggle random BPM mode' },
  { keys: '↑/↓', description: `Adjust BPM by ±${COARSE_TEMPO_STEP}` },
  { keys: '←/→', description: `Adjust BPM by ±${FINE_TEMPO_STEP}` },
  { keys: '+/-', description: `Adjust random spread ±${RANDOM_SPREAD_STEP}` },
  { keys: 'S/N', description: 'Next sound' },
  { keys: 'A/P', description: 'Previous sound' },
  { keys: 'T', description: 'Test current sound' },
  { keys: 'V/C', description: 'Volume up/down' },
  { keys: 'F1-F4, 1-4', description: `BPM presets (${TEMPO_PRESETS.join('/')})` },
  { keys: 'Q/ESC', description: 'Quit' },
];

/** Maps a key press to its command, or null for keys without a binding. */
export function mapKeyToCommand(key: KeyPress): MetronomeCommand | null {
  if (key.ctrl) {
    return key.name === 'c' ? quit() : null;
  }
  // A lone ESC can arrive flagged as meta.
  if (key.name === 'escape') return quit();
  if (key.meta) return null;

  const named = key.name ? NAMED_KEY_COMMANDS[key.name] : undefined;
  if (named) return named();

  const bySequence = key.sequence ? SEQUENCE_COMMANDS[key.sequence] : undefined;
  return bySequence ? bySequence() : null;
}
