import type { MetronomeCommand } from './types';

function freezeCommand<T extends MetronomeCommand>(command: T): T {
  return Object.freeze(command);
}

export const startStop = (): MetronomeCommand => freezeCommand({ kind: 'start_stop' });
export const adjustTempo = (delta: number): MetronomeCommand => freezeCommand({ kind: 'adjust_tempo', delta });
export const setTempo = (bpm: number): MetronomeCommand => freezeCommand({ kind: 'set_tempo', bpm });
export const nextSound = (): MetronomeCommand => freezeCommand({ kind: 'next_sound' });
export const prevSound = (): MetronomeCommand => freezeCommand({ kind: 'prev_sound' });
export const testSound = (): MetronomeCommand => freezeCommand({ kind: 'test_sound' });
export const volumeUp = (): MetronomeCommand => freezeCommand({ kind: 'volume_up' });
export const volumeDown = (): MetronomeCommand => freezeCommand({ kind: 'volume_down' });
export const toggleRandom = (): MetronomeCommand => freezeCommand({ kind: 'toggle_random' });
export const adjustRandomSpread = (delta: number): MetronomeCommand =>
  freezeCommand({ kind: 'adjust_random_spread', delta });
export const quit = (): MetronomeCommand => freezeCommand({ kind: 'quit' });

export function describeMetronomeCommand(command: MetronomeCommand) {
  switch (command.kind) {
    case 'adjust_tempo':
      return `adjust_tempo(${command.delta})`;
    case 'set_tempo':
      return `set_tempo(${command.bpm})`;
    case 'adjust_random_spread':
      return `adjust_random_spread(${command.delta})`;
    default:
      return command.kind;
  }
}
