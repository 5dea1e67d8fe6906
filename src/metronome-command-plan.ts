import { VOLUME_STEP } from './constants';
import { clampTempoBpm, clampVolume, normalizeRandomSpread, wrapSoundIndex } from './metronome-state';
import type { MetronomeCommand, MetronomeState } from './types';

export interface MetronomeCommandPlan {
  nextState: MetronomeState;
  /** Set on a stopped -> running transition: the timing baseline restarts from now. */
  resetBaseline: boolean;
  playTestSound: boolean;
  quit: boolean;
}

function planState(nextState: MetronomeState): MetronomeCommandPlan {
  return { nextState, resetBaseline: false, playTestSound: false, quit: false };
}

export function buildMetronomeCommandPlan(
  state: MetronomeState,
  command: MetronomeCommand,
  soundCount: number
): MetronomeCommandPlan {
  switch (command.kind) {
    case 'start_stop': {
      const running = !state.running;
      return {
        nextState: { ...state, running, tickCount: running ? 0 : state.tickCount },
        resetBaseline: running,
        playTestSound: false,
        quit: false,
      };
    }
    case 'adjust_tempo':
      return planState({ ...state, tempoBpm: clampTempoBpm(state.tempoBpm + command.delta, state.tempoBpm) });
    case 'set_tempo':
      return planState({ ...state, tempoBpm: clampTempoBpm(command.bpm, state.tempoBpm) });
    case 'next_sound':
      return planState({ ...state, soundIndex: wrapSoundIndex(state.soundIndex + 1, soundCount) });
    case 'prev_sound':
      return planState({ ...state, soundIndex: wrapSoundIndex(state.soundIndex - 1, soundCount) });
    case 'test_sound':
      return { nextState: state, resetBaseline: false, playTestSound: true, quit: false };
    case 'volume_up':
      return planState({ ...state, volume: clampVolume(state.volume + VOLUME_STEP, state.volume) });
    case 'volume_down':
      return planState({ ...state, volume: clampVolume(state.volume - VOLUME_STEP, state.volume) });
    case 'toggle_random':
      return planState({ ...state, randomMode: !state.randomMode });
    case 'adjust_random_spread':
      return planState({
        ...state,
        randomSpread: normalizeRandomSpread(state.randomSpread + command.delta, state.randomSpread),
      });
    case 'quit':
      return { nextState: state, resetBaseline: false, playTestSound: false, quit: true };
  }
}
