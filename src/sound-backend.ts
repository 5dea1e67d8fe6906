import type { SoundId } from './types';

export interface SoundBackend {
  /** Fire-and-forget: must return without waiting for playback. */
  play(soundId: SoundId, volumePercent: number): void;
  dispose?(): void;
}

export type SoundFailureReporter = (error: unknown) => void;

export function createSilentSoundBackend(): SoundBackend {
  return {
    play() {},
  };
}

/** Forwards only the first failure; playback problems are reported once per run. */
export function createSoundFailureReporter(report: SoundFailureReporter): SoundFailureReporter {
  let hasReported = false;
  return (error) => {
    if (hasReported) return;
    hasReported = true;
    report(error);
  };
}

/** Keeps a throwing backend from reaching the scheduler. */
export function createBestEffortSoundBackend(backend: SoundBackend, reportFailure: SoundFailureReporter): SoundBackend {
  return {
    play(soundId, volumePercent) {
      try {
        backend.play(soundId, volumePercent);
      } catch (error) {
        reportFailure(error);
      }
    },
    dispose() {
      backend.dispose?.();
    },
  };
}
