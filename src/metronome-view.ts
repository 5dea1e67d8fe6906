import { BEATS_PER_BAR, MAX_TEMPO_BPM, MIN_TEMPO_BPM } from './constants';
import type { MetronomeSnapshot } from './types';

export type TempoTone = 'calm' | 'brisk' | 'fast';

export interface MetronomeViewState {
  tempoText: string;
  tempoMeter: string;
  tempoTone: TempoTone;
  soundText: string;
  isPlaying: boolean;
  statusText: string;
  beatIndicator: string;
  isRandom: boolean;
  randomText: string;
  randomDetailText: string;
  volumeText: string;
  volumeMeter: string;
}

export function createProgressBar(progress: number, width: number, filled = '#', empty = '.') {
  const safeProgress = Number.isFinite(progress) ? Math.max(0, Math.min(1, progress)) : 0;
  const filledCount = Math.round(safeProgress * width);
  return filled.repeat(filledCount) + empty.repeat(width - filledCount);
}

export function getTempoTone(tempoBpm: number): TempoTone {
  if (tempoBpm > 150) return 'fast';
  if (tempoBpm > 100) return 'brisk';
  return 'calm';
}

export function formatBeatIndicator(beatInBar: number) {
  return Array.from({ length: BEATS_PER_BAR }, (_, index) => (index < beatInBar ? '*' : 'o')).join(' ');
}

export function computeMetronomeView(snapshot: MetronomeSnapshot): MetronomeViewState {
  const tempoProgress = (snapshot.tempoBpm - MIN_TEMPO_BPM) / (MAX_TEMPO_BPM - MIN_TEMPO_BPM);

  return {
    tempoText: `BPM: ${String(snapshot.tempoBpm).padStart(3, ' ')}`,
    tempoMeter: createProgressBar(tempoProgress, 20),
    tempoTone: getTempoTone(snapshot.tempoBpm),
    soundText: `${snapshot.soundIcon} ${snapshot.soundName}`,
    isPlaying: snapshot.running,
    statusText: snapshot.running
      ? `PLAYING • Beat #${snapshot.tickCount} • ${snapshot.beatInBar}/${BEATS_PER_BAR}`
      : 'STOPPED',
    beatIndicator: snapshot.running ? formatBeatIndicator(snapshot.beatInBar) : '',
    isRandom: snapshot.randomMode,
    randomText: snapshot.randomMode ? 'RANDOM MODE' : 'FIXED BPM',
    randomDetailText: `Spread: ±${snapshot.randomSpread} BPM`,
    volumeText: `Volume: ${snapshot.volume}%`,
    volumeMeter: createProgressBar(snapshot.volume / 100, 15),
  };
}
