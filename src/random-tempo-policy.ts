import { MAX_TEMPO_BPM, MIN_TEMPO_BPM } from './constants';
import { clampTempoBpm } from './metronome-state';

export interface RandomTempoRange {
  minBpm: number;
  maxBpm: number;
}

export interface RandomTempoPolicy {
  /**
   * Draws the next tempo around `baselineBpm`. The scheduler passes the tempo in effect at draw time,
   * so successive draws form a bounded random walk rather than samples around a fixed anchor.
   */
  next(baselineBpm: number, spread: number): number;
}

interface RandomTempoPolicyDeps {
  random?: () => number;
}

export function getRandomTempoRange(baselineBpm: number, spread: number): RandomTempoRange {
  const baseline = clampTempoBpm(baselineBpm);
  const safeSpread = Number.isFinite(spread) ? Math.max(0, Math.round(spread)) : 0;
  return {
    minBpm: Math.max(MIN_TEMPO_BPM, baseline - safeSpread),
    maxBpm: Math.min(MAX_TEMPO_BPM, baseline + safeSpread),
  };
}

export function createRandomTempoPolicy({ random = Math.random }: RandomTempoPolicyDeps = {}): RandomTempoPolicy {
  return {
    next(baselineBpm, spread) {
      const { minBpm, maxBpm } = getRandomTempoRange(baselineBpm, spread);
      if (minBpm === maxBpm) return minBpm;

      const roll = Math.min(Math.max(random(), 0), 0.999999);
      return minBpm + Math.floor(roll * (maxBpm - minBpm + 1));
    },
  };
}
