import { TICK_SAMPLE_RATE } from '../constants';
import type { SoundId } from '../types';

export interface TickSynthesisOptions {
  sampleRate?: number;
  /** Noise source for the hi-hat, in [0, 1). */
  random?: () => number;
}

type SampleGenerator = (timeSec: number, noise: () => number) => number;

interface TimbreRecipe {
  durationMs: number;
  generate: SampleGenerator;
}

const TWO_PI = 2 * Math.PI;

function sine(timeSec: number, frequency: number) {
  return Math.sin(TWO_PI * frequency * timeSec);
}

function decay(timeSec: number, rate: number) {
  return Math.exp(-timeSec * rate);
}

function phaseOf(timeSec: number, frequency: number) {
  return (timeSec * frequency) % 1;
}

const TIMBRE_RECIPES: Record<SoundId, TimbreRecipe> = {
  beep: {
    durationMs: 50,
    generate: (t) => sine(t, 800) * 0.3,
  },
  kick: {
    durationMs: 150,
    // Pitch drops from 60 Hz as the hit decays.
    generate: (t) => sine(t, 60 * decay(t, 10)) * decay(t, 12) * 0.6,
  },
  click: {
    durationMs: 10,
    generate: (t) => sine(t, 2000) * decay(t, 50) * 0.5,
  },
  cowbell: {
    durationMs: 120,
    generate: (t) =>
      (sine(t, 800) * 0.4 + sine(t, 800 * 2.4) * 0.3 + sine(t, 800 * 3.2) * 0.2 + sine(t, 800 * 4.1) * 0.1) *
      decay(t, 8),
  },
  hihat: {
    durationMs: 60,
    generate: (t, noise) => {
      const envelope = decay(t, 25);
      return (noise() * 2 - 1) * envelope * 0.3 + sine(t, 8000) * envelope * 0.1;
    },
  },
  square: {
    durationMs: 60,
    generate: (t) => (phaseOf(t, 600) < 0.5 ? 1 : -1) * 0.3 * decay(t, 10),
  },
  triangle: {
    durationMs: 80,
    generate: (t) => {
      const phase = phaseOf(t, 800);
      return (phase < 0.5 ? 4 * phase - 1 : 3 - 4 * phase) * 0.3;
    },
  },
  woodblock: {
    durationMs: 80,
    generate: (t) => (sine(t, 1200) * 0.3 + sine(t, 800) * 0.2) * decay(t, 15),
  },
};

export function getTickDurationMs(soundId: SoundId) {
  return TIMBRE_RECIPES[soundId].durationMs;
}

/** Renders one tick of the given timbre as mono samples in [-1, 1] at full volume. */
export function renderTickSamples(soundId: SoundId, options: TickSynthesisOptions = {}): Float32Array {
  const { sampleRate = TICK_SAMPLE_RATE, random = Math.random } = options;
  const recipe = TIMBRE_RECIPES[soundId];
  const sampleCount = Math.floor((sampleRate * recipe.durationMs) / 1000);
  const samples = new Float32Array(sampleCount);

  for (let i = 0; i < sampleCount; i++) {
    samples[i] = recipe.generate(i / sampleRate, random);
  }
  return samples;
}

/** Returns a scaled copy; the input is left untouched. */
export function applyTickVolume(samples: Float32Array, volumePercent: number): Float32Array {
  const gain = Math.max(0, Math.min(100, volumePercent)) / 100;
  return samples.map((sample) => sample * gain);
}
