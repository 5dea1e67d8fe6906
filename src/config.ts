import dotenv from 'dotenv';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { clampTempoBpm, clampVolume, normalizeRandomSpread } from './metronome-state';
import type { SoundBank } from './sound-bank';
import { parseAudioPlayerCommand, type AudioPlayerCommand } from './system-audio-player';
import { DEFAULT_RANDOM_SPREAD, DEFAULT_SOUND_INDEX, DEFAULT_TEMPO_BPM, DEFAULT_VOLUME } from './constants';

export interface MetronomeConfig {
  tempoBpm: number;
  volume: number;
  soundIndex: number;
  randomMode: boolean;
  randomSpread: number;
  /** Null selects the platform's default player. */
  player: AudioPlayerCommand | null;
  mute: boolean;
  showHelp: boolean;
}

export interface ResolveMetronomeConfigInput {
  argv: string[];
  env: NodeJS.ProcessEnv;
  soundBank: SoundBank;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', '']);

/** Loads `.env` from the working directory into `process.env` without overriding existing variables. */
export function loadEnvFile(cwd = process.cwd()) {
  dotenv.config({ path: path.resolve(cwd, '.env') });
}

function parseNumberSetting(raw: string | undefined, label: string) {
  if (raw === undefined) return undefined;
  const value = Number(raw.trim());
  if (raw.trim().length === 0 || !Number.isFinite(value)) {
    throw new Error(`${label} must be a number, got "${raw}".`);
  }
  return value;
}

function parseBooleanSetting(raw: string | undefined, label: string) {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new Error(`${label} must be true or false, got "${raw}".`);
}

function parseSoundSetting(raw: string | undefined, soundBank: SoundBank) {
  if (raw === undefined) return DEFAULT_SOUND_INDEX;
  const byName = soundBank.indexOf(raw);
  if (byName !== -1) return byName;

  const asIndex = Number(raw.trim());
  if (Number.isInteger(asIndex) && asIndex >= 0 && asIndex < soundBank.count()) return asIndex;

  const available = soundBank
    .list()
    .map((sound) => sound.id)
    .join(', ');
  throw new Error(`Unknown sound "${raw}". Available sounds: ${available}.`);
}

/** Command-line flags win over environment variables, which win over defaults. */
export function resolveMetronomeConfig({ argv, env, soundBank }: ResolveMetronomeConfigInput): MetronomeConfig {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      bpm: { type: 'string', short: 'b' },
      volume: { type: 'string' },
      sound: { type: 'string', short: 's' },
      spread: { type: 'string' },
      random: { type: 'boolean', short: 'r' },
      player: { type: 'string' },
      mute: { type: 'boolean', short: 'm' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const tempoBpm = parseNumberSetting(values.bpm ?? env.METRONOME_BPM, 'BPM');
  const volume = parseNumberSetting(values.volume ?? env.METRONOME_VOLUME, 'Volume');
  const randomSpread = parseNumberSetting(values.spread ?? env.METRONOME_RANDOM_SPREAD, 'Random spread');
  const playerLine = values.player ?? env.METRONOME_PLAYER;

  return {
    tempoBpm: clampTempoBpm(tempoBpm ?? DEFAULT_TEMPO_BPM),
    volume: clampVolume(volume ?? DEFAULT_VOLUME),
    soundIndex: parseSoundSetting(values.sound ?? env.METRONOME_SOUND, soundBank),
    randomMode: values.random ?? parseBooleanSetting(env.METRONOME_RANDOM, 'METRONOME_RANDOM') ?? false,
    randomSpread: normalizeRandomSpread(randomSpread ?? DEFAULT_RANDOM_SPREAD),
    player: playerLine === undefined ? null : parseAudioPlayerCommand(playerLine),
    mute: values.mute ?? parseBooleanSetting(env.METRONOME_MUTE, 'METRONOME_MUTE') ?? false,
    showHelp: values.help ?? false,
  };
}

export function formatUsage(soundBank: SoundBank) {
  const sounds = soundBank
    .list()
    .map((sound) => sound.id)
    .join(', ');
  return [
    'Usage: metronome [options]',
    '',
    'Options:',
    '  -b, --bpm <n>        Starting tempo, 20-400 (env METRONOME_BPM)',
    '      --volume <n>     Starting volume, 0-100 (env METRONOME_VOLUME)',
    `  -s, --sound <id>     Starting sound: ${sounds} (env METRONOME_SOUND)`,
    '      --spread <n>     Random mode spread in BPM (env METRONOME_RANDOM_SPREAD)',
    '  -r, --random         Start with random mode on (env METRONOME_RANDOM)',
    '      --player <cmd>   Audio player command line (env METRONOME_PLAYER)',
    '  -m, --mute           Run without audio (env METRONOME_MUTE)',
    '  -h, --help           Show this help',
  ].join('\n');
}
