import { spawn } from 'node:child_process';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { TICK_SAMPLE_RATE } from './constants';
import { applyTickVolume, renderTickSamples } from './dsp/tick-synthesis';
import { encodeWavPcm16 } from './dsp/wav-encoding';
import type { SoundBackend, SoundFailureReporter } from './sound-backend';
import type { SoundId } from './types';

export interface AudioPlayerCommand {
  command: string;
  args: string[];
}

interface PlayerProcessLike {
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'exit', listener: (code: number | null) => void): unknown;
  unref(): void;
}

type SpawnPlayerFn = (command: string, args: string[]) => PlayerProcessLike;

export interface SystemAudioBackendDeps {
  player: AudioPlayerCommand;
  cacheDir: string;
  onFailure: SoundFailureReporter;
  sampleRate?: number;
  spawnFn?: SpawnPlayerFn;
  writeFileFn?: (filePath: string, data: Buffer) => void;
  mkdirFn?: (dirPath: string) => void;
  removeDirFn?: (dirPath: string) => void;
}

export function resolveDefaultAudioPlayer(platform: NodeJS.Platform = process.platform): AudioPlayerCommand {
  if (platform === 'darwin') return { command: 'afplay', args: [] };
  return { command: 'aplay', args: ['-q'] };
}

/** Splits a configured player command line such as `paplay --volume 40000` on whitespace. */
export function parseAudioPlayerCommand(commandLine: string): AudioPlayerCommand | null {
  const [command, ...args] = commandLine.trim().split(/\s+/).filter(Boolean);
  if (!command) return null;
  return { command, args };
}

export function getTickFileName(soundId: SoundId, volumePercent: number) {
  return `${soundId}-${volumePercent}.wav`;
}

/**
 * Plays ticks by spawning a system audio player on a WAV file rendered per sound and volume.
 * After the first failure (the player cannot start or exits with a non-zero code) the backend goes quiet
 * and ticks continue silently.
 */
export function createSystemAudioBackend({
  player,
  cacheDir,
  onFailure,
  sampleRate = TICK_SAMPLE_RATE,
  spawnFn = (command, args) => spawn(command, args, { stdio: 'ignore' }),
  writeFileFn = (filePath, data) => writeFileSync(filePath, data),
  mkdirFn = (dirPath) => mkdirSync(dirPath, { recursive: true }),
  removeDirFn = (dirPath) => rmSync(dirPath, { recursive: true, force: true }),
}: SystemAudioBackendDeps): SoundBackend {
  const renderedFiles = new Map<string, string>();
  let isUnavailable = false;
  let hasCacheDir = false;

  function markUnavailable(error: unknown) {
    if (isUnavailable) return;
    isUnavailable = true;
    onFailure(error);
  }

  function ensureTickFile(soundId: SoundId, volumePercent: number) {
    const fileName = getTickFileName(soundId, volumePercent);
    const cached = renderedFiles.get(fileName);
    if (cached) return cached;

    if (!hasCacheDir) {
      mkdirFn(cacheDir);
      hasCacheDir = true;
    }
    const samples = applyTickVolume(renderTickSamples(soundId, { sampleRate }), volumePercent);
    const filePath = path.join(cacheDir, fileName);
    writeFileFn(filePath, encodeWavPcm16(samples, sampleRate));
    renderedFiles.set(fileName, filePath);
    return filePath;
  }

  return {
    play(soundId, volumePercent) {
      if (isUnavailable || volumePercent <= 0) return;

      try {
        const filePath = ensureTickFile(soundId, volumePercent);
        const child = spawnFn(player.command, [...player.args, filePath]);
        child.on('error', markUnavailable);
        child.on('exit', (code) => {
          if (code !== null && code !== 0) {
            markUnavailable(new Error(`${player.command} exited with code ${code}`));
          }
        });
        child.unref();
      } catch (error) {
        markUnavailable(error);
      }
    },
    dispose() {
      renderedFiles.clear();
      if (hasCacheDir) {
        removeDirFn(cacheDir);
        hasCacheDir = false;
      }
    },
  };
}
