/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import os from 'node:os';
import path from 'node:path';
import { createAppFeedback, formatUserFacingError } from './app-feedback';
import { createSystemClock } from './clock-source';
import { createCommandChannel } from './command-channel';
import { formatUsage, loadEnvFile, resolveMetronomeConfig, type MetronomeConfig } from './config';
import { describeMetronomeCommand, quit } from './metronome-commands';
import { createInitialMetronomeState } from './metronome-state';
import { createRandomTempoPolicy } from './random-tempo-policy';
import {
  createBestEffortSoundBackend,
  createSilentSoundBackend,
  createSoundFailureReporter,
  type SoundBackend,
  type SoundFailureReporter,
} from './sound-backend';
import { createSoundBank } from './sound-bank';
import { createSystemAudioBackend, resolveDefaultAudioPlayer } from './system-audio-player';
import { attachTerminalInput, enableKeypressEvents } from './terminal-input';
import { createTerminalRenderer } from './terminal-renderer';
import { createTickScheduler } from './tick-scheduler';

function createSoundBackend(config: MetronomeConfig, reportFailure: SoundFailureReporter): SoundBackend {
  if (config.mute) return createSilentSoundBackend();
  const backend = createSystemAudioBackend({
    player: config.player ?? resolveDefaultAudioPlayer(),
    cacheDir: path.join(os.tmpdir(), `metronome-ticks-${process.pid}`),
    onFailure: reportFailure,
  });
  return createBestEffortSoundBackend(backend, reportFailure);
}

async function main() {
  loadEnvFile();
  const soundBank = createSoundBank();
  const config = resolveMetronomeConfig({ argv: process.argv.slice(2), env: process.env, soundBank });
  if (config.showHelp) {
    console.log(formatUsage(soundBank));
    return;
  }
  if (!process.stdin.isTTY) {
    throw new Error('An interactive terminal is required for keyboard control.');
  }

  const feedback = createAppFeedback();
  const logWarn = (message: string) => feedback.showNonBlockingError(message);
  const logToStatus = (...args: unknown[]) =>
    logWarn(args.map((arg) => (arg instanceof Error ? arg.message : String(arg))).join(' '));
  const reportSoundFailure = createSoundFailureReporter((error) => {
    logWarn(formatUserFacingError('[sound] Audio unavailable, ticks continue silently', error));
  });
  const soundBackend = createSoundBackend(config, reportSoundFailure);
  if (config.mute) feedback.showNonBlockingInfo('[sound] Muted, ticks are shown only.');

  const channel = createCommandChannel({
    onOverflow: (dropped) => logWarn(`[channel] Input queue full, dropped ${describeMetronomeCommand(dropped)}.`),
  });
  const scheduler = createTickScheduler({
    channel,
    clock: createSystemClock(),
    soundBank,
    soundBackend,
    randomTempoPolicy: createRandomTempoPolicy(),
    initialState: createInitialMetronomeState(soundBank.count(), config),
    logError: logToStatus,
  });
  const renderer = createTerminalRenderer({
    output: process.stdout,
    getSnapshot: scheduler.getSnapshot,
    getStatus: feedback.getVisibleStatus,
    sounds: soundBank.list(),
    color: process.stdout.isTTY,
  });

  enableKeypressEvents(process.stdin);
  const detachInput = attachTerminalInput({ input: process.stdin, channel });
  const requestQuit = () => channel.push(quit());
  process.once('SIGTERM', requestQuit);
  renderer.start();
  const unsubscribeSnapshot = scheduler.subscribeSnapshot(() => renderer.render());
  const unsubscribeStatus = feedback.statusSignal.subscribe(() => renderer.render());

  try {
    await scheduler.run();
  } finally {
    unsubscribeSnapshot();
    unsubscribeStatus();
    process.off('SIGTERM', requestQuit);
    detachInput();
    renderer.stop();
    soundBackend.dispose?.();
  }

  console.log('\n* ======================================= *');
  console.log('   Thank you for using CLI Metronome!');
  console.log('   Keep the rhythm alive! ♪');
  console.log('* ======================================= *\n');
}

main().catch((error: unknown) => {
  console.error(formatUserFacingError('Metronome failed', error));
  process.exitCode = 1;
});
