import type { StatusMessage } from './app-feedback';
import { RENDER_INTERVAL_MS } from './constants';
import { KEY_BINDING_HELP } from './key-bindings';
import { computeMetronomeView, type TempoTone } from './metronome-view';
import type { MetronomeSnapshot, SoundDefinition } from './types';

const ESC = '\x1b[';
const ANSI = {
  reset: `${ESC}0m`,
  bold: `${ESC}1m`,
  red: `${ESC}31m`,
  green: `${ESC}32m`,
  yellow: `${ESC}33m`,
  magenta: `${ESC}35m`,
  cyan: `${ESC}36m`,
  white: `${ESC}37m`,
  grey: `${ESC}90m`,
  home: `${ESC}H`,
  clearLine: `${ESC}K`,
  clearBelow: `${ESC}J`,
  clearScreen: `${ESC}2J`,
  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,
} as const;

type AnsiColor = 'red' | 'green' | 'yellow' | 'magenta' | 'cyan' | 'white' | 'grey';

const TEMPO_TONE_COLORS: Record<TempoTone, AnsiColor> = {
  calm: 'green',
  brisk: 'yellow',
  fast: 'red',
};

export interface ScreenFormatOptions {
  sounds: readonly SoundDefinition[];
  status: StatusMessage | null;
  color: boolean;
}

export function formatMetronomeScreen(snapshot: MetronomeSnapshot, { sounds, status, color }: ScreenFormatOptions) {
  const paint = (text: string, tone: AnsiColor, bold = false) =>
    color ? `${bold ? ANSI.bold : ''}${ANSI[tone]}${text}${ANSI.reset}` : text;
  const view = computeMetronomeView(snapshot);
  const divider = '='.repeat(60);

  const lines = [
    paint('♪ CLI METRONOME ♪', 'magenta', true),
    paint(divider, 'cyan'),
    '',
    `${paint(view.tempoText, 'yellow', true)}   ${paint(view.tempoMeter, TEMPO_TONE_COLORS[view.tempoTone])}`,
    `${paint('Sound:', 'magenta', true)} ${view.soundText}`,
    view.isPlaying ? paint(view.statusText, 'green', true) : paint(view.statusText, 'red', true),
    view.beatIndicator ? paint(view.beatIndicator, 'green') : '',
    `${paint(view.randomText, view.isRandom ? 'yellow' : 'grey', true)}   ${view.randomDetailText}`,
    `${paint(view.volumeText, 'cyan', true)}   ${paint(view.volumeMeter, 'cyan')}`,
    '',
    paint('CONTROLS', 'yellow', true),
    ...KEY_BINDING_HELP.map(
      ({ keys, description }) => `  ${paint(keys.padEnd(12, ' '), 'white')} - ${paint(description, 'grey')}`
    ),
    '',
    `${paint('SOUNDS', 'cyan', true)}  ${sounds.map((sound) => `${sound.icon} ${sound.name}`).join('  ')}`,
    paint(divider, 'cyan'),
  ];

  if (status) {
    lines.push(status.tone === 'error' ? paint(status.text, 'red') : status.text);
  }
  return lines;
}

export interface TerminalOutput {
  write(chunk: string): unknown;
}

export interface TerminalRendererDeps {
  output: TerminalOutput;
  getSnapshot: () => MetronomeSnapshot;
  getStatus: () => StatusMessage | null;
  sounds: readonly SoundDefinition[];
  color?: boolean;
  intervalMs?: number;
  setIntervalFn?: (callback: () => void, intervalMs: number) => ReturnType<typeof setInterval>;
  clearIntervalFn?: (id: ReturnType<typeof setInterval>) => void;
}

export interface TerminalRenderer {
  start(): void;
  /** Redraws immediately when the screen text changed since the last frame. */
  render(): void;
  stop(): void;
}

export function createTerminalRenderer({
  output,
  getSnapshot,
  getStatus,
  sounds,
  color = true,
  intervalMs = RENDER_INTERVAL_MS,
  setIntervalFn = (callback, ms) => setInterval(callback, ms),
  clearIntervalFn = (id) => clearInterval(id),
}: TerminalRendererDeps): TerminalRenderer {
  let timerId: ReturnType<typeof setInterval> | null = null;
  let lastFrame: string | null = null;

  function render() {
    const lines = formatMetronomeScreen(getSnapshot(), { sounds, status: getStatus(), color });
    const frame = lines.map((line) => `${line}${ANSI.clearLine}`).join('\r\n');
    if (frame === lastFrame) return;
    lastFrame = frame;
    output.write(`${ANSI.home}${frame}\r\n${ANSI.clearBelow}`);
  }

  return {
    start() {
      if (timerId !== null) return;
      output.write(`${ANSI.hideCursor}${ANSI.clearScreen}`);
      lastFrame = null;
      render();
      timerId = setIntervalFn(render, intervalMs);
    },
    render,
    stop() {
      if (timerId === null) return;
      clearIntervalFn(timerId);
      timerId = null;
      output.write(`${ANSI.clearScreen}${ANSI.home}${ANSI.showCursor}`);
    },
  };
}
