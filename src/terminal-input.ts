import { emitKeypressEvents } from 'node:readline';
import type { CommandChannel } from './command-channel';
import { mapKeyToCommand, type KeyPress } from './key-bindings';

type KeypressListener = (chunk: string | undefined, key: KeyPress | undefined) => void;

export interface KeypressSource {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  on(event: 'keypress', listener: KeypressListener): unknown;
  off(event: 'keypress', listener: KeypressListener): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalInputDeps {
  input: KeypressSource;
  channel: CommandChannel;
  onUnmappedKey?: (key: KeyPress) => void;
}

export function enableKeypressEvents(stream: NodeJS.ReadStream) {
  emitKeypressEvents(stream);
}

/** Starts forwarding key presses to the channel. The returned function restores the input stream. */
export function attachTerminalInput({ input, channel, onUnmappedKey }: TerminalInputDeps) {
  const canUseRawMode = Boolean(input.isTTY && input.setRawMode);

  const handleKeypress: KeypressListener = (chunk, key) => {
    const keyPress: KeyPress = key ?? { sequence: chunk };
    const command = mapKeyToCommand(keyPress);
    if (!command) {
      onUnmappedKey?.(keyPress);
      return;
    }
    channel.push(command);
  };

  if (canUseRawMode) input.setRawMode?.(true);
  input.on('keypress', handleKeypress);
  input.resume();

  let isDetached = false;
  return () => {
    if (isDetached) return;
    isDetached = true;
    input.off('keypress', handleKeypress);
    if (canUseRawMode) input.setRawMode?.(false);
    input.pause();
  };
}
