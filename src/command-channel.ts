import { COMMAND_CHANNEL_CAPACITY } from './constants';
import type { MetronomeCommand } from './types';

export interface CommandChannel {
  /** Never blocks. Ignored once the channel is closed. */
  push(command: MetronomeCommand): void;
  /** Removes and returns every pending command in arrival order. */
  drain(): MetronomeCommand[];
  /** Resolves once a command is pending, the channel closes, or `signal` aborts. */
  waitForCommand(signal?: AbortSignal): Promise<void>;
  close(): void;
  isClosed(): boolean;
  getPendingCount(): number;
}

export interface CommandChannelOptions {
  capacity?: number;
  onOverflow?: (dropped: MetronomeCommand, incoming: MetronomeCommand) => void;
}

/**
 * Picks the pending command to evict when the queue is full: the oldest of the incoming kind,
 * else the oldest that is not a quit. Returns -1 when only quit commands are pending.
 */
export function selectOverflowVictimIndex(pending: readonly MetronomeCommand[], incoming: MetronomeCommand) {
  if (incoming.kind !== 'quit') {
    const sameKindIndex = pending.findIndex((command) => command.kind === incoming.kind);
    if (sameKindIndex !== -1) return sameKindIndex;
  }
  return pending.findIndex((command) => command.kind !== 'quit');
}

export function createCommandChannel({
  capacity = COMMAND_CHANNEL_CAPACITY,
  onOverflow,
}: CommandChannelOptions = {}): CommandChannel {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`Command channel capacity must be a positive integer, got ${capacity}.`);
  }

  const pending: MetronomeCommand[] = [];
  const waiters = new Set<() => void>();
  let closed = false;

  function wakeWaiters() {
    const toWake = [...waiters];
    waiters.clear();
    toWake.forEach((wake) => wake());
  }

  return {
    push(command) {
      if (closed) return;

      if (pending.length >= capacity) {
        const victimIndex = selectOverflowVictimIndex(pending, command);
        if (victimIndex === -1 && command.kind !== 'quit') {
          onOverflow?.(command, command);
          return;
        }
        if (victimIndex !== -1) {
          const [dropped] = pending.splice(victimIndex, 1);
          onOverflow?.(dropped, command);
        }
      }

      pending.push(command);
      wakeWaiters();
    },
    drain() {
      return pending.splice(0, pending.length);
    },
    waitForCommand(signal) {
      if (pending.length > 0 || closed || signal?.aborted) return Promise.resolve();

      return new Promise<void>((resolve) => {
        const onAbort = () => {
          waiters.delete(wake);
          resolve();
        };
        const wake = () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        };
        waiters.add(wake);
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    },
    close() {
      if (closed) return;
      closed = true;
      pending.length = 0;
      wakeWaiters();
    },
    isClosed: () => closed,
    getPendingCount: () => pending.length,
  };
}
