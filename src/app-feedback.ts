/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import { STATUS_MESSAGE_TTL_MS } from './constants';
import { createSignal, type Signal } from './reactive/signal';

export type StatusTone = 'neutral' | 'error';

export interface StatusMessage {
  text: string;
  tone: StatusTone;
  shownAtMs: number;
}

function getUnknownErrorMessage(error: unknown) {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }
  return 'Unknown error';
}

export function formatUserFacingError(prefix: string, error: unknown) {
  return `${prefix}: ${getUnknownErrorMessage(error)}`;
}

export interface AppFeedback {
  statusSignal: Signal<StatusMessage | null>;
  showNonBlockingError(message: string): void;
  showNonBlockingInfo(message: string): void;
  /** The current status line, or null once it is older than the display lifetime. */
  getVisibleStatus(): StatusMessage | null;
}

interface AppFeedbackDeps {
  now?: () => number;
  ttlMs?: number;
}

export function createAppFeedback({ now = () => Date.now(), ttlMs = STATUS_MESSAGE_TTL_MS }: AppFeedbackDeps = {}): AppFeedback {
  const statusSignal = createSignal<StatusMessage | null>(null);

  return {
    statusSignal,
    showNonBlockingError(message) {
      statusSignal.set({ text: message, tone: 'error', shownAtMs: now() });
    },
    showNonBlockingInfo(message) {
      statusSignal.set({ text: message, tone: 'neutral', shownAtMs: now() });
    },
    getVisibleStatus() {
      const status = statusSignal.get();
      if (!status || now() - status.shownAtMs > ttlMs) return null;
      return status;
    },
  };
}
