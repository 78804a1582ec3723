import type { ReadinessSignal, ReadinessState } from '@/types/bridge';

export const SETTLE_DELAY_MS = 500;
export const PING_DELAY_MS = 100;
export const HANDSHAKE_TIMEOUT_MS = 10_000;

/**
 * Readiness handshake. Signals that do not apply to the current state leave
 * it unchanged; `failed` is only left through `reset`.
 */
export function transition(state: ReadinessState, signal: ReadinessSignal): ReadinessState {
  switch (signal) {
    case 'reset':
      return 'uninitialized';
    case 'constructionFailed':
      return 'failed';
    case 'frameCreated':
      return state === 'uninitialized' ? 'frameCreated' : state;
    case 'settled':
      return state === 'frameCreated' ? 'handshakePending' : state;
    case 'initialized':
    case 'pong':
      return state === 'frameCreated' || state === 'handshakePending' ? 'ready' : state;
    case 'deadlineExpired':
      return state === 'handshakePending' ? 'failed' : state;
  }
}

export function isBusy(state: ReadinessState) {
  return state !== 'ready' && state !== 'failed';
}

export function describeReadiness(state: ReadinessState) {
  switch (state) {
    case 'uninitialized':
      return 'Starting…';
    case 'frameCreated':
      return 'Loading reader…';
    case 'handshakePending':
      return 'Waiting for reader…';
    case 'ready':
      return 'Ready';
    case 'failed':
      return 'Unavailable';
  }
}
