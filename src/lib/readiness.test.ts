import { describe, expect, it } from 'vitest';
import { describeReadiness, isBusy, transition } from '@/lib/readiness';
import type { ReadinessSignal, ReadinessState } from '@/types/bridge';

describe('transition', () => {
  it.each<[ReadinessState, ReadinessSignal, ReadinessState]>([
    ['uninitialized', 'frameCreated', 'frameCreated'],
    ['frameCreated', 'settled', 'handshakePending'],
    ['handshakePending', 'initialized', 'ready'],
    ['handshakePending', 'pong', 'ready'],
    ['frameCreated', 'initialized', 'ready'],
    ['handshakePending', 'deadlineExpired', 'failed'],
    ['frameCreated', 'constructionFailed', 'failed'],
    ['ready', 'reset', 'uninitialized'],
    ['failed', 'reset', 'uninitialized']
  ])('%s + %s -> %s', (state, signal, expected) => {
    expect(transition(state, signal)).toBe(expected);
  });

  it.each<[ReadinessState, ReadinessSignal]>([
    ['uninitialized', 'initialized'],
    ['uninitialized', 'pong'],
    ['uninitialized', 'settled'],
    ['failed', 'pong'],
    ['failed', 'initialized'],
    ['ready', 'deadlineExpired'],
    ['ready', 'settled'],
    ['frameCreated', 'deadlineExpired']
  ])('leaves %s unchanged on %s', (state, signal) => {
    expect(transition(state, signal)).toBe(state);
  });
});

describe('isBusy', () => {
  it('is false only once the handshake has finished either way', () => {
    expect(isBusy('uninitialized')).toBe(true);
    expect(isBusy('frameCreated')).toBe(true);
    expect(isBusy('handshakePending')).toBe(true);
    expect(isBusy('ready')).toBe(false);
    expect(isBusy('failed')).toBe(false);
  });
});

describe('describeReadiness', () => {
  it('labels the waiting states', () => {
    expect(describeReadiness('handshakePending')).toBe('Waiting for reader…');
    expect(describeReadiness('failed')).toBe('Unavailable');
  });
});
