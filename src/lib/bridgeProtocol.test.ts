import { describe, expect, it } from 'vitest';
import {
  bridgeMessages,
  describeMessage,
  isReaderTheme,
  parseBridgeEvent,
  requiresReady
} from '@/lib/bridgeProtocol';

describe('parseBridgeEvent', () => {
  it('accepts every known event', () => {
    expect(parseBridgeEvent({ type: 'status', message: 'Frame loaded' })).toEqual({
      type: 'status',
      message: 'Frame loaded'
    });
    expect(parseBridgeEvent({ type: 'initialized' })).toEqual({ type: 'initialized' });
    expect(parseBridgeEvent({ type: 'pong' })).toEqual({ type: 'pong' });
    expect(parseBridgeEvent({ type: 'ready' })).toEqual({ type: 'ready' });
    expect(parseBridgeEvent({ type: 'initFailed', message: 'epub.js missing' })).toEqual({
      type: 'initFailed',
      message: 'epub.js missing'
    });
    expect(parseBridgeEvent({ type: 'searchResults', query: 'whale', count: 0 })).toEqual({
      type: 'searchResults',
      query: 'whale',
      count: 0
    });
    expect(parseBridgeEvent({ type: 'error', message: 'boom' })).toEqual({ type: 'error', message: 'boom' });
    expect(parseBridgeEvent({ type: 'selection', text: 'Ishmael' })).toEqual({ type: 'selection', text: 'Ishmael' });
    expect(parseBridgeEvent({ type: 'searchResults', query: 'whale', count: 2 })).toEqual({
      type: 'searchResults',
      query: 'whale',
      count: 2
    });
    expect(parseBridgeEvent({ type: 'navigationEdge', direction: 'prev' })).toEqual({
      type: 'navigationEdge',
      direction: 'prev'
    });
  });

  it('parses locations and fills in a missing progression', () => {
    expect(
      parseBridgeEvent({ type: 'locationChanged', location: { href: 'chap3.xhtml', progression: 0.42 } })
    ).toEqual({ type: 'locationChanged', location: { href: 'chap3.xhtml', progression: 0.42 } });
    expect(parseBridgeEvent({ type: 'locationChanged', location: { href: 'chap1.xhtml' } })).toEqual({
      type: 'locationChanged',
      location: { href: 'chap1.xhtml', progression: 0 }
    });
    expect(
      parseBridgeEvent({ type: 'locationChanged', location: { href: 'chap1.xhtml', progression: null } })
    ).toEqual({ type: 'locationChanged', location: { href: 'chap1.xhtml', progression: 0 } });
  });

  it('clamps progression into [0, 1]', () => {
    expect(parseBridgeEvent({ type: 'locationChanged', location: { href: 'end.xhtml', progression: 1.4 } })).toEqual(
      { type: 'locationChanged', location: { href: 'end.xhtml', progression: 1 } }
    );
    expect(parseBridgeEvent({ type: 'locationChanged', location: { href: 'a.xhtml', progression: -2 } })).toEqual({
      type: 'locationChanged',
      location: { href: 'a.xhtml', progression: 0 }
    });
  });

  it('rejects values that are not event records', () => {
    expect(parseBridgeEvent(null)).toBeNull();
    expect(parseBridgeEvent('initialized')).toBeNull();
    expect(parseBridgeEvent(['initialized'])).toBeNull();
    expect(parseBridgeEvent({ action: 'next' })).toBeNull();
    expect(parseBridgeEvent({ type: 7 })).toBeNull();
  });

  it('rejects known events with the wrong fields', () => {
    expect(parseBridgeEvent({ type: 'status' })).toBeNull();
    expect(parseBridgeEvent({ type: 'error', message: 42 })).toBeNull();
    expect(parseBridgeEvent({ type: 'locationChanged' })).toBeNull();
    expect(parseBridgeEvent({ type: 'locationChanged', location: { href: 3 } })).toBeNull();
    expect(parseBridgeEvent({ type: 'locationChanged', location: { href: 'a', progression: '0.5' } })).toBeNull();
    expect(parseBridgeEvent({ type: 'locationChanged', location: { href: 'a', progression: Number.NaN } })).toBeNull();
    expect(parseBridgeEvent({ type: 'searchResults', query: 'whale' })).toBeNull();
    expect(parseBridgeEvent({ type: 'searchResults', query: 'whale', count: Number.NaN })).toBeNull();
    expect(parseBridgeEvent({ type: 'searchResults', query: 'whale', count: -1 })).toBeNull();
    expect(parseBridgeEvent({ type: 'searchResults', query: 'whale', count: 2.5 })).toBeNull();
    expect(parseBridgeEvent({ type: 'initFailed' })).toBeNull();
    expect(parseBridgeEvent({ type: 'navigationEdge', direction: 'up' })).toBeNull();
  });

  it('reports unrecognised types as unknown', () => {
    expect(parseBridgeEvent({ type: 'bookmarkAdded' })).toEqual({ type: 'unknown', rawType: 'bookmarkAdded' });
  });
});

describe('bridgeMessages', () => {
  it('builds flat records with an action discriminator', () => {
    expect(bridgeMessages.loadEpub('https://example.com/a.epub')).toEqual({
      action: 'loadEpub',
      url: 'https://example.com/a.epub'
    });
    expect(bridgeMessages.theme('dark')).toEqual({ action: 'theme', theme: 'dark' });
    expect(bridgeMessages.ping()).toEqual({ action: 'ping' });
  });

  it('rounds font sizes to whole pixels', () => {
    expect(bridgeMessages.fontSize(17.6)).toEqual({ action: 'fontSize', size: 18 });
  });
});

describe('requiresReady', () => {
  it('gates every command except ping', () => {
    expect(requiresReady(bridgeMessages.loadEpub('x'))).toBe(true);
    expect(requiresReady(bridgeMessages.next())).toBe(true);
    expect(requiresReady(bridgeMessages.prev())).toBe(true);
    expect(requiresReady(bridgeMessages.fontSize(18))).toBe(true);
    expect(requiresReady(bridgeMessages.theme('sepia'))).toBe(true);
    expect(requiresReady(bridgeMessages.search('whale'))).toBe(true);
    expect(requiresReady(bridgeMessages.ping())).toBe(false);
  });
});

describe('describeMessage', () => {
  it('includes the payload', () => {
    expect(describeMessage(bridgeMessages.fontSize(20))).toBe('fontSize 20px');
    expect(describeMessage(bridgeMessages.search('white whale'))).toBe('search "white whale"');
    expect(describeMessage(bridgeMessages.next())).toBe('next');
  });
});

describe('isReaderTheme', () => {
  it('accepts only the three themes', () => {
    expect(isReaderTheme('sepia')).toBe(true);
    expect(isReaderTheme('solarized')).toBe(false);
    expect(isReaderTheme(undefined)).toBe(false);
  });
});
