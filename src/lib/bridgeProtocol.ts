import { clamp } from '@/lib/math';
import type {
  BridgeAction,
  BridgeEvent,
  BridgeMessage,
  NavigationDirection,
  ReaderLocation,
  ReaderTheme
} from '@/types/bridge';

export const READER_THEMES: readonly ReaderTheme[] = ['light', 'dark', 'sepia'];

const GATED_ACTIONS = new Set<BridgeAction>(['loadEpub', 'next', 'prev', 'fontSize', 'theme', 'search']);

export function requiresReady(message: BridgeMessage) {
  return GATED_ACTIONS.has(message.action);
}

export function isReaderTheme(value: unknown): value is ReaderTheme {
  return typeof value === 'string' && READER_THEMES.some((theme) => theme === value);
}

export const bridgeMessages = {
  loadEpub: (url: string): BridgeMessage => ({ action: 'loadEpub', url }),
  next: (): BridgeMessage => ({ action: 'next' }),
  prev: (): BridgeMessage => ({ action: 'prev' }),
  fontSize: (size: number): BridgeMessage => ({ action: 'fontSize', size: Math.round(size) }),
  theme: (theme: ReaderTheme): BridgeMessage => ({ action: 'theme', theme }),
  search: (query: string): BridgeMessage => ({ action: 'search', query }),
  ping: (): BridgeMessage => ({ action: 'ping' })
};

export function describeMessage(message: BridgeMessage) {
  switch (message.action) {
    case 'loadEpub':
      return `loadEpub ${message.url}`;
    case 'fontSize':
      return `fontSize ${message.size}px`;
    case 'theme':
      return `theme ${message.theme}`;
    case 'search':
      return `search "${message.query}"`;
    default:
      return message.action;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLocation(value: unknown): ReaderLocation | null {
  if (!isRecord(value) || typeof value.href !== 'string') {
    return null;
  }
  const { progression } = value;
  if (progression === undefined || progression === null) {
    return { href: value.href, progression: 0 };
  }
  if (typeof progression !== 'number' || !Number.isFinite(progression)) {
    return null;
  }
  return { href: value.href, progression: clamp(progression, 0, 1) };
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isDirection(value: unknown): value is NavigationDirection {
  return value === 'next' || value === 'prev';
}

/**
 * Validates a value received from the frame. Returns null for anything that
 * is not a record with a string `type`, or whose fields do not match the
 * variant named by `type`. Unrecognised types come back as `unknown`.
 */
export function parseBridgeEvent(raw: unknown): BridgeEvent | null {
  if (!isRecord(raw)) {
    return null;
  }
  const { type } = raw;
  if (typeof type !== 'string') {
    return null;
  }

  switch (type) {
    case 'status':
      return typeof raw.message === 'string' ? { type: 'status', message: raw.message } : null;
    case 'error':
      return typeof raw.message === 'string' ? { type: 'error', message: raw.message } : null;
    case 'initFailed':
      return typeof raw.message === 'string' ? { type: 'initFailed', message: raw.message } : null;
    case 'initialized':
      return { type: 'initialized' };
    case 'pong':
      return { type: 'pong' };
    case 'ready':
      return { type: 'ready' };
    case 'locationChanged': {
      const location = parseLocation(raw.location);
      return location ? { type: 'locationChanged', location } : null;
    }
    case 'selection':
      return typeof raw.text === 'string' ? { type: 'selection', text: raw.text } : null;
    case 'searchResults':
      if (typeof raw.query !== 'string' || !isCount(raw.count)) {
        return null;
      }
      return { type: 'searchResults', query: raw.query, count: raw.count };
    case 'navigationEdge':
      return isDirection(raw.direction) ? { type: 'navigationEdge', direction: raw.direction } : null;
    default:
      return { type: 'unknown', rawType: type };
  }
}
