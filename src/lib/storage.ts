import { isReaderTheme } from '@/lib/bridgeProtocol';
import { clampFontSize } from '@/lib/math';
import { isRendererBackendId } from '@/lib/renderers';
import type { ReaderPreferences } from '@/types/app';

const PREFERENCES_KEY = 'epub-frame-reader:preferences';
const LAST_URL_KEY = 'epub-frame-reader:lastPublication';

function readJson(key: string): unknown {
  if (typeof window === 'undefined') {
    return null;
  }
  try {
    const raw = window.localStorage.getItem(key);
    if (!raw) {
      return null;
    }
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function writeJson<T>(key: string, value: T) {
  if (typeof window === 'undefined') {
    return;
  }
  try {
    window.localStorage.setItem(key, JSON.stringify(value));
  } catch {
    // ignore persistence errors
  }
}

export function loadPreferences(defaults: ReaderPreferences): ReaderPreferences {
  const stored = readJson(PREFERENCES_KEY);
  if (typeof stored !== 'object' || stored === null) {
    return defaults;
  }
  const theme = 'theme' in stored ? stored.theme : undefined;
  const fontSize = 'fontSize' in stored ? stored.fontSize : undefined;
  const backend = 'backend' in stored ? stored.backend : undefined;
  return {
    theme: isReaderTheme(theme) ? theme : defaults.theme,
    fontSize: typeof fontSize === 'number' ? clampFontSize(fontSize) : defaults.fontSize,
    backend: isRendererBackendId(backend) ? backend : defaults.backend
  };
}

export function savePreferences(preferences: ReaderPreferences) {
  writeJson(PREFERENCES_KEY, preferences);
}

export function loadLastPublication(): string | null {
  const url = readJson(LAST_URL_KEY);
  return typeof url === 'string' && url ? url : null;
}

export function saveLastPublication(url: string) {
  writeJson(LAST_URL_KEY, url);
}
