import { isRendererBackendId } from '@/lib/renderers';
import type { AppConfig } from '@/types/app';

export const DEFAULT_CONFIG: AppConfig = {
  backend: 'epubjs',
  defaultPublicationUrl: 'https://s3.amazonaws.com/moby-dick/moby-dick.epub',
  epubjsScriptUrl: 'https://cdn.jsdelivr.net/npm/epubjs@0.3.93/dist/epub.min.js',
  jszipScriptUrl: 'https://cdn.jsdelivr.net/npm/jszip@3.10.1/dist/jszip.min.js',
  readiumScriptUrl: 'https://cdn.jsdelivr.net/npm/@readium/navigator-html-injectables/dist/index.js'
};

type EnvSource = Record<string, string | boolean | undefined>;

function readString(env: EnvSource, key: string, fallback: string) {
  const value = env[key];
  if (typeof value !== 'string') {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : fallback;
}

export function resolveConfig(env: EnvSource): AppConfig {
  const backend = readString(env, 'VITE_READER_BACKEND', DEFAULT_CONFIG.backend);
  return {
    backend: isRendererBackendId(backend) ? backend : DEFAULT_CONFIG.backend,
    defaultPublicationUrl: readString(env, 'VITE_DEFAULT_PUBLICATION_URL', DEFAULT_CONFIG.defaultPublicationUrl),
    epubjsScriptUrl: readString(env, 'VITE_EPUBJS_SCRIPT_URL', DEFAULT_CONFIG.epubjsScriptUrl),
    jszipScriptUrl: readString(env, 'VITE_JSZIP_SCRIPT_URL', DEFAULT_CONFIG.jszipScriptUrl),
    readiumScriptUrl: readString(env, 'VITE_READIUM_SCRIPT_URL', DEFAULT_CONFIG.readiumScriptUrl)
  };
}

export const appConfig = resolveConfig(import.meta.env);
