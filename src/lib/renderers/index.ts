import { epubjsBackend } from '@/lib/renderers/epubjs';
import { readiumBackend } from '@/lib/renderers/readium';
import type { RendererBackend } from '@/lib/renderers/types';
import type { RendererBackendId } from '@/types/bridge';

export const RENDERER_BACKENDS: Record<RendererBackendId, RendererBackend> = {
  epubjs: epubjsBackend,
  readium: readiumBackend
};

export const RENDERER_BACKEND_IDS: readonly RendererBackendId[] = ['epubjs', 'readium'];

export function isRendererBackendId(value: unknown): value is RendererBackendId {
  return typeof value === 'string' && RENDERER_BACKEND_IDS.some((id) => id === value);
}

export function getRendererBackend(id: RendererBackendId): RendererBackend {
  return RENDERER_BACKENDS[id];
}

export type { RendererBackend } from '@/lib/renderers/types';
