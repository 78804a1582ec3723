import type { AppConfig } from '@/types/app';
import type { RendererBackendId } from '@/types/bridge';

export interface RendererBackend {
  id: RendererBackendId;
  label: string;
  /** Markup loaded into the reader frame through `srcdoc`. */
  buildDocument: (config: AppConfig) => string;
}
