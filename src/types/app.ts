import type { ReaderTheme, RendererBackendId } from '@/types/bridge';

export interface ToastMessage {
  id: string;
  message: string;
  kind?: 'info' | 'success' | 'error';
  expiresAt: number;
}

export type NoticeKind = NonNullable<ToastMessage['kind']>;

export interface ReaderPreferences {
  theme: ReaderTheme;
  fontSize: number;
  backend: RendererBackendId;
}

export interface AppConfig {
  backend: RendererBackendId;
  defaultPublicationUrl: string;
  epubjsScriptUrl: string;
  jszipScriptUrl: string;
  readiumScriptUrl: string;
}
