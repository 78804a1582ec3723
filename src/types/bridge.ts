export type ReaderTheme = 'light' | 'dark' | 'sepia';

export type RendererBackendId = 'epubjs' | 'readium';

export type NavigationDirection = 'next' | 'prev';

export type BridgeMessage =
  | { action: 'loadEpub'; url: string }
  | { action: 'next' }
  | { action: 'prev' }
  | { action: 'fontSize'; size: number }
  | { action: 'theme'; theme: ReaderTheme }
  | { action: 'search'; query: string }
  | { action: 'ping' };

export type BridgeAction = BridgeMessage['action'];

export interface ReaderLocation {
  href: string;
  progression: number;
}

export type BridgeEvent =
  | { type: 'status'; message: string }
  | { type: 'initialized' }
  | { type: 'pong' }
  | { type: 'initFailed'; message: string }
  | { type: 'ready' }
  | { type: 'error'; message: string }
  | { type: 'locationChanged'; location: ReaderLocation }
  | { type: 'selection'; text: string }
  | { type: 'searchResults'; query: string; count: number }
  | { type: 'navigationEdge'; direction: NavigationDirection }
  | { type: 'unknown'; rawType: string };

export type BridgeEventType = BridgeEvent['type'];

export type ReadinessState = 'uninitialized' | 'frameCreated' | 'handshakePending' | 'ready' | 'failed';

export type ReadinessSignal =
  | 'frameCreated'
  | 'settled'
  | 'initialized'
  | 'pong'
  | 'deadlineExpired'
  | 'constructionFailed'
  | 'reset';

export interface DebugLogEntry {
  id: number;
  timestamp: number;
  message: string;
}

export interface ReaderSnapshot {
  readiness: ReadinessState;
  location: ReaderLocation | null;
  progress: number;
  chapter: string | null;
  lastError: string | null;
  fatalError: string | null;
  publicationLoading: boolean;
  publicationUrl: string | null;
  selection: string | null;
  debugLog: readonly DebugLogEntry[];
}
