import { bridgeMessages, describeMessage, parseBridgeEvent, requiresReady } from '@/lib/bridgeProtocol';
import { appendDebugEntry } from '@/lib/debugLog';
import type { FrameHandle, FrameHost } from '@/lib/frameHost';
import { formatProgress } from '@/lib/math';
import { HANDSHAKE_TIMEOUT_MS, PING_DELAY_MS, SETTLE_DELAY_MS, transition } from '@/lib/readiness';
import type { RendererBackend } from '@/lib/renderers';
import type { AppConfig, NoticeKind } from '@/types/app';
import type {
  BridgeEvent,
  BridgeMessage,
  ReaderSnapshot,
  ReaderTheme,
  ReadinessSignal
} from '@/types/bridge';

export interface ReaderBridgeOptions {
  host: FrameHost;
  backend: RendererBackend;
  config: AppConfig;
  onNotice?: (message: string, kind: NoticeKind) => void;
  now?: () => number;
}

export const INITIAL_SNAPSHOT: ReaderSnapshot = {
  readiness: 'uninitialized',
  location: null,
  progress: 0,
  chapter: null,
  lastError: null,
  fatalError: null,
  publicationLoading: false,
  publicationUrl: null,
  selection: null,
  debugLog: []
};

const EDGE_NOTICES = {
  next: 'Cannot go forward - end of publication',
  prev: 'Cannot go backward - beginning of publication'
} as const;

/**
 * Owns one renderer frame. Commands go out through `send`, frame messages
 * come back through `handleMessage`, and every state change replaces the
 * snapshot returned by `getSnapshot`.
 */
export class ReaderBridge {
  private snapshot: ReaderSnapshot = INITIAL_SNAPSHOT;
  private readonly listeners = new Set<() => void>();
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private frame: FrameHandle | null = null;
  private mounted = false;

  constructor(private readonly options: ReaderBridgeOptions) {}

  subscribe = (listener: () => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = () => this.snapshot;

  initialize() {
    if (this.mounted) {
      return;
    }
    this.mounted = true;
    const { backend, config, host } = this.options;
    this.log(`Creating ${backend.label} frame`);

    try {
      this.frame = host.mount(backend.buildDocument(config), this.handleMessage);
    } catch (error) {
      console.error(error);
      const message = error instanceof Error ? error.message : 'Unable to create reader frame';
      this.teardown();
      this.apply('constructionFailed', { fatalError: `Failed to initialize reader: ${message}` });
      this.log(`Initialization failed: ${message}`);
      return;
    }

    this.apply('frameCreated');
    this.log('Frame created');
    this.schedule(SETTLE_DELAY_MS, () => this.settle());
  }

  reinitialize() {
    this.teardown();
    this.replace(INITIAL_SNAPSHOT);
    this.initialize();
  }

  dispose() {
    this.teardown();
  }

  canLoadPublication() {
    return this.mounted && this.snapshot.readiness === 'ready';
  }

  send(message: BridgeMessage): boolean {
    const description = describeMessage(message);
    if (!this.mounted || !this.frame) {
      this.log(`Dropped ${description}: no reader frame`);
      return false;
    }
    if (requiresReady(message) && this.snapshot.readiness !== 'ready') {
      this.log(`Dropped ${description}: reader not ready`);
      return false;
    }

    try {
      this.frame.post(message);
    } catch (error) {
      console.error(error);
      this.log(`Failed to send ${description}`);
      return false;
    }

    this.log(`Sent ${description}`);
    if (message.action === 'loadEpub') {
      this.update({
        publicationLoading: true,
        publicationUrl: message.url,
        lastError: null,
        location: null,
        progress: 0,
        chapter: null
      });
    }
    return true;
  }

  next() {
    return this.send(bridgeMessages.next());
  }

  prev() {
    return this.send(bridgeMessages.prev());
  }

  setFontSize(size: number) {
    return this.send(bridgeMessages.fontSize(size));
  }

  setTheme(theme: ReaderTheme) {
    return this.send(bridgeMessages.theme(theme));
  }

  loadPublication(url: string) {
    return this.send(bridgeMessages.loadEpub(url));
  }

  search(query: string) {
    return this.send(bridgeMessages.search(query));
  }

  ping() {
    return this.send(bridgeMessages.ping());
  }

  clearSelection() {
    if (this.snapshot.selection !== null) {
      this.update({ selection: null });
    }
  }

  handleMessage = (raw: unknown) => {
    if (!this.mounted) {
      return;
    }
    const event = parseBridgeEvent(raw);
    if (!event) {
      return;
    }
    this.relay(event);
  };

  private relay(event: BridgeEvent) {
    switch (event.type) {
      case 'status':
        this.log(event.message);
        return;
      case 'initialized':
      case 'pong': {
        const before = this.snapshot.readiness;
        this.apply(event.type);
        this.log(
          before !== 'ready' && this.snapshot.readiness === 'ready'
            ? `Received ${event.type}, reader ready`
            : `Received ${event.type}`
        );
        return;
      }
      case 'initFailed':
        this.apply('constructionFailed', {
          fatalError: `Failed to initialize reader: ${event.message}`,
          publicationLoading: false
        });
        this.log(`Initialization failed: ${event.message}`);
        return;
      case 'ready':
        this.update({ publicationLoading: false });
        this.log('Publication rendered');
        this.notify('Publication loaded successfully!', 'success');
        return;
      case 'error':
        this.update({ lastError: event.message, publicationLoading: false });
        this.log(`Error: ${event.message}`);
        this.notify(`Error: ${event.message}`, 'error');
        return;
      case 'locationChanged':
        this.update({
          location: event.location,
          progress: event.location.progression,
          chapter: event.location.href
        });
        this.log(`Location ${event.location.href} (${formatProgress(event.location.progression)})`);
        return;
      case 'selection':
        this.update({ selection: event.text });
        this.log(`Selected ${event.text.length} characters`);
        return;
      case 'searchResults':
        this.log(`Search "${event.query}" matched ${event.count}`);
        this.notify(`Found ${event.count} results for "${event.query}"`, 'info');
        return;
      case 'navigationEdge':
        this.notify(EDGE_NOTICES[event.direction], 'info');
        return;
      case 'unknown':
        this.log(`Ignored unknown event "${event.rawType}"`);
        return;
    }
  }

  private settle() {
    if (this.snapshot.readiness === 'failed') {
      return;
    }
    this.apply('settled');
    this.log('Frame settled');
    this.schedule(PING_DELAY_MS, () => {
      if (this.snapshot.readiness !== 'failed') {
        this.ping();
      }
    });
    this.schedule(HANDSHAKE_TIMEOUT_MS, () => this.expireHandshake());
  }

  private expireHandshake() {
    if (this.snapshot.readiness !== 'handshakePending') {
      return;
    }
    const message = `Reader did not respond within ${HANDSHAKE_TIMEOUT_MS / 1000}s`;
    this.apply('deadlineExpired', { fatalError: message });
    this.log(message);
  }

  private teardown() {
    this.mounted = false;
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
    const frame = this.frame;
    this.frame = null;
    if (!frame) {
      return;
    }
    try {
      frame.destroy();
    } catch (error) {
      console.error(error);
    }
  }

  private schedule(delay: number, callback: () => void) {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (this.mounted) {
        callback();
      }
    }, delay);
    this.timers.add(timer);
  }

  private notify(message: string, kind: NoticeKind) {
    try {
      this.options.onNotice?.(message, kind);
    } catch (error) {
      console.error(error);
    }
  }

  private log(message: string) {
    const now = this.options.now ?? Date.now;
    this.update({ debugLog: appendDebugEntry(this.snapshot.debugLog, message, now()) });
  }

  private apply(signal: ReadinessSignal, patch: Partial<ReaderSnapshot> = {}) {
    this.update({ ...patch, readiness: transition(this.snapshot.readiness, signal) });
  }

  private update(patch: Partial<ReaderSnapshot>) {
    this.replace({ ...this.snapshot, ...patch });
  }

  private replace(snapshot: ReaderSnapshot) {
    this.snapshot = snapshot;
    this.listeners.forEach((listener) => listener());
  }
}
