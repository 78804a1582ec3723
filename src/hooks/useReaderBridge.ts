import { useCallback, useEffect, useRef, useState, useSyncExternalStore } from 'react';
import type { RefObject } from 'react';
import { createIframeHost, type FrameHost } from '@/lib/frameHost';
import { INITIAL_SNAPSHOT, ReaderBridge } from '@/lib/readerBridge';
import { getRendererBackend } from '@/lib/renderers';
import type { AppConfig, NoticeKind } from '@/types/app';
import type { ReaderTheme, RendererBackendId } from '@/types/bridge';

type ReaderBridgeHookOptions = {
  containerRef: RefObject<HTMLElement>;
  backendId: RendererBackendId;
  config: AppConfig;
  onNotice: (message: string, kind: NoticeKind) => void;
  createHost?: (container: HTMLElement) => FrameHost;
};

const subscribeNothing = () => () => {};
const getInitialSnapshot = () => INITIAL_SNAPSHOT;

export function useReaderBridge({
  containerRef,
  backendId,
  config,
  onNotice,
  createHost = createIframeHost
}: ReaderBridgeHookOptions) {
  const [bridge, setBridge] = useState<ReaderBridge | null>(null);
  const onNoticeRef = useRef(onNotice);
  const createHostRef = useRef(createHost);

  onNoticeRef.current = onNotice;
  createHostRef.current = createHost;

  useEffect(() => {
    const container = containerRef.current;
    if (!container) {
      return;
    }
    const next = new ReaderBridge({
      host: createHostRef.current(container),
      backend: getRendererBackend(backendId),
      config,
      onNotice: (message, kind) => onNoticeRef.current(message, kind)
    });
    setBridge(next);
    next.initialize();
    return () => {
      next.dispose();
    };
  }, [backendId, config, containerRef]);

  const snapshot = useSyncExternalStore(
    bridge ? bridge.subscribe : subscribeNothing,
    bridge ? bridge.getSnapshot : getInitialSnapshot
  );

  const next = useCallback(() => bridge?.next() ?? false, [bridge]);
  const prev = useCallback(() => bridge?.prev() ?? false, [bridge]);
  const setFontSize = useCallback((size: number) => bridge?.setFontSize(size) ?? false, [bridge]);
  const setTheme = useCallback((theme: ReaderTheme) => bridge?.setTheme(theme) ?? false, [bridge]);
  const loadPublication = useCallback((url: string) => bridge?.loadPublication(url) ?? false, [bridge]);
  const search = useCallback((query: string) => bridge?.search(query) ?? false, [bridge]);
  const canLoadPublication = useCallback(() => bridge?.canLoadPublication() ?? false, [bridge]);
  const clearSelection = useCallback(() => bridge?.clearSelection(), [bridge]);
  const reinitialize = useCallback(() => bridge?.reinitialize(), [bridge]);

  return {
    snapshot,
    isReady: snapshot.readiness === 'ready',
    next,
    prev,
    setFontSize,
    setTheme,
    loadPublication,
    search,
    canLoadPublication,
    clearSelection,
    reinitialize
  };
}
