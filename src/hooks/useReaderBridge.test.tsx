// @vitest-environment jsdom
import { useRef } from 'react';
import { createRoot, type Root } from 'react-dom/client';
import { act } from 'react-dom/test-utils';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { useReaderBridge } from '@/hooks/useReaderBridge';
import { DEFAULT_CONFIG } from '@/lib/config';
import { FakeFrameHost } from '@/test/fakeFrameHost';
import type { NoticeKind } from '@/types/app';

type ReaderBridgeState = ReturnType<typeof useReaderBridge>;

interface HarnessProps {
  host: FakeFrameHost;
  onNotice: (message: string, kind: NoticeKind) => void;
  onRender: (state: ReaderBridgeState) => void;
}

function Harness({ host, onNotice, onRender }: HarnessProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const state = useReaderBridge({
    containerRef,
    backendId: 'epubjs',
    config: DEFAULT_CONFIG,
    onNotice,
    createHost: () => host
  });
  onRender(state);
  return <div ref={containerRef} />;
}

describe('useReaderBridge', () => {
  let container: HTMLDivElement;
  let root: Root;
  let host: FakeFrameHost;
  let latest: ReaderBridgeState | null;
  let notices: string[];

  const current = () => {
    if (!latest) {
      throw new Error('Harness has not rendered');
    }
    return latest;
  };

  beforeEach(() => {
    Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true);
    vi.useFakeTimers();
    container = document.createElement('div');
    document.body.appendChild(container);
    root = createRoot(container);
    host = new FakeFrameHost();
    latest = null;
    notices = [];

    act(() => {
      root.render(
        <Harness
          host={host}
          onNotice={(message) => notices.push(message)}
          onRender={(state) => {
            latest = state;
          }}
        />
      );
    });
  });

  afterEach(() => {
    act(() => {
      root.unmount();
    });
    container.remove();
    vi.useRealTimers();
  });

  it('creates the frame on mount', () => {
    expect(host.mounts).toBe(1);
    expect(current().snapshot.readiness).toBe('frameCreated');
    expect(current().isReady).toBe(false);
  });

  it('re-renders through the handshake', () => {
    act(() => {
      vi.advanceTimersByTime(500);
    });
    expect(current().snapshot.readiness).toBe('handshakePending');

    act(() => {
      host.emit({ type: 'initialized' });
    });
    expect(current().isReady).toBe(true);

    act(() => {
      current().next();
    });
    expect(host.posted).toEqual([{ action: 'next' }]);
  });

  it('passes renderer notices to the caller', () => {
    act(() => {
      host.emit({ type: 'initialized' });
      host.emit({ type: 'error', message: 'Failed to load publication' });
    });

    expect(notices).toEqual(['Error: Failed to load publication']);
    expect(current().snapshot.lastError).toBe('Failed to load publication');
  });

  it('exposes location updates', () => {
    act(() => {
      host.emit({ type: 'initialized' });
      host.emit({ type: 'locationChanged', location: { href: 'chap3.xhtml', progression: 0.42 } });
    });

    expect(current().snapshot.progress).toBe(0.42);
    expect(current().snapshot.chapter).toBe('chap3.xhtml');
  });

  it('tears the frame down on unmount', () => {
    act(() => {
      root.unmount();
    });

    expect(host.destroyed).toBe(1);
    root = createRoot(container);
  });
});
