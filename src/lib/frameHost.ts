import type { BridgeMessage } from '@/types/bridge';

export interface FrameHandle {
  post: (message: BridgeMessage) => void;
  destroy: () => void;
}

/** Creates the isolated frame a renderer runs in. */
export interface FrameHost {
  mount: (markup: string, onMessage: (data: unknown) => void) => FrameHandle;
}

export const READER_FRAME_TITLE = 'EPUB reader';

export function createIframeHost(container: HTMLElement): FrameHost {
  return {
    mount(markup, onMessage) {
      if (!container.isConnected) {
        throw new Error('Reader container is not attached to the document');
      }

      const iframe = container.ownerDocument.createElement('iframe');
      iframe.title = READER_FRAME_TITLE;
      iframe.className = 'reader-frame';
      iframe.setAttribute('srcdoc', markup);

      const handleMessage = (event: MessageEvent) => {
        if (event.source !== iframe.contentWindow) {
          return;
        }
        onMessage(event.data);
      };

      const view = container.ownerDocument.defaultView;
      if (!view) {
        throw new Error('Reader container has no window');
      }
      container.replaceChildren(iframe);
      view.addEventListener('message', handleMessage);

      return {
        post(message) {
          const target = iframe.contentWindow;
          if (!target) {
            throw new Error('Reader frame is not attached');
          }
          target.postMessage(message, '*');
        },
        destroy() {
          view.removeEventListener('message', handleMessage);
          iframe.remove();
        }
      };
    }
  };
}
