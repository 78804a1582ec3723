import { buildFrameDocument } from '@/lib/renderers/document';
import type { RendererBackend } from '@/lib/renderers/types';

const DEFAULT_SETTINGS = {
  fontSize: '16px',
  fontFamily: 'serif',
  lineHeight: 1.5
};

// The navigator script is expected to expose `window.ReadiumNavigator`.
const HANDLERS = `
var reader = null;

var settle = function (result) {
  return result && typeof result.then === 'function' ? result : Promise.resolve(result);
};

var requireReader = function () {
  if (!reader) {
    fail('Readium navigator is not available');
    return false;
  }
  return true;
};

var handlers = {
  setup: function () {
    var Navigator = window.ReadiumNavigator;
    if (typeof Navigator !== 'function') {
      throw new Error('ReadiumNavigator not found in frame window');
    }
    reader = new Navigator({
      container: document.getElementById('viewer'),
      enableSelection: true,
      enableTTS: false,
      settings: ${JSON.stringify(DEFAULT_SETTINGS)}
    });
    applyPageTheme(state.theme);
    if (typeof reader.on !== 'function') {
      status('Navigator does not emit events');
      return;
    }
    reader.on('locationChanged', function (data) {
      if (!data || typeof data.href !== 'string') return;
      post({ type: 'locationChanged', location: { href: data.href, progression: data.progression } });
    });
    reader.on('selection', function (data) {
      if (data && data.text) {
        post({ type: 'selection', text: String(data.text) });
      }
    });
    reader.on('error', function (error) {
      fail('Navigator error', error);
    });
  },
  loadEpub: function (command) {
    if (!requireReader()) return;
    status('Loading ' + command.url);
    settle(reader.loadPublication(command.url))
      .then(function () { post({ type: 'ready' }); })
      .catch(function (error) { fail('Failed to load publication', error); });
  },
  next: function () {
    if (!requireReader()) return;
    settle(reader.goForward())
      .then(function (moved) {
        if (moved === false) post({ type: 'navigationEdge', direction: 'next' });
      })
      .catch(function (error) { fail('Cannot go forward', error); });
  },
  prev: function () {
    if (!requireReader()) return;
    settle(reader.goBackward())
      .then(function (moved) {
        if (moved === false) post({ type: 'navigationEdge', direction: 'prev' });
      })
      .catch(function (error) { fail('Cannot go backward', error); });
  },
  fontSize: function (command) {
    state.fontSize = command.size;
    if (!requireReader()) return;
    settle(reader.updateSettings({ fontSize: command.size + 'px' }))
      .catch(function (error) { fail('Failed to update settings', error); });
  },
  theme: function (command) {
    var colors = THEMES[command.theme];
    state.theme = command.theme;
    applyPageTheme(command.theme);
    if (!requireReader()) return;
    settle(reader.updateSettings({ theme: command.theme, backgroundColor: colors.bg, textColor: colors.fg }))
      .catch(function (error) { fail('Failed to update settings', error); });
  },
  search: function (command) {
    if (!requireReader()) return;
    status('Searching for ' + command.query);
    settle(reader.search(command.query))
      .then(function (results) {
        var count = Array.isArray(results) ? results.length : 0;
        post({ type: 'searchResults', query: command.query, count: count });
      })
      .catch(function (error) { fail('Search failed', error); });
  }
};
`;

export const readiumBackend: RendererBackend = {
  id: 'readium',
  label: 'Readium',
  buildDocument: (config) =>
    buildFrameDocument({
      title: 'Readium reader',
      scripts: [{ src: config.readiumScriptUrl, module: true }],
      handlers: HANDLERS
    })
};
