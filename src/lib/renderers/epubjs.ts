import { buildFrameDocument } from '@/lib/renderers/document';
import type { RendererBackend } from '@/lib/renderers/types';

const LOCATION_CHARS_PER_PAGE = 1600;

const HANDLERS = `
var book = null;
var rendition = null;

var requireRendition = function () {
  if (!rendition) {
    fail('No publication loaded');
    return false;
  }
  return true;
};

var postLocation = function (location) {
  if (!location || !location.start) return;
  var progression = book && book.locations.length() > 0
    ? book.locations.percentageFromCfi(location.start.cfi)
    : undefined;
  post({ type: 'locationChanged', location: { href: location.start.href, progression: progression } });
};

var handlers = {
  setup: function () {
    if (typeof ePub !== 'function') {
      throw new Error('epub.js is not available in the frame');
    }
    applyPageTheme(state.theme);
  },
  loadEpub: function (command) {
    if (book) {
      book.destroy();
    }
    status('Loading ' + command.url);
    var current = ePub(command.url);
    var view = current.renderTo('viewer', { width: '100%', height: '100%', flow: 'paginated', spread: 'none' });
    book = current;
    rendition = view;
    // A newer loadEpub replaces book; callbacks from the old one stop here.
    var active = function () { return book === current; };
    Object.keys(THEMES).forEach(function (name) {
      var colors = THEMES[name];
      view.themes.register(name, {
        body: { background: colors.bg, color: colors.fg },
        a: { color: colors.link }
      });
    });
    view.themes.select(state.theme);
    if (state.fontSize) {
      view.themes.fontSize(state.fontSize + 'px');
    }
    view.on('relocated', postLocation);
    view.on('selected', function (cfiRange, contents) {
      var selection = contents.window.getSelection();
      var text = selection ? selection.toString().trim() : '';
      if (text) {
        post({ type: 'selection', text: text });
      }
    });
    current.ready
      .then(function () {
        if (!active()) return false;
        return view.display().then(function () { return true; });
      })
      .then(function (displayed) {
        if (!displayed || !active()) return false;
        post({ type: 'ready' });
        status('Generating locations');
        return current.locations.generate(${LOCATION_CHARS_PER_PAGE}).then(function () { return true; });
      })
      .then(function (generated) {
        if (!generated || !active()) return;
        status('Locations ready');
        postLocation(view.currentLocation());
      })
      .catch(function (error) {
        if (active()) fail('Failed to load publication', error);
      });
  },
  next: function () {
    if (!requireRendition()) return;
    if (rendition.location && rendition.location.atEnd) {
      post({ type: 'navigationEdge', direction: 'next' });
      return;
    }
    rendition.next().catch(function (error) { fail('Cannot go forward', error); });
  },
  prev: function () {
    if (!requireRendition()) return;
    if (rendition.location && rendition.location.atStart) {
      post({ type: 'navigationEdge', direction: 'prev' });
      return;
    }
    rendition.prev().catch(function (error) { fail('Cannot go backward', error); });
  },
  fontSize: function (command) {
    state.fontSize = command.size;
    if (rendition) {
      rendition.themes.fontSize(command.size + 'px');
    }
  },
  theme: function (command) {
    state.theme = command.theme;
    applyPageTheme(command.theme);
    if (rendition) {
      rendition.themes.select(command.theme);
    }
  },
  search: function (command) {
    if (!book) {
      fail('No publication loaded');
      return;
    }
    status('Searching for ' + command.query);
    Promise.all(book.spine.spineItems.map(function (item) {
      return item.load(book.load.bind(book)).then(function () {
        var found = item.find(command.query);
        item.unload();
        return found.length;
      });
    }))
      .then(function (counts) {
        var count = counts.reduce(function (total, value) { return total + value; }, 0);
        post({ type: 'searchResults', query: command.query, count: count });
      })
      .catch(function (error) { fail('Search failed', error); });
  }
};
`;

export const epubjsBackend: RendererBackend = {
  id: 'epubjs',
  label: 'epub.js',
  buildDocument: (config) =>
    buildFrameDocument({
      title: 'epub.js reader',
      scripts: [{ src: config.jszipScriptUrl }, { src: config.epubjsScriptUrl }],
      handlers: HANDLERS
    })
};
