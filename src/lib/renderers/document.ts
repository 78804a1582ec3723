import type { ReaderTheme } from '@/types/bridge';

export const FRAME_INIT_DELAY_MS = 300;

export const THEME_COLORS: Record<ReaderTheme, { bg: string; fg: string; link: string }> = {
  light: { bg: '#ffffff', fg: '#111827', link: '#2563eb' },
  dark: { bg: '#1e1e2e', fg: '#cdd6f4', link: '#89b4fa' },
  sepia: { bg: '#f4ecd8', fg: '#5b4636', link: '#8b6914' }
};

export interface FrameScript {
  src: string;
  module?: boolean;
}

export interface FrameDocumentParts {
  title: string;
  scripts: FrameScript[];
  /**
   * Script body that defines `handlers`, an object keyed by action name.
   * Each handler receives the raw command. `post`, `status`, `fail`,
   * `THEMES` and `state` are in scope. An optional `setup` runs on load; if
   * it throws, the frame reports `initFailed` and answers every later command
   * the same way.
   */
  handlers: string;
}

export function escapeAttribute(value: string) {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/** JSON that can sit inside an inline `<script>` element. */
export function toScriptLiteral(value: unknown) {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

const PRELUDE = `
var post = function (event) { window.parent.postMessage(event, '*'); };
var status = function (message) { post({ type: 'status', message: message }); };
var fail = function (message, error) {
  var detail = error && error.message ? error.message : error ? String(error) : '';
  post({ type: 'error', message: detail ? message + ': ' + detail : message });
};
var state = { theme: 'light', fontSize: null };
var applyPageTheme = function (name) {
  var colors = THEMES[name];
  document.body.style.background = colors.bg;
  document.body.style.color = colors.fg;
};
`;

const ROUTER = `
var setupError = null;
var reportSetupError = function () { post({ type: 'initFailed', message: setupError }); };

window.addEventListener('message', function (event) {
  if (event.source !== window.parent) return;
  var command = event.data;
  if (!command || typeof command.action !== 'string') return;
  if (setupError !== null) {
    reportSetupError();
    return;
  }
  if (command.action === 'ping') {
    post({ type: 'pong' });
    return;
  }
  var handler = handlers[command.action];
  if (!handler) {
    status('Unsupported action ' + command.action);
    return;
  }
  try {
    handler(command);
  } catch (error) {
    fail('Command ' + command.action + ' failed', error);
  }
});

window.addEventListener('load', function () {
  status('Frame loaded');
  if (typeof handlers.setup === 'function') {
    try {
      handlers.setup();
    } catch (error) {
      setupError = error && error.message ? error.message : String(error);
      reportSetupError();
      return;
    }
  }
  setTimeout(function () { post({ type: 'initialized' }); }, INIT_DELAY_MS);
});
`;

export function buildFrameDocument({ title, scripts, handlers }: FrameDocumentParts) {
  const scriptTags = scripts
    .map(
      (script) =>
        `<script${script.module ? ' type="module"' : ''} src="${escapeAttribute(script.src)}"></script>`
    )
    .join('\n    ');

  return `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>${escapeAttribute(title)}</title>
    <style>
      html, body { margin: 0; padding: 0; height: 100%; overflow: hidden; }
      #viewer { width: 100%; height: 100%; }
    </style>
    ${scriptTags}
  </head>
  <body>
    <div id="viewer"></div>
    <script>
(function () {
var THEMES = ${toScriptLiteral(THEME_COLORS)};
var INIT_DELAY_MS = ${FRAME_INIT_DELAY_MS};
${PRELUDE}
${handlers}
${ROUTER}
})();
    </script>
  </body>
</html>`;
}
