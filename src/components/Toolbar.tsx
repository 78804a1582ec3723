import { READER_THEMES, isReaderTheme } from '@/lib/bridgeProtocol';
import { FONT_SIZE_STEP, MAX_FONT_SIZE, MIN_FONT_SIZE } from '@/lib/math';
import { describeReadiness } from '@/lib/readiness';
import { RENDERER_BACKEND_IDS, getRendererBackend, isRendererBackendId } from '@/lib/renderers';
import type { ReaderTheme, ReadinessState, RendererBackendId } from '@/types/bridge';

interface ToolbarProps {
  readiness: ReadinessState;
  publicationUrl: string | null;
  publicationLoading: boolean;
  fontSize: number;
  theme: ReaderTheme;
  backend: RendererBackendId;
  debugOpen: boolean;
  onOpenPublication: () => void;
  onPrev: () => void;
  onNext: () => void;
  onFontSizeChange: (size: number) => void;
  onThemeChange: (theme: ReaderTheme) => void;
  onBackendChange: (backend: RendererBackendId) => void;
  onShowLocation: () => void;
  onSearch: () => void;
  onReinitialize: () => void;
  onToggleDebug: () => void;
  onOpenHelp: () => void;
}

const THEME_LABELS: Record<ReaderTheme, string> = {
  light: 'Light',
  dark: 'Dark',
  sepia: 'Sepia'
};

export default function Toolbar({
  readiness,
  publicationUrl,
  publicationLoading,
  fontSize,
  theme,
  backend,
  debugOpen,
  onOpenPublication,
  onPrev,
  onNext,
  onFontSizeChange,
  onThemeChange,
  onBackendChange,
  onShowLocation,
  onSearch,
  onReinitialize,
  onToggleDebug,
  onOpenHelp
}: ToolbarProps) {
  const ready = readiness === 'ready';
  const hasPublication = ready && publicationUrl !== null;

  return (
    <div className="toolbar">
      <div className="toolbar-row">
        <div className="toolbar-group">
          <span className="toolbar-readout">Reader: {describeReadiness(readiness)}</span>
          <button type="button" className="button" onClick={onOpenPublication}>
            Load Publication
          </button>
          {publicationLoading && (
            <div className="toolbar-status" role="status" aria-live="polite">
              <span className="toolbar-spinner" aria-hidden />
              <span className="toolbar-status-text">Loading publication…</span>
            </div>
          )}
        </div>

        <div className="toolbar-group">
          <button type="button" className="button" onClick={onPrev} disabled={!hasPublication}>
            Previous
          </button>
          <button type="button" className="button" onClick={onNext} disabled={!hasPublication}>
            Next
          </button>
          <button type="button" className="button" onClick={onShowLocation} disabled={!hasPublication}>
            Current Location
          </button>
          <button type="button" className="button" onClick={onSearch} disabled={!hasPublication}>
            Search
          </button>
        </div>
      </div>

      <div className="toolbar-row">
        <div className="toolbar-group">
          <button
            type="button"
            className="button"
            onClick={() => onFontSizeChange(fontSize - FONT_SIZE_STEP)}
            disabled={fontSize <= MIN_FONT_SIZE}
          >
            A-
          </button>
          <span className="toolbar-readout">{fontSize}px</span>
          <button
            type="button"
            className="button"
            onClick={() => onFontSizeChange(fontSize + FONT_SIZE_STEP)}
            disabled={fontSize >= MAX_FONT_SIZE}
          >
            A+
          </button>
          <label className="toolbar-field">
            Theme
            <select
              className="select"
              value={theme}
              onChange={(event) => {
                const { value } = event.target;
                if (isReaderTheme(value)) {
                  onThemeChange(value);
                }
              }}
            >
              {READER_THEMES.map((option) => (
                <option key={option} value={option}>
                  {THEME_LABELS[option]}
                </option>
              ))}
            </select>
          </label>
        </div>

        <div className="toolbar-group">
          <label className="toolbar-field">
            Renderer
            <select
              className="select"
              value={backend}
              onChange={(event) => {
                const { value } = event.target;
                if (isRendererBackendId(value)) {
                  onBackendChange(value);
                }
              }}
            >
              {RENDERER_BACKEND_IDS.map((id) => (
                <option key={id} value={id}>
                  {getRendererBackend(id).label}
                </option>
              ))}
            </select>
          </label>
          <button type="button" className="button" onClick={onReinitialize}>
            Reinitialize
          </button>
          <button
            type="button"
            className={`button ${debugOpen ? 'button-active' : ''}`}
            onClick={onToggleDebug}
          >
            Debug Log
          </button>
          <button type="button" className="button" onClick={onOpenHelp}>
            Help / Hotkeys
          </button>
        </div>
      </div>
    </div>
  );
}
