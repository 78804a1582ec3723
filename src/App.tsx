import { useCallback, useEffect, useRef, useState } from 'react';
import DebugLogPanel from '@/components/DebugLogPanel';
import ErrorBanner from '@/components/ErrorBanner';
import HelpModal from '@/components/HelpModal';
import PromptModal from '@/components/PromptModal';
import ReaderView from '@/components/ReaderView';
import SelectionModal from '@/components/SelectionModal';
import Toast from '@/components/Toast';
import Toolbar from '@/components/Toolbar';
import { useDialogState } from '@/hooks/useDialogState';
import { useHotkeys } from '@/hooks/useHotkeys';
import { useReaderBridge } from '@/hooks/useReaderBridge';
import { useToast } from '@/hooks/useToast';
import { READER_THEMES } from '@/lib/bridgeProtocol';
import { appConfig } from '@/lib/config';
import { FONT_SIZE_STEP, clampFontSize, formatProgress } from '@/lib/math';
import { getRendererBackend } from '@/lib/renderers';
import { loadLastPublication, loadPreferences, saveLastPublication, savePreferences } from '@/lib/storage';
import type { ReaderPreferences } from '@/types/app';
import type { ReaderTheme, RendererBackendId } from '@/types/bridge';

const DEFAULT_PREFERENCES: ReaderPreferences = {
  theme: 'light',
  fontSize: 16,
  backend: appConfig.backend
};

export default function App() {
  const [preferences, setPreferences] = useState<ReaderPreferences>(() => loadPreferences(DEFAULT_PREFERENCES));
  const [lastPublication, setLastPublication] = useState<string | null>(() => loadLastPublication());
  const containerRef = useRef<HTMLDivElement>(null);
  const { toast, showToast, dismiss } = useToast();
  const { prompt, openPrompt, closePrompt, helpOpen, openHelp, closeHelp, debugOpen, toggleDebug } =
    useDialogState();

  const reader = useReaderBridge({
    containerRef,
    backendId: preferences.backend,
    config: appConfig,
    onNotice: showToast
  });
  const { snapshot, isReady, setFontSize, setTheme, clearSelection } = reader;

  useEffect(() => {
    savePreferences(preferences);
  }, [preferences]);

  // Stored preferences are pushed to the frame each time it becomes ready.
  const preferencesRef = useRef(preferences);
  preferencesRef.current = preferences;
  useEffect(() => {
    if (!isReady) {
      return;
    }
    setTheme(preferencesRef.current.theme);
    setFontSize(preferencesRef.current.fontSize);
  }, [isReady, setFontSize, setTheme]);

  const handleOpenPublication = useCallback(() => {
    if (!reader.canLoadPublication()) {
      showToast('Reader is not ready yet', 'error');
      return;
    }
    openPrompt('publication');
  }, [openPrompt, reader, showToast]);

  const handleSubmitPublication = useCallback(
    (url: string) => {
      closePrompt();
      if (!reader.loadPublication(url)) {
        showToast('Reader is not ready yet', 'error');
        return;
      }
      setLastPublication(url);
      saveLastPublication(url);
    },
    [closePrompt, reader, showToast]
  );

  const handleOpenSearch = useCallback(() => {
    if (!isReady || !snapshot.publicationUrl) {
      return;
    }
    openPrompt('search');
  }, [isReady, openPrompt, snapshot.publicationUrl]);

  const handleSubmitSearch = useCallback(
    (query: string) => {
      closePrompt();
      reader.search(query);
    },
    [closePrompt, reader]
  );

  const handleFontSizeChange = useCallback(
    (size: number) => {
      const next = clampFontSize(size);
      setPreferences((current) => ({ ...current, fontSize: next }));
      setFontSize(next);
    },
    [setFontSize]
  );

  const handleThemeChange = useCallback(
    (theme: ReaderTheme) => {
      setPreferences((current) => ({ ...current, theme }));
      setTheme(theme);
    },
    [setTheme]
  );

  const increaseFont = useCallback(
    () => handleFontSizeChange(preferences.fontSize + FONT_SIZE_STEP),
    [handleFontSizeChange, preferences.fontSize]
  );

  const decreaseFont = useCallback(
    () => handleFontSizeChange(preferences.fontSize - FONT_SIZE_STEP),
    [handleFontSizeChange, preferences.fontSize]
  );

  const handleCycleTheme = useCallback(() => {
    const index = READER_THEMES.indexOf(preferences.theme);
    handleThemeChange(READER_THEMES[(index + 1) % READER_THEMES.length]);
  }, [handleThemeChange, preferences.theme]);

  const handleBackendChange = useCallback((backend: RendererBackendId) => {
    setPreferences((current) => ({ ...current, backend }));
  }, []);

  const handleShowLocation = useCallback(() => {
    const { location } = snapshot;
    if (!location) {
      showToast('No location yet');
      return;
    }
    showToast(`Current: ${location.href} (${formatProgress(location.progression)})`);
  }, [showToast, snapshot]);

  const handleCopySelection = useCallback(
    async (text: string) => {
      clearSelection();
      try {
        await navigator.clipboard.writeText(text);
        showToast('Text copied!', 'success');
      } catch (error) {
        console.error(error);
        showToast('Unable to copy text', 'error');
      }
    },
    [clearSelection, showToast]
  );

  const closeDialogs = useCallback(() => {
    closePrompt();
    closeHelp();
    clearSelection();
  }, [clearSelection, closeHelp, closePrompt]);

  const { hotkeys } = useHotkeys({
    dialogOpen: prompt !== null || helpOpen || snapshot.selection !== null,
    handlePrev: reader.prev,
    handleNext: reader.next,
    increaseFont,
    decreaseFont,
    cycleTheme: handleCycleTheme,
    openPublication: handleOpenPublication,
    openSearch: handleOpenSearch,
    showLocation: handleShowLocation,
    toggleDebugLog: toggleDebug,
    openHelp,
    closeDialogs
  });

  return (
    <div className={`app app-theme-${preferences.theme}`}>
      <Toolbar
        readiness={snapshot.readiness}
        publicationUrl={snapshot.publicationUrl}
        publicationLoading={snapshot.publicationLoading}
        fontSize={preferences.fontSize}
        theme={preferences.theme}
        backend={preferences.backend}
        debugOpen={debugOpen}
        onOpenPublication={handleOpenPublication}
        onPrev={reader.prev}
        onNext={reader.next}
        onFontSizeChange={handleFontSizeChange}
        onThemeChange={handleThemeChange}
        onBackendChange={handleBackendChange}
        onShowLocation={handleShowLocation}
        onSearch={handleOpenSearch}
        onReinitialize={reader.reinitialize}
        onToggleDebug={toggleDebug}
        onOpenHelp={openHelp}
      />
      <ErrorBanner message={snapshot.fatalError} onRetry={reader.reinitialize} />
      <ReaderView
        containerRef={containerRef}
        readiness={snapshot.readiness}
        location={snapshot.location}
        progress={snapshot.progress}
      />
      <DebugLogPanel open={debugOpen} entries={snapshot.debugLog} onClose={toggleDebug} />
      <PromptModal
        open={prompt === 'publication'}
        title="Load Publication"
        label="Enter EPUB URL:"
        initialValue={lastPublication ?? appConfig.defaultPublicationUrl}
        submitLabel="Load"
        onSubmit={handleSubmitPublication}
        onClose={closePrompt}
      />
      <PromptModal
        open={prompt === 'search'}
        title="Search"
        label="Enter search term:"
        initialValue=""
        submitLabel="Search"
        onSubmit={handleSubmitSearch}
        onClose={closePrompt}
      />
      <SelectionModal
        text={snapshot.selection}
        onCopy={(text) => {
          void handleCopySelection(text);
        }}
        onClose={clearSelection}
      />
      <HelpModal
        open={helpOpen}
        hotkeys={hotkeys}
        backendLabel={getRendererBackend(preferences.backend).label}
        onClose={closeHelp}
      />
      <Toast toast={toast} onDismiss={dismiss} />
    </div>
  );
}
