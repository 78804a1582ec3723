import { useEffect, useMemo } from 'react';

type HotkeysOptions = {
  dialogOpen: boolean;
  handlePrev: () => void;
  handleNext: () => void;
  increaseFont: () => void;
  decreaseFont: () => void;
  cycleTheme: () => void;
  openPublication: () => void;
  openSearch: () => void;
  showLocation: () => void;
  toggleDebugLog: () => void;
  openHelp: () => void;
  closeDialogs: () => void;
};

export interface Hotkey {
  keys: string;
  action: string;
}

function isTextInput(element: EventTarget | null) {
  if (!(element instanceof HTMLElement)) {
    return false;
  }
  const tag = element.tagName.toLowerCase();
  return tag === 'input' || tag === 'textarea' || tag === 'select' || element.isContentEditable;
}

export function useHotkeys({
  dialogOpen,
  handlePrev,
  handleNext,
  increaseFont,
  decreaseFont,
  cycleTheme,
  openPublication,
  openSearch,
  showLocation,
  toggleDebugLog,
  openHelp,
  closeDialogs
}: HotkeysOptions) {
  const hotkeys = useMemo<Hotkey[]>(
    () => [
      { keys: '← / PageUp', action: 'Previous page' },
      { keys: '→ / PageDown / Space', action: 'Next page' },
      { keys: '+ / =', action: 'Larger text' },
      { keys: '-', action: 'Smaller text' },
      { keys: 'T', action: 'Cycle theme' },
      { keys: 'O', action: 'Open publication' },
      { keys: '/', action: 'Search' },
      { keys: 'C', action: 'Show current location' },
      { keys: 'L', action: 'Toggle debug log' },
      { keys: 'Esc', action: 'Close dialogs' },
      { keys: 'Shift + /', action: 'Open help' }
    ],
    []
  );

  useEffect(() => {
    const handleKeyDown = (event: KeyboardEvent) => {
      if (event.key === 'Escape') {
        closeDialogs();
        return;
      }
      if (dialogOpen || isTextInput(event.target) || event.ctrlKey || event.metaKey || event.altKey) {
        return;
      }
      switch (event.key.toLowerCase()) {
        case '?':
          event.preventDefault();
          openHelp();
          break;
        case 'arrowleft':
        case 'pageup':
          event.preventDefault();
          handlePrev();
          break;
        case 'arrowright':
        case 'pagedown':
        case ' ':
          event.preventDefault();
          handleNext();
          break;
        case '+':
        case '=':
          event.preventDefault();
          increaseFont();
          break;
        case '-':
          event.preventDefault();
          decreaseFont();
          break;
        case 't':
          event.preventDefault();
          cycleTheme();
          break;
        case 'o':
          event.preventDefault();
          openPublication();
          break;
        case '/':
          event.preventDefault();
          openSearch();
          break;
        case 'c':
          event.preventDefault();
          showLocation();
          break;
        case 'l':
          event.preventDefault();
          toggleDebugLog();
          break;
        default:
          break;
      }
    };
    window.addEventListener('keydown', handleKeyDown);
    return () => window.removeEventListener('keydown', handleKeyDown);
  }, [
    closeDialogs,
    cycleTheme,
    decreaseFont,
    dialogOpen,
    handleNext,
    handlePrev,
    increaseFont,
    openHelp,
    openPublication,
    openSearch,
    showLocation,
    toggleDebugLog
  ]);

  return { hotkeys };
}
