import { useCallback, useState } from 'react';

export type PromptKind = 'publication' | 'search';

export function useDialogState() {
  const [prompt, setPrompt] = useState<PromptKind | null>(null);
  const [helpOpen, setHelpOpen] = useState(false);
  const [debugOpen, setDebugOpen] = useState(false);

  const openPrompt = useCallback((kind: PromptKind) => setPrompt(kind), []);
  const closePrompt = useCallback(() => setPrompt(null), []);
  const openHelp = useCallback(() => setHelpOpen(true), []);
  const closeHelp = useCallback(() => setHelpOpen(false), []);
  const toggleDebug = useCallback(() => setDebugOpen((open) => !open), []);

  return {
    prompt,
    openPrompt,
    closePrompt,
    helpOpen,
    openHelp,
    closeHelp,
    debugOpen,
    toggleDebug
  };
}
