import { formatDebugEntry } from '@/lib/debugLog';
import type { DebugLogEntry } from '@/types/bridge';

interface DebugLogPanelProps {
  open: boolean;
  entries: readonly DebugLogEntry[];
  onClose: () => void;
}

export default function DebugLogPanel({ open, entries, onClose }: DebugLogPanelProps) {
  if (!open) {
    return null;
  }

  return (
    <aside className="debug-panel" aria-label="Debug log">
      <header className="debug-panel-header">
        <span>Debug log ({entries.length})</span>
        <button type="button" className="button button-ghost" onClick={onClose}>
          Close
        </button>
      </header>
      {entries.length === 0 ? (
        <p className="modal-status">No entries yet.</p>
      ) : (
        <ol className="debug-panel-list">
          {entries.map((entry) => (
            <li key={entry.id}>{formatDebugEntry(entry)}</li>
          ))}
        </ol>
      )}
    </aside>
  );
}
