interface SelectionModalProps {
  text: string | null;
  onCopy: (text: string) => void;
  onClose: () => void;
}

export default function SelectionModal({ text, onCopy, onClose }: SelectionModalProps) {
  if (text === null) {
    return null;
  }

  return (
    <div className="modal-backdrop" role="dialog" aria-modal="true" aria-label="Text selected">
      <div className="modal">
        <header className="modal-header">
          <h2 className="modal-title">Text Selected</h2>
        </header>
        <section className="modal-body">
          <pre className="modal-content">{text}</pre>
        </section>
        <footer className="modal-footer">
          <button type="button" className="button button-ghost" onClick={onClose}>
            Close
          </button>
          <button type="button" className="button button-primary" onClick={() => onCopy(text)}>
            Copy
          </button>
        </footer>
      </div>
    </div>
  );
}
