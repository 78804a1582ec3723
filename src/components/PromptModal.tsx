import { useEffect, useRef, useState } from 'react';
import type { FormEvent } from 'react';

interface PromptModalProps {
  open: boolean;
  title: string;
  label: string;
  initialValue: string;
  submitLabel?: string;
  onSubmit: (value: string) => void;
  onClose: () => void;
}

export default function PromptModal({
  open,
  title,
  label,
  initialValue,
  submitLabel = 'OK',
  onSubmit,
  onClose
}: PromptModalProps) {
  const inputRef = useRef<HTMLInputElement>(null);
  const [value, setValue] = useState(initialValue);

  useEffect(() => {
    if (!open) {
      return;
    }
    setValue(initialValue);
    inputRef.current?.focus();
    inputRef.current?.select();
  }, [initialValue, open]);

  if (!open) {
    return null;
  }

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const trimmed = value.trim();
    if (!trimmed) {
      onClose();
      return;
    }
    onSubmit(trimmed);
  };

  return (
    <div className="modal-backdrop" role="dialog" aria-modal="true" aria-label={title}>
      <form className="modal" onSubmit={handleSubmit}>
        <header className="modal-header">
          <h2 className="modal-title">{title}</h2>
        </header>
        <section className="modal-body">
          <label className="modal-field">
            {label}
            <input
              ref={inputRef}
              className="input"
              value={value}
              onChange={(event) => setValue(event.target.value)}
            />
          </label>
        </section>
        <footer className="modal-footer">
          <button type="button" className="button button-ghost" onClick={onClose}>
            Cancel
          </button>
          <button type="submit" className="button button-primary">
            {submitLabel}
          </button>
        </footer>
      </form>
    </div>
  );
}
