interface ErrorBannerProps {
  message: string | null;
  onRetry: () => void;
}

export default function ErrorBanner({ message, onRetry }: ErrorBannerProps) {
  if (!message) {
    return null;
  }

  return (
    <div className="error-banner" role="alert">
      <span className="error-banner-message">{message}</span>
      <button type="button" className="button button-secondary" onClick={onRetry}>
        Reinitialize
      </button>
    </div>
  );
}
