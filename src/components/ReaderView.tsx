import type { RefObject } from 'react';
import { formatProgress } from '@/lib/math';
import { describeReadiness, isBusy } from '@/lib/readiness';
import type { ReaderLocation, ReadinessState } from '@/types/bridge';

interface ReaderViewProps {
  containerRef: RefObject<HTMLDivElement>;
  readiness: ReadinessState;
  location: ReaderLocation | null;
  progress: number;
}

export default function ReaderView({ containerRef, readiness, location, progress }: ReaderViewProps) {
  const busy = isBusy(readiness);

  return (
    <div className="reader-shell">
      {location && (
        <div
          className="reader-progress"
          role="progressbar"
          aria-label="Reading progress"
          aria-valuemin={0}
          aria-valuemax={100}
          aria-valuenow={Math.round(progress * 100)}
        >
          <div className="reader-progress-fill" style={{ width: formatProgress(progress) }} />
        </div>
      )}
      <div className="reader-stage">
        <div ref={containerRef} className="reader-container" />
        {busy && (
          <div className="reader-overlay" role="status" aria-live="polite">
            <span className="toolbar-spinner" aria-hidden />
            <span>{describeReadiness(readiness)}</span>
          </div>
        )}
      </div>
      {location && (
        <div className="reader-statusbar">
          Location: {location.href} | Progress: {formatProgress(progress)}
        </div>
      )}
    </div>
  );
}
