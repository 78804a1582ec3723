import { useCallback, useEffect, useRef, useState } from 'react';
import type { NoticeKind, ToastMessage } from '@/types/app';

export const TOAST_DURATION = 3000;

export function useToast(duration = TOAST_DURATION) {
  const [toast, setToast] = useState<ToastMessage | null>(null);
  const timer = useRef<ReturnType<typeof setTimeout> | null>(null);
  const counter = useRef(0);

  const clearTimer = useCallback(() => {
    if (timer.current) {
      clearTimeout(timer.current);
      timer.current = null;
    }
  }, []);

  const dismiss = useCallback(() => {
    clearTimer();
    setToast(null);
  }, [clearTimer]);

  const showToast = useCallback(
    (message: string, kind: NoticeKind = 'info') => {
      clearTimer();
      counter.current += 1;
      const now = Date.now();
      setToast({
        id: `${now}-${counter.current}`,
        message,
        kind,
        expiresAt: now + duration
      });
      timer.current = setTimeout(() => {
        timer.current = null;
        setToast(null);
      }, duration);
    },
    [clearTimer, duration]
  );

  useEffect(() => clearTimer, [clearTimer]);

  return { toast, showToast, dismiss };
}
