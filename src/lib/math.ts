export const MIN_FONT_SIZE = 12;
export const MAX_FONT_SIZE = 32;
export const FONT_SIZE_STEP = 2;

export function clamp(value: number, min: number, max: number) {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

export function clampFontSize(size: number) {
  return Math.round(clamp(size, MIN_FONT_SIZE, MAX_FONT_SIZE));
}

export function formatProgress(progress: number) {
  return `${(clamp(progress, 0, 1) * 100).toFixed(1)}%`;
}
