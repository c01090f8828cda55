export type HeightMode =
  | { kind: 'fullscreen' }
  | { kind: 'fixed'; rows: number }
  | { kind: 'percentage'; percent: number };

export const PROMPT_HEIGHT = 1;
export const HELP_HEIGHT = 1;
/** Below this many rows the frame shows a notice instead of items. */
export const MIN_USABLE_HEIGHT = 2;

/** Rows the finder occupies for a terminal of `terminalRows` rows. */
export function resolveHeight(mode: HeightMode, terminalRows: number): number {
  const rows = Math.max(0, terminalRows);
  switch (mode.kind) {
    case 'fullscreen':
      return rows;
    case 'fixed':
      return Math.min(rows, Math.max(1, Math.floor(mode.rows)));
    case 'percentage':
      return Math.min(rows, Math.max(1, Math.floor((rows * mode.percent) / 100)));
  }
}

export function getReservedRows(options: { showHelp: boolean }): number {
  return PROMPT_HEIGHT + (options.showHelp ? HELP_HEIGHT : 0);
}

export function getWindowSize(height: number, options: { showHelp: boolean }): number {
  return Math.max(0, height - getReservedRows(options));
}

/**
 * Returns the first visible row so that `cursor` stays inside a window of `windowSize`
 * rows, shifting the previous offset as little as possible.
 */
export function scrollToCursor(offset: number, cursor: number, windowSize: number, total: number): number {
  if (windowSize <= 0 || total <= 0) return 0;
  const maxOffset = Math.max(0, total - windowSize);
  let next = Math.max(0, Math.min(offset, maxOffset));
  if (cursor < next) next = cursor;
  else if (cursor >= next + windowSize) next = cursor - windowSize + 1;
  return Math.max(0, Math.min(next, maxOffset));
}
