import type { GlobalStatus, Indicator } from '../schema/index.js';
import type { CellStyle } from './buffer.js';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

export interface Glyph {
  text: string;
  style: CellStyle;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled indicator: ${JSON.stringify(value)}`);
}

export function spinnerFrame(tick: number): string {
  const frame = SPINNER_FRAMES[((tick % SPINNER_FRAMES.length) + SPINNER_FRAMES.length) % SPINNER_FRAMES.length];
  return frame ?? SPINNER_FRAMES[0];
}

/** Glyph drawn before an item's text, or null when the item has no indicator. */
export function indicatorGlyph(indicator: Indicator, tick: number): Glyph | null {
  switch (indicator.kind) {
    case 'none':
      return null;
    case 'spinner':
      return { text: spinnerFrame(tick), style: { fg: 'yellow' } };
    case 'success':
      return { text: '✓', style: { fg: 'green' } };
    case 'error':
      return { text: '✗', style: { fg: 'red' } };
    case 'warning':
      return { text: '⚠', style: { fg: 'yellow' } };
    case 'text':
      return { text: indicator.text, style: {} };
    case 'coloredText':
      return { text: indicator.text, style: { fg: indicator.color } };
    default:
      return assertNever(indicator);
  }
}

/** Status segment shown after the query. */
export function statusGlyph(status: GlobalStatus, tick: number): Glyph | null {
  switch (status.kind) {
    case 'loading': {
      const text = status.message ? `${spinnerFrame(tick)} ${status.message}` : spinnerFrame(tick);
      return { text, style: { fg: 'yellow' } };
    }
    case 'ready':
      return status.message ? { text: status.message, style: { fg: 'green' } } : null;
    default:
      return assertNever(status);
  }
}
