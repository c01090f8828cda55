import { sameStyle, type CellRun, type CellStyle } from './buffer.js';

/**
 * The terminal-kit calls the finder draws with. A terminal-kit `Terminal` satisfies it;
 * coordinates are one-based, as terminal-kit takes them.
 */
export interface PaintTarget {
  moveTo(x: number, y: number): unknown;
  styleReset(): unknown;
  color(color: string): unknown;
  bgColor(color: string): unknown;
  bold(): unknown;
  dim(): unknown;
  underline(): unknown;
  inverse(): unknown;
  eraseLine(): unknown;
  hideCursor(hide: boolean): unknown;
  noFormat(text: string): unknown;
}

export interface PaintOptions {
  /** Screen row of grid row 0. */
  originRow: number;
  colors: boolean;
}

function applyStyle(target: PaintTarget, style: CellStyle): void {
  target.styleReset();
  if (style.fg) target.color(style.fg);
  if (style.bg) target.bgColor(style.bg);
  if (style.bold) target.bold();
  if (style.dim) target.dim();
  if (style.underline) target.underline();
  if (style.inverse) target.inverse();
}

/**
 * Draws diff runs: one move per run, a style switch only where the style changes, and
 * text written with `noFormat` so item text never goes through terminal-kit markup.
 */
export function paintRuns(target: PaintTarget, runs: readonly CellRun[], options: PaintOptions): void {
  if (runs.length === 0) return;
  let current: CellStyle | null = null;

  for (const run of runs) {
    target.moveTo(run.x + 1, options.originRow + run.y + 1);
    let text = '';
    for (const cell of run.cells) {
      if (cell.continuation) continue;
      if (options.colors && (current === null || !sameStyle(current, cell))) {
        if (text) target.noFormat(text);
        text = '';
        applyStyle(target, cell);
        current = cell;
      }
      text += cell.char;
    }
    if (text) target.noFormat(text);
  }

  if (options.colors) target.styleReset();
}

/** Blanks `count` screen rows starting at zero-based `fromRow`. */
export function eraseRows(target: PaintTarget, fromRow: number, count: number): void {
  for (let i = 0; i < count; i++) {
    target.moveTo(1, fromRow + i + 1);
    target.eraseLine();
  }
}

/** Scrolls the screen so its bottom `rows` lines are free for inline drawing. */
export function reserveRows(target: PaintTarget, rows: number): void {
  if (rows > 0) target.noFormat('\n'.repeat(rows));
}
