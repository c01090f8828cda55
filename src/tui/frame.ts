import type { FilterResult } from '../matcher/filter.js';
import type { GlobalStatus, Indicator } from '../schema/index.js';
import type { CellGrid, CellStyle } from './buffer.js';
import { indicatorGlyph, statusGlyph } from './indicators.js';
import { MIN_USABLE_HEIGHT, PROMPT_HEIGHT, getWindowSize } from './layout.js';
import { textBeforeCaret, type TextInputState } from './text-input.js';

export const TOO_SMALL_NOTICE = 'Terminal too small';
export const MULTI_SELECT_HELP = 'Tab/Space: Toggle | Enter: Confirm | Esc/Ctrl+C: Exit';
export const SINGLE_SELECT_HELP = '↑/↓: Navigate | Enter: Select | Esc/Ctrl+C: Exit';

/** Narrowest width at which the matched/total counter is still drawn. */
const COUNTER_MIN_WIDTH = 20;

const PROMPT_STYLE: CellStyle = { fg: 'cyan', bold: true };
const CARET_STYLE: CellStyle = { inverse: true };
const MARKER_STYLE: CellStyle = { fg: 'cyan', bold: true };
const CHECK_STYLE: CellStyle = { fg: 'green' };
const MATCH_STYLE: CellStyle = { bold: true, underline: true };
const CURSOR_ROW_STYLE: CellStyle = { bg: 'gray' };
const DIM_STYLE: CellStyle = { dim: true };

export interface FrameModel {
  prompt: string;
  query: TextInputState;
  /** Null hides the status segment. */
  status: GlobalStatus | null;
  items: readonly string[];
  result: FilterResult;
  cursor: number;
  /** First visible position in `result`. */
  offset: number;
  multiSelect: boolean;
  selected: ReadonlySet<number>;
  indicatorFor: (index: number) => Indicator | undefined;
  showHelp: boolean;
  /** Animation counter for spinners. */
  tick: number;
}

function composePromptLine(grid: CellGrid, model: FrameModel): void {
  const width = grid.width;
  const counter = `${model.result.length}/${model.items.length}`;
  const showCounter = width >= COUNTER_MIN_WIDTH;
  const counterX = width - counter.length;
  const limit = showCounter ? counterX - 1 : width;

  let col = grid.putText(0, 0, model.prompt, PROMPT_STYLE, limit);

  const before = textBeforeCaret(model.query);
  const chars = Array.from(model.query.value);
  const caret = Array.from(before).length;
  col += grid.putText(col, 0, before, {}, limit);
  col += grid.putText(col, 0, chars[caret] ?? ' ', CARET_STYLE, limit);
  col += grid.putText(col, 0, chars.slice(caret + 1).join(''), {}, limit);

  const status = model.status ? statusGlyph(model.status, model.tick) : null;
  if (status) grid.putText(col + 1, 0, status.text, status.style, limit);

  if (showCounter) grid.putText(counterX, 0, counter, DIM_STYLE);
}

function composeItemRow(grid: CellGrid, model: FrameModel, row: number, position: number): void {
  const match = model.result[position];
  if (!match) return;
  const text = model.items[match.index] ?? '';
  const isCursor = position === model.cursor;
  const base: CellStyle = isCursor ? CURSOR_ROW_STYLE : {};
  const style = (extra: CellStyle): CellStyle => ({ ...base, ...extra });

  if (isCursor) grid.fillRow(row, base);

  let col = grid.putText(0, row, isCursor ? '>' : ' ', style(MARKER_STYLE));
  col += grid.putText(col, row, ' ', base);

  if (model.multiSelect) {
    col += grid.putText(col, row, model.selected.has(match.index) ? '✓' : ' ', style(CHECK_STYLE));
    col += grid.putText(col, row, ' ', base);
  }

  const indicator = model.indicatorFor(match.index);
  const glyph = indicator ? indicatorGlyph(indicator, model.tick) : null;
  if (glyph) {
    col += grid.putText(col, row, glyph.text, style(glyph.style));
    col += grid.putText(col, row, ' ', base);
  }

  const highlighted = new Set(match.positions);
  const chars = Array.from(text);
  let start = 0;
  // One putText per run of equally highlighted characters keeps combining marks with their base.
  for (let i = 1; i <= chars.length; i++) {
    if (i < chars.length && highlighted.has(i) === highlighted.has(start)) continue;
    if (col >= grid.width) return;
    const run = chars.slice(start, i).join('');
    col += grid.putText(col, row, run, highlighted.has(start) ? style(MATCH_STYLE) : base);
    start = i;
  }
}

/** Composes one full frame into `grid`, which is cleared first. */
export function composeFrame(grid: CellGrid, model: FrameModel): void {
  grid.clear();
  if (grid.height === 0 || grid.width === 0) return;

  if (grid.height < MIN_USABLE_HEIGHT) {
    grid.putText(0, 0, TOO_SMALL_NOTICE, DIM_STYLE);
    return;
  }

  composePromptLine(grid, model);

  const windowSize = getWindowSize(grid.height, { showHelp: model.showHelp });
  for (let i = 0; i < windowSize; i++) {
    composeItemRow(grid, model, PROMPT_HEIGHT + i, model.offset + i);
  }

  if (model.showHelp) {
    grid.putText(0, grid.height - 1, model.multiSelect ? MULTI_SELECT_HELP : SINGLE_SELECT_HELP, DIM_STYLE);
  }
}
