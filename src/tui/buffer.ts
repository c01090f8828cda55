import terminalKit from 'terminal-kit';
import type { IndicatorColor } from '../schema/index.js';

export type CellColor = IndicatorColor;

export interface CellStyle {
  fg?: CellColor;
  bg?: CellColor;
  bold?: boolean;
  dim?: boolean;
  underline?: boolean;
  inverse?: boolean;
}

export interface Cell extends CellStyle {
  char: string;
  /** Second column of a double-width character; emits nothing. */
  continuation?: boolean;
}

/** A horizontal run of changed cells starting at (x, y). */
export interface CellRun {
  x: number;
  y: number;
  cells: readonly Cell[];
}

const BLANK: Cell = { char: ' ' };
const TAB_WIDTH = 4;
const CONTROL_PLACEHOLDER = '?';

/** C0 controls, DEL and C1 controls. */
function isControl(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code < 0x20 || (code >= 0x7f && code <= 0x9f);
}

export function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return (
    a.fg === b.fg &&
    a.bg === b.bg &&
    (a.bold ?? false) === (b.bold ?? false) &&
    (a.dim ?? false) === (b.dim ?? false) &&
    (a.underline ?? false) === (b.underline ?? false) &&
    (a.inverse ?? false) === (b.inverse ?? false)
  );
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.char === b.char && (a.continuation ?? false) === (b.continuation ?? false) && sameStyle(a, b);
}

export class CellGrid {
  readonly width: number;
  readonly height: number;
  private readonly cells: Cell[];

  constructor(width: number, height: number) {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
    this.cells = new Array<Cell>(this.width * this.height).fill(BLANK);
  }

  get(x: number, y: number): Cell {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return BLANK;
    return this.cells[y * this.width + x] ?? BLANK;
  }

  set(x: number, y: number, cell: Cell): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    this.cells[y * this.width + x] = cell;
  }

  clear(): void {
    this.cells.fill(BLANK);
  }

  fillRow(y: number, style: CellStyle, fromX = 0): void {
    for (let x = Math.max(0, fromX); x < this.width; x++) {
      this.set(x, y, { ...style, char: ' ' });
    }
  }

  /**
   * Writes `text` at (x, y), clipped at `maxX` (exclusive, defaults to the grid width).
   * Double-width characters take two cells; one that would straddle the edge is dropped.
   * Tabs expand to the next tab stop and other control characters print as `?`.
   * Returns the number of columns written.
   */
  putText(x: number, y: number, text: string, style: CellStyle = {}, maxX = this.width): number {
    const limit = Math.min(maxX, this.width);
    let col = x;
    for (const ch of text) {
      if (ch === '\t') {
        const stop = Math.min(limit, (Math.floor(col / TAB_WIDTH) + 1) * TAB_WIDTH);
        while (col < stop) this.set(col++, y, { ...style, char: ' ' });
        if (col >= limit) break;
        continue;
      }
      const printable = isControl(ch) ? CONTROL_PLACEHOLDER : ch;
      const width = terminalKit.stringWidth(printable);
      if (width === 0) {
        this.attachCombining(col, y, printable);
        continue;
      }
      if (col + width > limit) break;
      this.set(col, y, { ...style, char: printable });
      if (width === 2) this.set(col + 1, y, { ...style, char: '', continuation: true });
      col += width;
    }
    return col - x;
  }

  /** Appends a zero-width character to the cell left of `col`, if there is one. */
  private attachCombining(col: number, y: number, mark: string): void {
    let target = col - 1;
    if (this.get(target, y).continuation) target--;
    if (target < 0 || target >= this.width) return;
    const base = this.get(target, y);
    this.set(target, y, { ...base, char: base.char + mark });
  }
}

/**
 * Front (last displayed) and back (being composed) grids of the same size. Only a resize
 * reallocates them.
 */
export class DoubleBuffer {
  private frontGrid: CellGrid;
  private backGrid: CellGrid;
  private fullRedraw = true;

  constructor(width: number, height: number) {
    this.frontGrid = new CellGrid(width, height);
    this.backGrid = new CellGrid(width, height);
  }

  get width(): number {
    return this.backGrid.width;
  }

  get height(): number {
    return this.backGrid.height;
  }

  get back(): CellGrid {
    return this.backGrid;
  }

  /** Returns true when the size changed; the next diff then covers every cell. */
  resize(width: number, height: number): boolean {
    if (width === this.width && height === this.height) return false;
    this.frontGrid = new CellGrid(width, height);
    this.backGrid = new CellGrid(width, height);
    this.fullRedraw = true;
    return true;
  }

  /** Forgets what is on screen so the next diff emits every cell. */
  invalidate(): void {
    this.frontGrid.clear();
    this.fullRedraw = true;
  }

  get needsFullRedraw(): boolean {
    return this.fullRedraw;
  }

  diff(): CellRun[] {
    const runs: CellRun[] = [];
    for (let y = 0; y < this.height; y++) {
      let start = -1;
      let cells: Cell[] = [];
      for (let x = 0; x < this.width; x++) {
        const next = this.backGrid.get(x, y);
        const changed = this.fullRedraw || !sameCell(next, this.frontGrid.get(x, y));
        if (changed) {
          if (start < 0) {
            start = x;
            cells = [];
            if (next.continuation && x > 0) {
              start = x - 1;
              cells.push(this.backGrid.get(x - 1, y));
            }
          }
          cells.push(next);
        } else if (start >= 0) {
          runs.push({ x: start, y, cells });
          start = -1;
        }
      }
      if (start >= 0) runs.push({ x: start, y, cells });
    }
    return runs;
  }

  swap(): void {
    const displayed = this.backGrid;
    this.backGrid = this.frontGrid;
    this.frontGrid = displayed;
    this.fullRedraw = false;
  }

  /** Diffs the composed frame against the screen and makes it the new front. */
  present(): CellRun[] {
    const runs = this.diff();
    this.swap();
    return runs;
  }
}
