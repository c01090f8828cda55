import type { CellRun } from '../../src/tui/buffer.js';
import type { PaintOptions } from '../../src/tui/paint.js';
import type { InputEvent, TerminalBackend, TerminalSize } from '../../src/tui/terminal.js';

/** A scripted event, or a callback run when the finder polls for it. */
export type ScriptStep = InputEvent | null | (() => InputEvent | null);

export const key = (name: string): InputEvent => ({ kind: 'key', name });

export type BackendCall =
  | { op: 'reserveRows'; rows: number }
  | { op: 'eraseRows'; fromRow: number; count: number }
  | { op: 'draw'; runs: readonly CellRun[]; originRow: number; colors: boolean }
  | { op: 'moveCursor'; row: number; column: number }
  | { op: 'cursor'; visible: boolean };

/** Text of a run, skipping the second half of wide characters. */
export function runText(run: CellRun): string {
  return run.cells
    .filter((cell) => !cell.continuation)
    .map((cell) => cell.char)
    .join('');
}

/** Terminal stand-in that replays a fixed list of input events and records draw calls. */
export class ScriptedBackend implements TerminalBackend {
  readonly calls: BackendCall[] = [];
  started = false;
  stopped = false;
  fullscreen: boolean | null = null;

  constructor(
    private readonly script: ScriptStep[],
    private readonly terminalSize: TerminalSize = { columns: 40, rows: 10 }
  ) {}

  /** Every draw call, in order. */
  get draws(): Extract<BackendCall, { op: 'draw' }>[] {
    const draws: Extract<BackendCall, { op: 'draw' }>[] = [];
    for (const call of this.calls) {
      if (call.op === 'draw') draws.push(call);
    }
    return draws;
  }

  /** Text of every run drawn so far. */
  drawnText(): string[] {
    return this.draws.flatMap((draw) => draw.runs.map(runText));
  }

  start(options: { fullscreen: boolean }): void {
    this.started = true;
    this.fullscreen = options.fullscreen;
  }

  stop(): void {
    this.stopped = true;
  }

  size(): TerminalSize {
    return this.terminalSize;
  }

  readEvent(): Promise<InputEvent | null> {
    const step = this.script.shift();
    if (step === undefined) {
      return Promise.reject(new Error('input script exhausted'));
    }
    const event = typeof step === 'function' ? step() : step;
    return Promise.resolve(event);
  }

  reserveRows(rows: number): void {
    this.calls.push({ op: 'reserveRows', rows });
  }

  eraseRows(fromRow: number, count: number): void {
    this.calls.push({ op: 'eraseRows', fromRow, count });
  }

  drawRuns(runs: readonly CellRun[], options: PaintOptions): void {
    this.calls.push({ op: 'draw', runs: [...runs], originRow: options.originRow, colors: options.colors });
  }

  moveCursor(row: number, column: number): void {
    this.calls.push({ op: 'moveCursor', row, column });
  }

  setCursorVisible(visible: boolean): void {
    this.calls.push({ op: 'cursor', visible });
  }
}
