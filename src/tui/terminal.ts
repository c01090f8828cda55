import type tty from 'node:tty';
import terminalKit from 'terminal-kit';
import { RenderError } from '../session/errors.js';
import type { CellRun } from './buffer.js';
import { eraseRows, paintRuns, reserveRows, type PaintOptions, type PaintTarget } from './paint.js';

export type InputEvent = { kind: 'key'; name: string } | { kind: 'resize'; columns: number; rows: number };

export interface TerminalSize {
  columns: number;
  rows: number;
}

/**
 * Everything the finder needs from a terminal. The finder is the only writer while a
 * backend is started.
 */
export interface TerminalBackend {
  start(options: { fullscreen: boolean }): void;
  stop(): void;
  size(): TerminalSize;
  /** Resolves with the next event, or null once `timeoutMs` passes without one. */
  readEvent(timeoutMs: number): Promise<InputEvent | null>;
  /** Scrolls so the bottom `rows` screen rows are free. */
  reserveRows(rows: number): void;
  /** Blanks zero-based screen rows `fromRow` to `fromRow + count - 1`. */
  eraseRows(fromRow: number, count: number): void;
  drawRuns(runs: readonly CellRun[], options: PaintOptions): void;
  /** Zero-based. */
  moveCursor(row: number, column: number): void;
  setCursorVisible(visible: boolean): void;
}

/** Buffers input events for a single reader that polls with a timeout. */
export class InputQueue {
  private readonly pending: InputEvent[] = [];
  private waiter: ((event: InputEvent | null) => void) | null = null;
  private timer: NodeJS.Timeout | null = null;

  push(event: InputEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.settle();
      waiter(event);
      return;
    }
    this.pending.push(event);
  }

  next(timeoutMs: number): Promise<InputEvent | null> {
    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);
    // A new read replaces a stale waiter.
    this.flush();
    return new Promise((resolve) => {
      this.waiter = resolve;
      this.timer = setTimeout(() => {
        this.settle();
        resolve(null);
      }, Math.max(0, timeoutMs));
    });
  }

  get size(): number {
    return this.pending.length;
  }

  /** Releases a blocked reader with null. */
  flush(): void {
    const waiter = this.waiter;
    this.settle();
    waiter?.(null);
  }

  private settle(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.waiter = null;
  }
}

type Term = typeof terminalKit.terminal;

export interface KitTerminalBackendOptions {
  /** Keyboard source when stdin carries items, usually a stream on /dev/tty. */
  input?: tty.ReadStream;
  output?: NodeJS.WriteStream;
}

/** Draws and reads through terminal-kit: raw keys, the alternate screen, resize events. */
export class KitTerminalBackend implements TerminalBackend {
  private readonly input: tty.ReadStream | undefined;
  private readonly output: NodeJS.WriteStream;
  private readonly queue = new InputQueue();
  private term: Term | null = null;
  private fullscreen = false;
  private writeError: Error | null = null;

  constructor(options: KitTerminalBackendOptions = {}) {
    this.input = options.input;
    this.output = options.output ?? process.stdout;
  }

  private readonly onKey = (name: string): void => {
    this.queue.push({ kind: 'key', name });
  };

  private readonly onResize = (width: number, height: number): void => {
    this.queue.push({ kind: 'resize', columns: width, rows: height });
  };

  private readonly onOutputError = (error: Error): void => {
    this.writeError = error;
    this.queue.flush();
  };

  start(options: { fullscreen: boolean }): void {
    const inputIsTty = this.input ? this.input.isTTY : process.stdin.isTTY;
    if (!inputIsTty || !this.output.isTTY) {
      throw new RenderError('Interactive selection requires a TTY.');
    }

    const generic = process.env.TERM ?? 'xterm';
    const term =
      this.input || this.output !== process.stdout
        ? terminalKit.createTerminal({
            stdin: this.input ?? process.stdin,
            stdout: this.output,
            stderr: process.stderr,
            generic,
            appId: generic,
            appName: generic,
          })
        : terminalKit.terminal;
    this.term = term;

    this.output.on('error', this.onOutputError);
    this.fullscreen = options.fullscreen;
    if (options.fullscreen) term.fullscreen(true);
    term.grabInput(true);
    term.on('key', this.onKey);
    term.on('resize', this.onResize);
  }

  stop(): void {
    const term = this.term;
    this.queue.flush();
    this.output.removeListener('error', this.onOutputError);
    if (!term) return;
    this.term = null;
    term.removeListener('key', this.onKey);
    term.removeListener('resize', this.onResize);
    term.grabInput(false);
    if (this.fullscreen) term.fullscreen(false);
  }

  size(): { columns: number; rows: number } {
    return {
      columns: this.term?.width ?? this.output.columns ?? 80,
      rows: this.term?.height ?? this.output.rows ?? 24,
    };
  }

  readEvent(timeoutMs: number): Promise<InputEvent | null> {
    if (this.writeError) {
      return Promise.reject(new RenderError('Terminal output failed.', { cause: this.writeError }));
    }
    return this.queue.next(timeoutMs);
  }

  reserveRows(rows: number): void {
    reserveRows(this.target(), rows);
  }

  eraseRows(fromRow: number, count: number): void {
    eraseRows(this.target(), fromRow, count);
  }

  drawRuns(runs: readonly CellRun[], options: PaintOptions): void {
    paintRuns(this.target(), runs, options);
  }

  moveCursor(row: number, column: number): void {
    this.target().moveTo(column + 1, row + 1);
  }

  setCursorVisible(visible: boolean): void {
    this.target().hideCursor(!visible);
  }

  private target(): PaintTarget {
    if (this.writeError) {
      throw new RenderError('Terminal output failed.', { cause: this.writeError });
    }
    if (!this.term) {
      throw new RenderError('Terminal is not started.');
    }
    return this.term;
  }
}
