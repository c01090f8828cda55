import fs from 'node:fs';
import readline from 'node:readline';
import tty from 'node:tty';
import { ClosedSessionError, EmptyInputError } from '../session/errors.js';
import type { Session } from '../session/session.js';
import { FileNotFoundError } from './errors.js';

/** One item per line; surrounding whitespace is trimmed and blank lines are dropped. */
export function parseItemLines(content: string): string[] {
  const items: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length > 0) items.push(trimmed);
  }
  return items;
}

export function readItemsFromFile(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }
  const items = parseItemLines(fs.readFileSync(filePath, 'utf-8'));
  if (items.length === 0) {
    throw new EmptyInputError(filePath);
  }
  return items;
}

/** Direct items are taken as given, apart from dropping empty strings. */
export function readDirectItems(args: readonly string[]): string[] {
  const items = args.filter((arg) => arg.trim().length > 0);
  if (items.length === 0) {
    throw new EmptyInputError('the arguments');
  }
  return items;
}

export interface StreamFeed {
  /** Resolves once the first item is queued; rejects with `EmptyInputError` if input ends first. */
  ready: Promise<void>;
  /** Resolves with the number of items fed once input ends or the session closes. */
  done: Promise<number>;
  stop(): void;
}

/**
 * Feeds lines from `input` into `session` as they arrive and marks the end of input at
 * EOF. Stops reading as soon as the session is closed.
 */
export function streamItems(input: NodeJS.ReadableStream, session: Session, source = 'stdin'): StreamFeed {
  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });
  let count = 0;

  let resolveReady: () => void = () => undefined;
  let rejectReady: (error: Error) => void = () => undefined;
  const ready = new Promise<void>((resolve, reject) => {
    resolveReady = resolve;
    rejectReady = reject;
  });

  const done = new Promise<number>((resolve) => {
    rl.on('close', () => {
      if (count === 0) {
        rejectReady(new EmptyInputError(source));
      } else if (!session.isClosed) {
        session.endOfInput();
      }
      resolve(count);
    });
  });

  rl.on('line', (line) => {
    const text = line.trim();
    if (text.length === 0) return;
    try {
      session.add(text);
    } catch (error) {
      if (error instanceof ClosedSessionError) {
        rl.close();
        return;
      }
      throw error;
    }
    count += 1;
    if (count === 1) resolveReady();
  });

  return {
    ready,
    done,
    stop: () => rl.close(),
  };
}

/**
 * Keyboard input for when stdin carries the items. Returns null when there is no
 * controlling terminal.
 */
export function openTtyInput(): tty.ReadStream | null {
  try {
    const fd = fs.openSync('/dev/tty', 'r');
    return new tty.ReadStream(fd);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENXIO' || error.code === 'ENOENT')) {
      return null;
    }
    throw error;
  }
}
