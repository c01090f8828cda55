/**
 * ff - pick items interactively from a file, arguments or stdin
 */

import { loadConfig, resolveColorsEnabled, type Config } from '../config/loader.js';
import type { SelectionOutcome } from '../schema/index.js';
import { Session } from '../session/session.js';
import { runFinder, type FinderOptions } from '../tui/finder.js';
import type { HeightMode } from '../tui/layout.js';
import { KitTerminalBackend, type TerminalBackend } from '../tui/terminal.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, extractFlags, firstFlag, parseNumberFlag } from './flag-utils.js';
import { openTtyInput, readDirectItems, readItemsFromFile, streamItems } from './input-source.js';

export type ItemSource =
  | { kind: 'file'; path: string }
  | { kind: 'items'; items: string[] }
  | { kind: 'stdin' };

export interface PickFlags {
  multiSelect: boolean;
  showHelp: boolean;
  height?: number;
  heightPercentage?: number;
  prompt?: string;
  query?: string;
  configPath?: string;
}

export interface PickInvocation {
  flags: PickFlags;
  positionals: string[];
}

const BOOLEAN_FLAGS = ['--multi-select', '-m', '--no-help'] as const;
const VALUE_FLAGS = ['--height', '--height-percentage', '--prompt', '--query', '--config', '-c'] as const;

export function parsePickArgs(argv: readonly string[]): PickInvocation {
  // Everything after `--` is an item, even when it looks like a flag.
  const separator = argv.indexOf('--');
  const args = separator >= 0 ? argv.slice(0, separator) : [...argv];
  const literal = separator >= 0 ? argv.slice(separator + 1) : [];

  const booleans = extractBooleanFlags(args, BOOLEAN_FLAGS);
  const values = extractFlags(args, VALUE_FLAGS);

  const unknown = args.find((arg) => arg.startsWith('-') && arg !== '-');
  if (unknown !== undefined) {
    throw new CliUsageError(`Unknown option '${unknown}'. Use '--' before items that start with '-'.`);
  }

  const flags: PickFlags = {
    multiSelect: booleans.has('--multi-select') || booleans.has('-m'),
    showHelp: !booleans.has('--no-help'),
    height: parseNumberFlag('--height', values['--height'], { min: 1, integer: true }),
    heightPercentage: parseNumberFlag('--height-percentage', values['--height-percentage'], { min: 1, max: 100 }),
    prompt: values['--prompt'],
    query: values['--query'],
    configPath: firstFlag(values, ['--config', '-c']),
  };
  if (flags.height !== undefined && flags.heightPercentage !== undefined) {
    throw new CliUsageError("Use either '--height' or '--height-percentage', not both.");
  }

  return { flags, positionals: [...args, ...literal] };
}

function looksLikePath(arg: string): boolean {
  return arg.includes('/') || arg.includes('\\') || arg.includes('.');
}

/**
 * A single argument that looks like a path names a file; other arguments are items; no
 * arguments means stdin, which must then be piped.
 */
export function resolveItemSource(positionals: readonly string[], stdinIsTty: boolean): ItemSource {
  const [first] = positionals;
  if (first === undefined) {
    if (stdinIsTty) {
      throw new CliUsageError('Missing input: pass a file, some items, or pipe items on stdin.');
    }
    return { kind: 'stdin' };
  }
  if (positionals.length === 1 && looksLikePath(first)) {
    return { kind: 'file', path: first };
  }
  return { kind: 'items', items: [...positionals] };
}

export function resolveHeightMode(config: Config, flags: PickFlags): HeightMode {
  if (flags.height !== undefined) return { kind: 'fixed', rows: flags.height };
  if (flags.heightPercentage !== undefined) return { kind: 'percentage', percent: flags.heightPercentage };
  if (config.height !== undefined) return { kind: 'fixed', rows: config.height };
  if (config.heightPercentage !== undefined) return { kind: 'percentage', percent: config.heightPercentage };
  return { kind: 'fullscreen' };
}

/** Merges config file values with flags; flags win. */
export function buildFinderOptions(config: Config, flags: PickFlags, env: NodeJS.ProcessEnv = process.env): FinderOptions {
  return {
    prompt: flags.prompt ?? config.prompt,
    height: resolveHeightMode(config, flags),
    showHelp: flags.showHelp && config.showHelp,
    showStatus: config.showStatus,
    pollIntervalMs: config.pollIntervalMs,
    spinnerIntervalMs: config.spinnerIntervalMs,
    colors: resolveColorsEnabled(config, env),
    initialQuery: flags.query ?? '',
    cacheSize: config.cacheSize,
    grouping: config.grouping,
  };
}

/** Lines to print for an outcome, and the process exit code. */
export function formatOutcome(outcome: SelectionOutcome): { lines: string[]; exitCode: number } {
  if (outcome.kind === 'cancelled') return { lines: [], exitCode: 1 };
  return { lines: outcome.items, exitCode: 0 };
}

export interface PickCommandIo {
  stdin?: NodeJS.ReadableStream & { isTTY?: boolean };
  /** Replaces the terminal-kit backend, mainly for tests. */
  backend?: TerminalBackend;
  print?: (line: string) => void;
}

/** Runs `ff` and returns the exit code. */
export async function handlePickCommand(argv: readonly string[], io: PickCommandIo = {}): Promise<number> {
  const stdin = io.stdin ?? process.stdin;
  const print = io.print ?? ((line: string) => console.log(line));

  const { flags, positionals } = parsePickArgs(argv);
  const config = loadConfig(flags.configPath);
  const source = resolveItemSource(positionals, Boolean(stdin.isTTY));
  const session = new Session({
    multiSelect: flags.multiSelect || config.multiSelect,
    loadingMessage: config.loadingMessage,
    readyMessage: config.readyMessage,
  });

  let backend = io.backend;
  let ttyInput: ReturnType<typeof openTtyInput> = null;
  let feed: ReturnType<typeof streamItems> | null = null;

  try {
    if (source.kind === 'stdin') {
      feed = streamItems(stdin, session);
      await feed.ready;
      if (!backend) {
        ttyInput = openTtyInput();
        backend = new KitTerminalBackend(ttyInput ? { input: ttyInput } : {});
      }
    } else {
      const items = source.kind === 'file' ? readItemsFromFile(source.path) : readDirectItems(source.items);
      session.addBatch(items);
      session.endOfInput();
    }

    const outcome = await runFinder(session, buildFinderOptions(config, flags), backend);
    const { lines, exitCode } = formatOutcome(outcome);
    for (const line of lines) print(line);
    return exitCode;
  } finally {
    feed?.stop();
    ttyInput?.destroy();
  }
}
