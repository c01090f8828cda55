import type { FilterResult } from '../matcher/filter.js';
import { Matcher, type GroupingOptions } from '../matcher/matcher.js';
import type { SelectionOutcome } from '../schema/index.js';
import { EmptyInputError, RenderError } from '../session/errors.js';
import { Session } from '../session/session.js';
import { DoubleBuffer } from './buffer.js';
import { composeFrame } from './frame.js';
import { resolveKeyAction } from './key-policy.js';
import { getWindowSize, resolveHeight, scrollToCursor, type HeightMode } from './layout.js';
import { applySelectionAction, clampCursor, createFinderState, type FinderState } from './selection.js';
import { KitTerminalBackend, type InputEvent, type TerminalBackend } from './terminal.js';

export type FinderPhase = 'init' | 'running' | 'selecting' | 'cancelled' | 'terminated';

export interface FinderOptions {
  prompt?: string;
  height?: HeightMode;
  showHelp?: boolean;
  showStatus?: boolean;
  /** Upper bound on how long one tick waits for input. */
  pollIntervalMs?: number;
  spinnerIntervalMs?: number;
  colors?: boolean;
  initialQuery?: string;
  cacheSize?: number;
  grouping?: GroupingOptions;
  /** Aborting cancels the session. */
  signal?: AbortSignal;
  /** Clock for spinner animation. */
  now?: () => number;
}

export const DEFAULT_PROMPT = '> ';
export const DEFAULT_POLL_INTERVAL_MS = 50;
export const DEFAULT_SPINNER_INTERVAL_MS = 80;

interface ResolvedOptions {
  prompt: string;
  height: HeightMode;
  showHelp: boolean;
  showStatus: boolean;
  pollIntervalMs: number;
  spinnerIntervalMs: number;
  colors: boolean;
  now: () => number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toRenderError(error: unknown): RenderError {
  if (error instanceof RenderError) return error;
  return new RenderError(`Rendering failed: ${errorMessage(error)}`, { cause: error });
}

/**
 * The render loop. Each tick merges pending session mutations, re-filters when the item
 * set or query changed, paints the frame diff, then waits up to one poll interval for
 * input and dispatches it.
 */
export class FinderRenderer {
  private currentPhase: FinderPhase = 'init';
  private readonly options: ResolvedOptions;
  private readonly matcher: Matcher;
  private state: FinderState;
  private result: FilterResult = [];
  private offset = 0;
  private needsFilter = true;
  /** Set when something on screen may have changed since the last paint. */
  private dirty = true;
  private readonly buffer = new DoubleBuffer(0, 0);
  private originRow = 0;
  private readonly startedAt: number;
  private readonly signal: AbortSignal | undefined;

  constructor(
    private readonly session: Session,
    options: FinderOptions,
    private readonly backend: TerminalBackend
  ) {
    this.signal = options.signal;
    this.options = {
      prompt: options.prompt ?? DEFAULT_PROMPT,
      height: options.height ?? { kind: 'fullscreen' },
      showHelp: options.showHelp ?? true,
      showStatus: options.showStatus ?? true,
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      spinnerIntervalMs: options.spinnerIntervalMs ?? DEFAULT_SPINNER_INTERVAL_MS,
      colors: options.colors ?? true,
      now: options.now ?? Date.now,
    };
    this.matcher = new Matcher({ cacheSize: options.cacheSize, grouping: options.grouping });
    this.state = createFinderState(session.multiSelect, options.initialQuery ?? '');
    this.startedAt = this.options.now();
  }

  get phase(): FinderPhase {
    return this.currentPhase;
  }

  get finderState(): FinderState {
    return this.state;
  }

  get filterResult(): FilterResult {
    return this.result;
  }

  private get fullscreen(): boolean {
    return this.options.height.kind === 'fullscreen';
  }

  private readonly onAbort = (): void => {
    this.session.cancel();
  };

  async run(): Promise<SelectionOutcome> {
    const outcome = this.session.awaitResult();
    if (this.signal?.aborted) {
      this.session.cancel();
      this.currentPhase = 'terminated';
      return outcome;
    }
    this.signal?.addEventListener('abort', this.onAbort, { once: true });

    let started = false;
    try {
      this.start();
      started = true;
      while (this.currentPhase === 'running') {
        await this.tick();
      }
    } catch (error) {
      this.session.fail(toRenderError(error));
    } finally {
      this.signal?.removeEventListener('abort', this.onAbort);
      try {
        if (started) this.shutdown();
      } catch (error) {
        this.session.fail(toRenderError(error));
      }
      this.currentPhase = 'terminated';
    }
    return outcome;
  }

  private start(): void {
    this.backend.start({ fullscreen: this.fullscreen });
    this.currentPhase = 'running';
    this.backend.setCursorVisible(false);
    if (!this.fullscreen) {
      const { rows } = this.backend.size();
      this.backend.reserveRows(resolveHeight(this.options.height, rows));
    }
  }

  private shutdown(): void {
    try {
      if (!this.fullscreen && this.buffer.height > 0) {
        this.backend.eraseRows(this.originRow, this.buffer.height);
        this.backend.moveCursor(this.originRow, 0);
      }
      this.backend.setCursorVisible(true);
    } finally {
      this.backend.stop();
    }
  }

  /** One iteration: merge, re-filter, render, poll, dispatch. */
  async tick(): Promise<void> {
    this.mergePending();
    if (this.needsFilter) this.refilter();
    if (this.dirty || this.session.hasAnimatedIndicators()) this.render();

    const event = await this.backend.readEvent(this.pollTimeout());
    if (this.session.isClosed) {
      // Ended from outside: session.cancel() or the abort signal.
      if (this.currentPhase === 'running') this.currentPhase = 'cancelled';
      return;
    }
    if (event) this.dispatch(event);
  }

  private pollTimeout(): number {
    if (!this.session.hasAnimatedIndicators()) return this.options.pollIntervalMs;
    return Math.min(this.options.pollIntervalMs, this.options.spinnerIntervalMs);
  }

  private mergePending(): void {
    const summary = this.session.merge();
    if (summary.addedItems.length > 0) {
      this.matcher.append(summary.addedItems);
      this.needsFilter = true;
    }
    if (summary.indicatorsChanged || summary.statusChanged) this.dirty = true;
  }

  private refilter(): void {
    this.result = this.matcher.filter(this.state.query.value);
    this.state = { ...this.state, cursor: clampCursor(this.state.cursor, this.result.length) };
    this.needsFilter = false;
    this.dirty = true;
  }

  private render(): void {
    const { columns, rows } = this.backend.size();
    const height = resolveHeight(this.options.height, rows);
    const previousOrigin = this.originRow;
    const previousHeight = this.buffer.height;

    if (this.buffer.resize(columns, height) && !this.fullscreen && previousHeight > 0) {
      this.backend.eraseRows(previousOrigin, previousHeight);
    }
    this.originRow = this.fullscreen ? 0 : Math.max(0, rows - height);

    if (this.buffer.needsFullRedraw) {
      this.backend.eraseRows(this.originRow, height);
    }

    const windowSize = getWindowSize(height, { showHelp: this.options.showHelp });
    this.offset = scrollToCursor(this.offset, this.state.cursor, windowSize, this.result.length);

    composeFrame(this.buffer.back, {
      prompt: this.options.prompt,
      query: this.state.query,
      status: this.options.showStatus ? this.session.status : null,
      items: this.session.items,
      result: this.result,
      cursor: this.state.cursor,
      offset: this.offset,
      multiSelect: this.state.multiSelect,
      selected: this.state.selected,
      indicatorFor: (index) => this.session.indicatorFor(index),
      showHelp: this.options.showHelp,
      tick: Math.floor((this.options.now() - this.startedAt) / Math.max(1, this.options.spinnerIntervalMs)),
    });

    const runs = this.buffer.present();
    if (runs.length > 0) this.backend.drawRuns(runs, { originRow: this.originRow, colors: this.options.colors });
    this.dirty = false;
  }

  private dispatch(event: InputEvent): void {
    this.dirty = true;
    if (event.kind === 'resize') {
      this.buffer.invalidate();
      return;
    }

    const windowSize = getWindowSize(this.buffer.height, { showHelp: this.options.showHelp });
    const actions = resolveKeyAction(event.name, {
      multiSelect: this.state.multiSelect,
      pageSize: windowSize,
    });

    for (const action of actions) {
      const next = applySelectionAction(this.state, action, { result: this.result, items: this.session.items });
      this.state = next.state;
      if (next.queryChanged) {
        this.state = { ...this.state, cursor: 0 };
        this.offset = 0;
        this.refilter();
      }
      if (next.outcome) {
        this.session.finish(next.outcome);
        this.currentPhase = next.outcome.kind === 'cancelled' ? 'cancelled' : 'selecting';
        return;
      }
    }
  }
}

/** Runs the finder loop over `session` until it ends, then resolves with the outcome. */
export function runFinder(
  session: Session,
  options: FinderOptions = {},
  backend: TerminalBackend = new KitTerminalBackend()
): Promise<SelectionOutcome> {
  return new FinderRenderer(session, options, backend).run();
}

export interface PickOptions extends FinderOptions {
  multiSelect?: boolean;
  loadingMessage?: string;
  readyMessage?: string;
}

/** One-shot selection over a fixed item list. */
export function pick(
  items: readonly string[],
  options: PickOptions = {},
  backend?: TerminalBackend
): Promise<SelectionOutcome> {
  if (items.length === 0) {
    return Promise.reject(new EmptyInputError('the item list'));
  }
  const session = new Session({
    multiSelect: options.multiSelect,
    loadingMessage: options.loadingMessage,
    readyMessage: options.readyMessage,
  });
  session.addBatch(items);
  session.endOfInput();
  return runFinder(session, options, backend);
}
