import {
  GlobalStatusSchema,
  IndicatorKeySchema,
  IndicatorSchema,
  type GlobalStatus,
  type Indicator,
  type IndicatorKey,
  type SelectionOutcome,
} from '../schema/index.js';
import { ClosedSessionError, RenderError } from './errors.js';
import { ItemStore } from './item-store.js';
import { MutationQueue } from './mutation-queue.js';

export interface SessionOptions {
  multiSelect?: boolean;
  /** Shown next to the spinner while producers are still adding items. */
  loadingMessage?: string;
  /** Shown once `endOfInput()` has been merged. */
  readyMessage?: string;
}

export interface MergeSummary {
  addedItems: readonly string[];
  indicatorsChanged: boolean;
  statusChanged: boolean;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * One interactive find operation.
 *
 * Producers call `add`, `addBatch`, `setIndicator`, `setGlobalStatus` and `endOfInput`
 * from any number of async tasks; each call only enqueues. The renderer calls `merge()`
 * once per tick to apply everything pending, in enqueue order, to the item store.
 *
 * The session ends exactly once, through `finish`, `cancel` or `fail`. After that every
 * producer call throws `ClosedSessionError`.
 */
export class Session {
  readonly multiSelect: boolean;
  private readonly queue = new MutationQueue();
  private readonly store: ItemStore;
  private readonly readyMessage: string | undefined;
  private readonly result = createDeferred<SelectionOutcome>();
  private closed = false;

  constructor(options: SessionOptions = {}) {
    this.multiSelect = options.multiSelect ?? false;
    this.readyMessage = options.readyMessage;
    this.store = new ItemStore({ kind: 'loading', message: options.loadingMessage });
    // Rejections reach callers through awaitResult(); this keeps an unobserved failure
    // from surfacing as an unhandled rejection.
    this.result.promise.catch(() => undefined);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items merged so far, in insertion order. */
  get items(): readonly string[] {
    return this.store.items;
  }

  get status(): GlobalStatus {
    return this.store.status;
  }

  get pendingMutations(): number {
    return this.queue.length;
  }

  indicatorFor(index: number): Indicator | undefined {
    return this.store.indicatorFor(index);
  }

  hasAnimatedIndicators(): boolean {
    return this.store.status.kind === 'loading' || this.store.hasSpinner();
  }

  add(text: string, indicator?: Indicator): void {
    this.assertOpen('add an item');
    const parsed = indicator === undefined ? undefined : IndicatorSchema.parse(indicator);
    this.queue.enqueue({ kind: 'addItems', texts: [text], indicator: parsed });
  }

  addBatch(texts: readonly string[]): void {
    this.assertOpen('add items');
    if (texts.length === 0) return;
    this.queue.enqueue({ kind: 'addItems', texts: [...texts] });
  }

  setIndicator(key: IndicatorKey, indicator: Indicator): void {
    this.assertOpen('set an indicator');
    this.queue.enqueue({
      kind: 'setIndicator',
      key: IndicatorKeySchema.parse(key),
      indicator: IndicatorSchema.parse(indicator),
    });
  }

  setGlobalStatus(status: GlobalStatus): void {
    this.assertOpen('set the global status');
    this.queue.enqueue({ kind: 'setStatus', status: GlobalStatusSchema.parse(status) });
  }

  /** Producers are done; the status switches to ready once merged. */
  endOfInput(): void {
    this.assertOpen('end the input');
    this.queue.enqueue({ kind: 'setStatus', status: { kind: 'ready', message: this.readyMessage } });
  }

  merge(): MergeSummary {
    const addedItems: string[] = [];
    let indicatorsChanged = false;
    let statusChanged = false;

    for (const mutation of this.queue.drain()) {
      switch (mutation.kind) {
        case 'addItems': {
          const first = this.store.append(mutation.texts);
          for (const text of mutation.texts) addedItems.push(text);
          if (mutation.indicator && mutation.indicator.kind !== 'none') {
            this.store.setIndicator(first, mutation.indicator);
            indicatorsChanged = true;
          }
          break;
        }
        case 'setIndicator':
          this.store.setIndicator(mutation.key, mutation.indicator);
          indicatorsChanged = true;
          break;
        case 'setStatus':
          this.store.status = mutation.status;
          statusChanged = true;
          break;
      }
    }

    return { addedItems, indicatorsChanged, statusChanged };
  }

  finish(outcome: SelectionOutcome): void {
    if (this.closed) return;
    this.close();
    this.result.resolve(outcome);
  }

  cancel(): void {
    this.finish({ kind: 'cancelled' });
  }

  fail(error: RenderError): void {
    if (this.closed) return;
    this.close();
    this.result.reject(error);
  }

  /**
   * Resolves with the outcome once the session has ended; rejects with the `RenderError`
   * that aborted it, if any.
   */
  awaitResult(): Promise<SelectionOutcome> {
    return this.result.promise;
  }

  private close(): void {
    this.closed = true;
    this.queue.clear();
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new ClosedSessionError(operation);
    }
  }
}
