import type { GlobalStatus, Indicator, IndicatorKey } from '../schema/index.js';

export type Mutation =
  | { kind: 'addItems'; texts: readonly string[]; indicator?: Indicator }
  | { kind: 'setIndicator'; key: IndicatorKey; indicator: Indicator }
  | { kind: 'setStatus'; status: GlobalStatus };

/**
 * MutationQueue - the session's single serialization point.
 *
 * Producers enqueue from any async task; the renderer drains everything pending once per
 * tick and applies it in enqueue order.
 */
export class MutationQueue {
  private items: Mutation[] = [];

  enqueue(mutation: Mutation): void {
    this.items.push(mutation);
  }

  /**
   * Takes every pending mutation, leaving the queue empty.
   */
  drain(): Mutation[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get length(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
