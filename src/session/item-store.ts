import type { GlobalStatus, Indicator, IndicatorKey } from '../schema/index.js';

/**
 * Canonical item list plus indicator and status state. Only the session writes to it,
 * and only while merging drained mutations.
 */
export class ItemStore {
  private readonly texts: string[] = [];
  private readonly indicatorsByText = new Map<string, Indicator>();
  private readonly indicatorsByIndex = new Map<number, Indicator>();
  private currentStatus: GlobalStatus;

  constructor(initialStatus: GlobalStatus) {
    this.currentStatus = initialStatus;
  }

  get items(): readonly string[] {
    return this.texts;
  }

  get status(): GlobalStatus {
    return this.currentStatus;
  }

  set status(status: GlobalStatus) {
    this.currentStatus = status;
  }

  /** Appends texts and returns the index of the first one. */
  append(texts: readonly string[]): number {
    const first = this.texts.length;
    for (const text of texts) this.texts.push(text);
    return first;
  }

  setIndicator(key: IndicatorKey, indicator: Indicator): void {
    if (typeof key === 'number') {
      if (indicator.kind === 'none') this.indicatorsByIndex.delete(key);
      else this.indicatorsByIndex.set(key, indicator);
      return;
    }
    if (indicator.kind === 'none') this.indicatorsByText.delete(key);
    else this.indicatorsByText.set(key, indicator);
  }

  /** An index-keyed indicator wins over one keyed by the item's text. */
  indicatorFor(index: number): Indicator | undefined {
    const byIndex = this.indicatorsByIndex.get(index);
    if (byIndex) return byIndex;
    const text = this.texts[index];
    return text === undefined ? undefined : this.indicatorsByText.get(text);
  }

  hasSpinner(): boolean {
    for (const indicator of this.indicatorsByIndex.values()) {
      if (indicator.kind === 'spinner') return true;
    }
    for (const indicator of this.indicatorsByText.values()) {
      if (indicator.kind === 'spinner') return true;
    }
    return false;
  }
}
