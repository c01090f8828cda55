import { filterNormalized, type FilterResult } from './filter.js';
import { LRUCache } from './lru-cache.js';
import { normalizeText } from './scoring.js';
import { SimilarityIndex } from './similarity.js';

export interface GroupingOptions {
  enabled: boolean;
  /** Minimum item count before grouping kicks in. */
  threshold: number;
}

export interface MatcherOptions {
  cacheSize?: number;
  grouping?: GroupingOptions;
}

export const DEFAULT_CACHE_SIZE = 64;

/**
 * Stateful front of the matching engine: keeps normalized item text, a per-query result
 * cache, and (optionally) a similarity index. One matcher belongs to one session.
 */
export class Matcher {
  private readonly normalized: string[][] = [];
  private readonly cache: LRUCache<string, FilterResult>;
  private readonly similarity: SimilarityIndex | null;
  private readonly groupingThreshold: number;

  constructor(options: MatcherOptions = {}) {
    this.cache = new LRUCache(options.cacheSize ?? DEFAULT_CACHE_SIZE);
    const grouping = options.grouping;
    this.similarity = grouping?.enabled ? new SimilarityIndex() : null;
    this.groupingThreshold = grouping?.threshold ?? Number.POSITIVE_INFINITY;
  }

  get size(): number {
    return this.normalized.length;
  }

  get cachedQueries(): number {
    return this.cache.size;
  }

  append(texts: readonly string[]): void {
    if (texts.length === 0) return;
    for (const text of texts) {
      const chars = normalizeText(text);
      this.similarity?.add(this.normalized.length, chars);
      this.normalized.push(chars);
    }
    this.invalidate();
  }

  invalidate(): void {
    this.cache.clear();
  }

  get groupingActive(): boolean {
    return this.similarity !== null && this.normalized.length >= this.groupingThreshold;
  }

  filter(query: string): FilterResult {
    const cached = this.cache.get(query);
    if (cached) return cached;

    const normalizedQuery = normalizeText(query);
    const similarity = this.similarity;
    const result =
      similarity && this.groupingActive && normalizedQuery.length > 0
        ? filterNormalized(this.normalized, normalizedQuery, {
            candidates: similarity.candidates(normalizedQuery),
            tieRank: (index) => similarity.bucketOf(index),
          })
        : filterNormalized(this.normalized, normalizedQuery);

    this.cache.set(query, result);
    return result;
  }
}
