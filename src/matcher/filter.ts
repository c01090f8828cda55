import { normalizeText, scoreItem } from './scoring.js';

export interface FilterMatch {
  /** Original insertion index of the item. */
  index: number;
  score: number;
  positions: readonly number[];
}

export type FilterResult = readonly FilterMatch[];

export interface FilterPlan {
  /** Restricts scoring to these indices; defaults to every item. */
  candidates?: Iterable<number>;
  /** Secondary sort key for equal scores, ahead of insertion order. */
  tieRank?: (index: number) => number;
}

export function compareMatches(a: FilterMatch, b: FilterMatch, tieRank?: (index: number) => number): number {
  if (a.score !== b.score) return b.score - a.score;
  if (tieRank) {
    const rankDiff = tieRank(a.index) - tieRank(b.index);
    if (rankDiff !== 0) return rankDiff;
  }
  return a.index - b.index;
}

export function filterNormalized(
  items: readonly (readonly string[])[],
  query: readonly string[],
  plan: FilterPlan = {}
): FilterResult {
  if (query.length === 0) {
    return items.map((_, index) => ({ index, score: 0, positions: [] }));
  }

  const matches: FilterMatch[] = [];
  const indices = plan.candidates ?? items.keys();
  for (const index of indices) {
    const item = items[index];
    if (!item) continue;
    const scored = scoreItem(item, query);
    if (scored) matches.push({ index, score: scored.score, positions: scored.positions });
  }

  const tieRank = plan.tieRank;
  matches.sort((a, b) => compareMatches(a, b, tieRank));
  return matches;
}

/**
 * Ranks `items` against `query`, case-insensitively.
 * Empty query keeps every item in insertion order.
 */
export function filterItems(items: readonly string[], query: string): FilterResult {
  return filterNormalized(items.map(normalizeText), normalizeText(query));
}
