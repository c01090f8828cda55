/**
 * Scoring for the two match passes.
 *
 * Every substring score lies above `SUBSTRING_BASE`; every subsequence score lies at or
 * below `SUBSEQUENCE_CEILING / 2` (a subsequence that is not a substring has a gap of at
 * least one), so the two tiers never interleave.
 */

export const SUBSTRING_BASE = 1000;
export const POSITION_WEIGHT = 100;
export const COVERAGE_WEIGHT = 100;
export const SUBSEQUENCE_CEILING = 500;

export interface MatchScore {
  score: number;
  /** Matched character positions, in codepoints of the original text. */
  positions: number[];
}

/**
 * Lower-cases per codepoint so that index `i` of the result always refers to codepoint `i`
 * of the input, even for characters whose lower-case form is longer.
 */
export function normalizeText(text: string): string[] {
  return Array.from(text, (ch) => ch.toLowerCase());
}

export function findSubstring(item: readonly string[], query: readonly string[]): number {
  const last = item.length - query.length;
  for (let start = 0; start <= last; start++) {
    let matched = true;
    for (let offset = 0; offset < query.length; offset++) {
      if (item[start + offset] !== query[offset]) {
        matched = false;
        break;
      }
    }
    if (matched) return start;
  }
  return -1;
}

export function scoreSubstring(start: number, itemLength: number, queryLength: number): number {
  const position = POSITION_WEIGHT * (1 - start / itemLength);
  const coverage = COVERAGE_WEIGHT * (queryLength / itemLength);
  return SUBSTRING_BASE + position + coverage;
}

export function scoreGap(totalGap: number): number {
  return SUBSEQUENCE_CEILING / (1 + totalGap);
}

function matchForward(item: readonly string[], query: readonly string[], start: number): number[] | null {
  const positions = [start];
  let cursor = start + 1;
  for (let qi = 1; qi < query.length; qi++) {
    while (cursor < item.length && item[cursor] !== query[qi]) cursor++;
    if (cursor >= item.length) return null;
    positions.push(cursor);
    cursor++;
  }
  return positions;
}

/**
 * Finds the tightest in-order window holding every query character.
 * Greedy forward matching from each candidate start gives the earliest possible end for
 * that start; once one start fails, every later start fails too.
 */
export function findSubsequence(
  item: readonly string[],
  query: readonly string[]
): { positions: number[]; totalGap: number } | null {
  if (query.length === 0 || query.length > item.length) return null;

  let best: number[] | null = null;
  let bestSpan = Number.POSITIVE_INFINITY;

  for (let start = 0; start <= item.length - query.length; start++) {
    if (item[start] !== query[0]) continue;
    const positions = matchForward(item, query, start);
    if (!positions) break;
    const end = positions[positions.length - 1] ?? start;
    const span = end - start + 1;
    if (span < bestSpan) {
      best = positions;
      bestSpan = span;
      if (span === query.length) break;
    }
  }

  if (!best) return null;
  return { positions: best, totalGap: bestSpan - query.length };
}

export function scoreItem(item: readonly string[], query: readonly string[]): MatchScore | null {
  if (query.length === 0) return { score: 0, positions: [] };
  if (item.length < query.length) return null;

  const start = findSubstring(item, query);
  if (start >= 0) {
    const positions = Array.from({ length: query.length }, (_, i) => start + i);
    return { score: scoreSubstring(start, item.length, query.length), positions };
  }

  const subsequence = findSubsequence(item, query);
  if (!subsequence) return null;
  return { score: scoreGap(subsequence.totalGap), positions: subsequence.positions };
}
