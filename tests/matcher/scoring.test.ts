import { describe, expect, it } from 'vitest';
import {
  SUBSEQUENCE_CEILING,
  SUBSTRING_BASE,
  findSubsequence,
  findSubstring,
  normalizeText,
  scoreGap,
  scoreItem,
  scoreSubstring,
} from '../../src/matcher/scoring.js';

const chars = (text: string): string[] => normalizeText(text);

describe('normalizeText', () => {
  it('lower-cases per codepoint', () => {
    expect(normalizeText('ApPle')).toEqual(['a', 'p', 'p', 'l', 'e']);
  });

  it('keeps one entry per codepoint for astral characters', () => {
    expect(normalizeText('a😀B')).toEqual(['a', '😀', 'b']);
  });
});

describe('findSubstring', () => {
  it('returns the first start position', () => {
    expect(findSubstring(chars('banana'), chars('an'))).toBe(1);
  });

  it('returns -1 when absent', () => {
    expect(findSubstring(chars('cherry'), chars('ay'))).toBe(-1);
  });
});

describe('findSubsequence', () => {
  it('picks the tightest in-order window', () => {
    expect(findSubsequence(chars('axxbaxb'), chars('ab'))).toEqual({ positions: [4, 6], totalGap: 1 });
  });

  it('returns null when characters are out of order', () => {
    expect(findSubsequence(chars('ba'), chars('ab'))).toBeNull();
  });

  it('returns null for an empty query', () => {
    expect(findSubsequence(chars('abc'), [])).toBeNull();
  });
});

describe('scoreItem', () => {
  it('scores a substring match with position and coverage bonuses', () => {
    expect(scoreItem(chars('apple'), chars('ap'))).toEqual({ score: 1140, positions: [0, 1] });
  });

  it('scores a subsequence match by its gap', () => {
    expect(scoreItem(chars('banana'), chars('bn'))).toEqual({ score: 250, positions: [0, 2] });
  });

  it('matches case-insensitively', () => {
    expect(scoreItem(chars('APPLE'), chars('ap'))?.score).toBe(1140);
  });

  it('gives every item score 0 for an empty query', () => {
    expect(scoreItem(chars('anything'), [])).toEqual({ score: 0, positions: [] });
  });

  it('returns null when neither pass matches', () => {
    expect(scoreItem(chars('cherry'), chars('ay'))).toBeNull();
    expect(scoreItem(chars('ab'), chars('abc'))).toBeNull();
  });

  it('ranks earlier substring matches higher', () => {
    const early = scoreItem(chars('abxxxx'), chars('ab'));
    const late = scoreItem(chars('xxxxab'), chars('ab'));
    expect(early && late && early.score > late.score).toBe(true);
  });
});

describe('score tiers', () => {
  it('keeps every subsequence score below every substring score', () => {
    // Worst substring: match at the very end of a long item.
    expect(scoreSubstring(999, 1000, 1)).toBeGreaterThan(SUBSTRING_BASE);
    // Best subsequence that is not a substring has a gap of one.
    expect(scoreGap(1)).toBe(SUBSEQUENCE_CEILING / 2);
    expect(scoreGap(0)).toBeLessThan(SUBSTRING_BASE);
  });

  it('computes the substring bonuses', () => {
    expect(scoreSubstring(2, 10, 3)).toBeCloseTo(1110);
  });
});
