import { describe, expect, it } from 'vitest';
import { compareMatches, filterItems } from '../../src/matcher/filter.js';

const FRUIT = ['apple', 'banana', 'cherry'];

describe('filterItems', () => {
  it('keeps only matching items', () => {
    expect(filterItems(FRUIT, 'ap')).toEqual([{ index: 0, score: 1140, positions: [0, 1] }]);
  });

  it('returns nothing when no item matches', () => {
    expect(filterItems(FRUIT, 'ay')).toEqual([]);
  });

  it('returns every item in insertion order for an empty query', () => {
    expect(filterItems(FRUIT, '')).toEqual([
      { index: 0, score: 0, positions: [] },
      { index: 1, score: 0, positions: [] },
      { index: 2, score: 0, positions: [] },
    ]);
  });

  it('ranks substring matches above subsequence matches', () => {
    const result = filterItems(['xaxb', 'ab xyz'], 'ab');
    expect(result.map((m) => m.index)).toEqual([1, 0]);
  });

  it('breaks score ties by insertion order', () => {
    expect(filterItems(['same', 'other', 'same'], 'same').map((m) => m.index)).toEqual([0, 2]);
  });

  it('is idempotent', () => {
    expect(filterItems(FRUIT, 'an')).toEqual(filterItems(FRUIT, 'an'));
  });

  it('returns an empty result for an empty item set', () => {
    expect(filterItems([], 'x')).toEqual([]);
  });
});

describe('compareMatches', () => {
  it('orders equal scores by tie rank before index', () => {
    const a = { index: 0, score: 10, positions: [] };
    const b = { index: 1, score: 10, positions: [] };
    const rank = (index: number): number => (index === 1 ? 0 : 1);
    expect(compareMatches(a, b)).toBeLessThan(0);
    expect(compareMatches(a, b, rank)).toBeGreaterThan(0);
  });
});
