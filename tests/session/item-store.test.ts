import { describe, expect, it } from 'vitest';
import { ItemStore } from '../../src/session/item-store.js';

describe('ItemStore', () => {
  it('appends and returns the first new index', () => {
    const store = new ItemStore({ kind: 'loading' });
    expect(store.append(['a', 'b'])).toBe(0);
    expect(store.append(['c'])).toBe(2);
    expect(store.items).toEqual(['a', 'b', 'c']);
  });

  it('removes an indicator when set to none', () => {
    const store = new ItemStore({ kind: 'loading' });
    store.append(['a']);
    store.setIndicator(0, { kind: 'spinner' });
    expect(store.hasSpinner()).toBe(true);
    store.setIndicator(0, { kind: 'none' });
    expect(store.indicatorFor(0)).toBeUndefined();
    expect(store.hasSpinner()).toBe(false);
  });

  it('falls back to the text key once the index key is removed', () => {
    const store = new ItemStore({ kind: 'ready' });
    store.append(['a']);
    store.setIndicator('a', { kind: 'success' });
    store.setIndicator(0, { kind: 'error' });
    expect(store.indicatorFor(0)).toEqual({ kind: 'error' });
    store.setIndicator(0, { kind: 'none' });
    expect(store.indicatorFor(0)).toEqual({ kind: 'success' });
  });

  it('has no indicator for unknown indices', () => {
    const store = new ItemStore({ kind: 'ready' });
    expect(store.indicatorFor(3)).toBeUndefined();
  });
});
