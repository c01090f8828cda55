import { describe, expect, it } from 'vitest';
import { getReservedRows, getWindowSize, resolveHeight, scrollToCursor } from '../../src/tui/layout.js';

describe('resolveHeight', () => {
  it('uses the whole terminal in fullscreen mode', () => {
    expect(resolveHeight({ kind: 'fullscreen' }, 24)).toBe(24);
  });

  it('caps a fixed height at the terminal height', () => {
    expect(resolveHeight({ kind: 'fixed', rows: 10 }, 24)).toBe(10);
    expect(resolveHeight({ kind: 'fixed', rows: 40 }, 24)).toBe(24);
  });

  it('takes a share of the terminal, at least one row', () => {
    expect(resolveHeight({ kind: 'percentage', percent: 50 }, 24)).toBe(12);
    expect(resolveHeight({ kind: 'percentage', percent: 1 }, 24)).toBe(1);
    expect(resolveHeight({ kind: 'percentage', percent: 100 }, 24)).toBe(24);
  });
});

describe('window size', () => {
  it('reserves the prompt and the optional help line', () => {
    expect(getReservedRows({ showHelp: true })).toBe(2);
    expect(getReservedRows({ showHelp: false })).toBe(1);
    expect(getWindowSize(10, { showHelp: true })).toBe(8);
    expect(getWindowSize(1, { showHelp: true })).toBe(0);
  });
});

describe('scrollToCursor', () => {
  it('scrolls down just enough to show the cursor', () => {
    expect(scrollToCursor(0, 5, 3, 10)).toBe(3);
  });

  it('scrolls up to the cursor', () => {
    expect(scrollToCursor(3, 1, 3, 10)).toBe(1);
  });

  it('keeps the offset while the cursor is visible', () => {
    expect(scrollToCursor(2, 3, 3, 10)).toBe(2);
  });

  it('pulls the offset back when the result shrinks', () => {
    expect(scrollToCursor(8, 1, 3, 4)).toBe(1);
    expect(scrollToCursor(0, 0, 0, 5)).toBe(0);
  });
});
