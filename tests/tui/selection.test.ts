import { describe, expect, it } from 'vitest';
import { filterItems } from '../../src/matcher/filter.js';
import {
  applySelectionAction,
  clampCursor,
  createFinderState,
  type FinderState,
  type SelectionAction,
  type SelectionView,
} from '../../src/tui/selection.js';

function viewOf(items: string[], query = ''): SelectionView {
  return { items, result: filterItems(items, query) };
}

function applyAll(state: FinderState, actions: SelectionAction[], view: SelectionView) {
  let current = applySelectionAction(state, { kind: 'move', delta: 0 }, view);
  for (const action of actions) {
    current = applySelectionAction(current.state, action, view);
    if (current.outcome) break;
  }
  return current;
}

describe('clampCursor', () => {
  it('keeps the cursor inside the result', () => {
    expect(clampCursor(5, 3)).toBe(2);
    expect(clampCursor(-1, 3)).toBe(0);
    expect(clampCursor(4, 0)).toBe(0);
  });
});

describe('applySelectionAction', () => {
  it('confirms the toggled items in multi-select mode', () => {
    const result = applyAll(createFinderState(true), [{ kind: 'toggle' }, { kind: 'confirm' }], viewOf(['a', 'b']));
    expect(result.outcome).toEqual({ kind: 'selected', indices: [0], items: ['a'] });
  });

  it('returns the multi-selection in insertion order', () => {
    const result = applyAll(
      createFinderState(true),
      [{ kind: 'move', delta: 2 }, { kind: 'toggle' }, { kind: 'moveTo', target: 'first' }, { kind: 'toggle' }, { kind: 'confirm' }],
      viewOf(['a', 'b', 'c'])
    );
    expect(result.outcome).toEqual({ kind: 'selected', indices: [0, 2], items: ['a', 'c'] });
  });

  it('confirms the item under the cursor in single-select mode', () => {
    const result = applyAll(createFinderState(false), [{ kind: 'move', delta: 1 }, { kind: 'confirm' }], viewOf(['a', 'b']));
    expect(result.outcome).toEqual({ kind: 'selected', indices: [1], items: ['b'] });
  });

  it('maps the cursor through the filtered view', () => {
    const view = viewOf(['apple', 'banana', 'cherry'], 'ch');
    const result = applySelectionAction(createFinderState(false), { kind: 'confirm' }, view);
    expect(result.outcome).toEqual({ kind: 'selected', indices: [2], items: ['cherry'] });
  });

  it('confirms an empty selection when nothing matches', () => {
    const view = viewOf(['a'], 'zz');
    expect(applySelectionAction(createFinderState(false), { kind: 'confirm' }, view).outcome).toEqual({
      kind: 'selected',
      indices: [],
      items: [],
    });
    expect(applySelectionAction(createFinderState(true), { kind: 'confirm' }, view).outcome).toEqual({
      kind: 'selected',
      indices: [],
      items: [],
    });
  });

  it('clamps moves at both ends', () => {
    const view = viewOf(['a', 'b', 'c']);
    expect(applySelectionAction(createFinderState(false), { kind: 'move', delta: 10 }, view).state.cursor).toBe(2);
    expect(applySelectionAction(createFinderState(false), { kind: 'move', delta: -10 }, view).state.cursor).toBe(0);
    expect(applySelectionAction(createFinderState(false), { kind: 'moveTo', target: 'last' }, view).state.cursor).toBe(2);
  });

  it('does nothing when moving over an empty result', () => {
    const state = createFinderState(false);
    expect(applySelectionAction(state, { kind: 'move', delta: 1 }, viewOf([])).state).toBe(state);
  });

  it('ignores toggle in single-select mode', () => {
    const state = createFinderState(false);
    expect(applySelectionAction(state, { kind: 'toggle' }, viewOf(['a'])).state.selected.size).toBe(0);
  });

  it('untoggles a selected item', () => {
    const view = viewOf(['a']);
    const result = applyAll(createFinderState(true), [{ kind: 'toggle' }, { kind: 'toggle' }], view);
    expect(result.state.selected.size).toBe(0);
  });

  it('keeps the selection when the query filters a selected item out', () => {
    const items = ['apple', 'banana'];
    const toggled = applySelectionAction(createFinderState(true), { kind: 'toggle' }, viewOf(items));
    const typed = applySelectionAction(toggled.state, { kind: 'type', char: 'b' }, viewOf(items));
    const confirmed = applySelectionAction(typed.state, { kind: 'confirm' }, viewOf(items, 'b'));
    expect(confirmed.outcome).toEqual({ kind: 'selected', indices: [0], items: ['apple'] });
  });

  it('cancels after any typing or toggling', () => {
    const result = applyAll(
      createFinderState(true),
      [{ kind: 'toggle' }, { kind: 'type', char: 'x' }, { kind: 'cancel' }],
      viewOf(['a', 'b'])
    );
    expect(result.outcome).toEqual({ kind: 'cancelled' });
  });

  it('reports query changes', () => {
    const typed = applySelectionAction(createFinderState(false), { kind: 'type', char: 'x' }, viewOf([]));
    expect(typed.queryChanged).toBe(true);
    expect(typed.state.query).toEqual({ value: 'x', cursor: 1 });

    const backspaced = applySelectionAction(createFinderState(false), { kind: 'backspace' }, viewOf([]));
    expect(backspaced.queryChanged).toBe(false);
  });

  it('edits the query through the text editor', () => {
    const result = applySelectionAction(createFinderState(false, 'ab'), { kind: 'editQuery', key: 'CTRL_U' }, viewOf([]));
    expect(result.state.query).toEqual({ value: '', cursor: 0 });
    expect(result.queryChanged).toBe(true);
  });
});
