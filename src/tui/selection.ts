import type { FilterResult } from '../matcher/filter.js';
import type { SelectionOutcome } from '../schema/index.js';
import { applyTextInputKey, createTextInput, insertText, type TextInputState } from './text-input.js';

export interface FinderState {
  readonly multiSelect: boolean;
  /** Index into the current filter result, not into the item list. */
  readonly cursor: number;
  /** Original item indices. Survive re-filtering. */
  readonly selected: ReadonlySet<number>;
  readonly query: TextInputState;
}

export type SelectionAction =
  | { kind: 'move'; delta: number }
  | { kind: 'moveTo'; target: 'first' | 'last' }
  | { kind: 'toggle' }
  | { kind: 'confirm' }
  | { kind: 'cancel' }
  | { kind: 'type'; char: string }
  | { kind: 'backspace' }
  | { kind: 'editQuery'; key: string };

export interface SelectionView {
  result: FilterResult;
  items: readonly string[];
}

export interface TransitionResult {
  state: FinderState;
  /** Set once the user confirmed or cancelled. */
  outcome: SelectionOutcome | null;
  queryChanged: boolean;
}

export function createFinderState(multiSelect: boolean, initialQuery = ''): FinderState {
  return { multiSelect, cursor: 0, selected: new Set(), query: createTextInput(initialQuery) };
}

/** Keeps `0 <= cursor < max(1, length)`. */
export function clampCursor(cursor: number, length: number): number {
  if (length <= 0) return 0;
  return Math.max(0, Math.min(cursor, length - 1));
}

function buildOutcome(state: FinderState, view: SelectionView): SelectionOutcome {
  if (state.multiSelect) {
    const indices = [...state.selected].sort((a, b) => a - b);
    const items: string[] = [];
    for (const index of indices) {
      const text = view.items[index];
      if (text !== undefined) items.push(text);
    }
    return { kind: 'selected', indices, items };
  }

  const match = view.result[state.cursor];
  const text = match ? view.items[match.index] : undefined;
  if (!match || text === undefined) {
    return { kind: 'selected', indices: [], items: [] };
  }
  return { kind: 'selected', indices: [match.index], items: [text] };
}

function withQuery(state: FinderState, query: TextInputState): TransitionResult {
  const queryChanged = query.value !== state.query.value;
  return { state: { ...state, query }, outcome: null, queryChanged };
}

export function applySelectionAction(
  state: FinderState,
  action: SelectionAction,
  view: SelectionView
): TransitionResult {
  const unchanged: TransitionResult = { state, outcome: null, queryChanged: false };
  const length = view.result.length;

  switch (action.kind) {
    case 'move': {
      if (length === 0) return unchanged;
      const cursor = clampCursor(state.cursor + action.delta, length);
      return { state: { ...state, cursor }, outcome: null, queryChanged: false };
    }
    case 'moveTo': {
      if (length === 0) return unchanged;
      const cursor = action.target === 'first' ? 0 : length - 1;
      return { state: { ...state, cursor }, outcome: null, queryChanged: false };
    }
    case 'toggle': {
      if (!state.multiSelect) return unchanged;
      const match = view.result[state.cursor];
      if (!match) return unchanged;
      const selected = new Set(state.selected);
      if (selected.has(match.index)) selected.delete(match.index);
      else selected.add(match.index);
      return { state: { ...state, selected }, outcome: null, queryChanged: false };
    }
    case 'confirm':
      return { state, outcome: buildOutcome(state, view), queryChanged: false };
    case 'cancel':
      return { state, outcome: { kind: 'cancelled' }, queryChanged: false };
    case 'type':
      return withQuery(state, insertText(state.query, action.char));
    case 'backspace': {
      const next = applyTextInputKey(state.query, 'BACKSPACE');
      return next ? withQuery(state, next.state) : unchanged;
    }
    case 'editQuery': {
      const next = applyTextInputKey(state.query, action.key);
      return next ? withQuery(state, next.state) : unchanged;
    }
  }
}
