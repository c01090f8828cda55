import { isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Caret position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

export interface TextInputUpdate {
  state: TextInputState;
  didChangeValue: boolean;
}

function toChars(value: string): string[] {
  return Array.from(value);
}

function clampCaret(value: string, cursor: number): number {
  const len = toChars(value).length;
  return Math.max(0, Math.min(cursor, len));
}

export function createTextInput(initial = ''): TextInputState {
  return { value: initial, cursor: toChars(initial).length };
}

/** Text left of the caret; the frame measures it to place the caret cell. */
export function textBeforeCaret(state: TextInputState): string {
  return toChars(state.value).slice(0, clampCaret(state.value, state.cursor)).join('');
}

function withCursor(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCaret(state.value, cursor) };
}

export function insertText(state: TextInputState, text: string): TextInputState {
  const chars = toChars(state.value);
  const insertChars = toChars(text);
  const cursor = clampCaret(state.value, state.cursor);
  chars.splice(cursor, 0, ...insertChars);
  const value = chars.join('');
  return { value, cursor: clampCaret(value, cursor + insertChars.length) };
}

function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const chars = toChars(state.value);
  const from = Math.max(0, Math.min(start, chars.length));
  const to = Math.max(0, Math.min(end, chars.length));
  if (to <= from) return withCursor(state, state.cursor);
  chars.splice(from, to - from);
  const value = chars.join('');
  return { value, cursor: clampCaret(value, from) };
}

function isWhitespaceChar(ch: string): boolean {
  return /\s/.test(ch);
}

function wordStartBefore(chars: readonly string[], from: number): number {
  let i = from;
  while (i > 0 && isWhitespaceChar(chars[i - 1] ?? '')) i--;
  while (i > 0 && !isWhitespaceChar(chars[i - 1] ?? '')) i--;
  return i;
}

function wordEndAfter(chars: readonly string[], from: number): number {
  let i = from;
  while (i < chars.length && isWhitespaceChar(chars[i] ?? '')) i++;
  while (i < chars.length && !isWhitespaceChar(chars[i] ?? '')) i++;
  return i;
}

/**
 * Applies one terminal-kit key name to the query editor. Returns null for keys the editor
 * does not handle, so the caller can route them elsewhere.
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputUpdate | null {
  const prevValue = state.value;
  const caret = clampCaret(state.value, state.cursor);
  const chars = toChars(state.value);
  const normalized: TextInputState = { value: state.value, cursor: caret };

  const finish = (next: TextInputState): TextInputUpdate => ({
    state: next,
    didChangeValue: next.value !== prevValue,
  });

  // Caret movement
  if (name === 'LEFT' || name === 'CTRL_B') return finish(withCursor(normalized, caret - 1));
  if (name === 'RIGHT' || name === 'CTRL_F') return finish(withCursor(normalized, caret + 1));
  if (name === 'HOME' || name === 'CTRL_A') return finish(withCursor(normalized, 0));
  if (name === 'END' || name === 'CTRL_E') return finish(withCursor(normalized, chars.length));
  if (name === 'ALT_LEFT' || name === 'CTRL_LEFT' || name === 'ALT_B')
    return finish(withCursor(normalized, wordStartBefore(chars, caret)));
  if (name === 'ALT_RIGHT' || name === 'CTRL_RIGHT' || name === 'ALT_F')
    return finish(withCursor(normalized, wordEndAfter(chars, caret)));

  // Deletion
  if (name === 'BACKSPACE') {
    if (caret <= 0) return finish(normalized);
    return finish(deleteRange(normalized, caret - 1, caret));
  }
  if (name === 'DELETE' || name === 'CTRL_D') {
    if (caret >= chars.length) return finish(normalized);
    return finish(deleteRange(normalized, caret, caret + 1));
  }
  if (name === 'ALT_BACKSPACE' || name === 'CTRL_W') {
    return finish(deleteRange(normalized, wordStartBefore(chars, caret), caret));
  }
  if (name === 'CTRL_U') return finish(deleteRange(normalized, 0, caret));

  // Insertion
  if (isSpaceKeyName(name)) return finish(insertText(normalized, ' '));
  if (toChars(name).length === 1) return finish(insertText(normalized, name));

  return null;
}
