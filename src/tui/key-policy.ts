import type { SelectionAction } from './selection.js';
import { isPrintableKeyName, isSpaceKeyName } from './key-utils.js';

export interface KeyContext {
  multiSelect: boolean;
  /** Rows in the item window; PageUp/PageDown move by this much. */
  pageSize: number;
}

const QUERY_EDIT_KEYS = new Set([
  'LEFT',
  'RIGHT',
  'CTRL_B',
  'CTRL_F',
  'HOME',
  'END',
  'CTRL_A',
  'CTRL_E',
  'ALT_LEFT',
  'ALT_RIGHT',
  'CTRL_LEFT',
  'CTRL_RIGHT',
  'ALT_B',
  'ALT_F',
  'DELETE',
  'CTRL_D',
  'ALT_BACKSPACE',
  'CTRL_W',
  'CTRL_U',
]);

/**
 * Maps a terminal-kit key name to selection actions. Navigation and control keys win over
 * query editing; anything unknown maps to no action.
 */
export function resolveKeyAction(name: string, context: KeyContext): SelectionAction[] {
  const page = Math.max(1, context.pageSize);

  switch (name) {
    case 'UP':
    case 'CTRL_P':
    case 'CTRL_K':
      return [{ kind: 'move', delta: -1 }];
    case 'DOWN':
    case 'CTRL_N':
    case 'CTRL_J':
      return [{ kind: 'move', delta: 1 }];
    case 'PAGE_UP':
      return [{ kind: 'move', delta: -page }];
    case 'PAGE_DOWN':
      return [{ kind: 'move', delta: page }];
    case 'ENTER':
    case 'KP_ENTER':
      return [{ kind: 'confirm' }];
    case 'ESCAPE':
    case 'CTRL_C':
    case 'CTRL_Q':
      return [{ kind: 'cancel' }];
    case 'TAB':
      return context.multiSelect ? [{ kind: 'toggle' }, { kind: 'move', delta: 1 }] : [];
    case 'BACKSPACE':
      return [{ kind: 'backspace' }];
  }

  if (isSpaceKeyName(name)) {
    return context.multiSelect ? [{ kind: 'toggle' }] : [{ kind: 'type', char: ' ' }];
  }
  if (QUERY_EDIT_KEYS.has(name)) return [{ kind: 'editQuery', key: name }];
  if (isPrintableKeyName(name)) return [{ kind: 'type', char: name }];
  return [];
}
