/**
 * @fileoverview Keypress to session input mapping
 *
 * Direct-view chords avoid ctrl+i and ctrl+m, which terminals deliver as Tab
 * and Enter.
 */

import type { ViewKind } from '../types.js';
import type { SessionInput } from './search_session.js';

/** Shape of the key object emitted by readline's `keypress` event. */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export const VIEW_CHORDS: Readonly<Record<string, ViewKind>> = {
  a: 'actions',
  p: 'pulls',
  t: 'issues',
  g: 'milestones',
};

export function keyToInput(text: string | undefined, key: KeyPress | undefined): SessionInput | null {
  if (key?.ctrl) {
    const name = key.name ?? '';
    const view = VIEW_CHORDS[name];
    if (view) return { type: 'open', view };
    switch (name) {
      case 'c':
      case 'd':
        return { type: 'cancel' };
      case 'k':
        return { type: 'move', delta: -1 };
      case 'j':
        return { type: 'move', delta: 1 };
      case 'u':
        return { type: 'clear_query' };
      default:
        return null;
    }
  }

  switch (key?.name) {
    case 'escape':
      return { type: 'cancel' };
    case 'return':
    case 'enter':
      return { type: 'confirm' };
    case 'backspace':
      return { type: 'delete' };
    case 'up':
      return { type: 'move', delta: -1 };
    case 'down':
      return { type: 'move', delta: 1 };
    case 'pageup':
      return { type: 'move', delta: -10 };
    case 'pagedown':
      return { type: 'move', delta: 10 };
    default:
      break;
  }

  if (key?.meta || !text) return null;
  // Printable input only; pasted text may arrive as one chunk.
  const printable = Array.from(text)
    .filter((char) => char >= ' ' && char !== '\u007f')
    .join('');
  return printable ? { type: 'insert', text: printable } : null;
}
