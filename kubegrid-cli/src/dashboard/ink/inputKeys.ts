/**
 * Translates Ink's `useInput` callback arguments into key events.
 */

import type { Key } from 'ink';
import { keyEvent } from 'kubegrid-shared';
import type { KeyEvent } from 'kubegrid-shared';

export type InkKey = Pick<
  Key,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'pageUp'
  | 'pageDown'
  | 'return'
  | 'escape'
  | 'ctrl'
  | 'shift'
  | 'tab'
  | 'backspace'
  | 'delete'
  | 'meta'
>;

// SGR mouse report, with or without the ESC Ink may already have stripped.
const MOUSE_REPORT_RE = /^\x1b?\[<\d+;\d+;\d+[Mm]/;

function namedKey(key: InkKey): string | null {
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  if (key.leftArrow) return 'left';
  if (key.rightArrow) return 'right';
  if (key.pageUp) return 'pageup';
  if (key.pageDown) return 'pagedown';
  if (key.return) return 'enter';
  if (key.tab) return 'tab';
  // Most terminals send DEL for Backspace, which Ink reports as `delete`.
  if (key.backspace || key.delete) return 'backspace';
  if (key.escape) return 'esc';
  return null;
}

/**
 * Key events for one `useInput` call. Pasted text yields one event per
 * character; mouse reports yield none.
 */
export function inkInputToKeys(input: string, key: InkKey): KeyEvent[] {
  if (MOUSE_REPORT_RE.test(input)) return [];

  const named = namedKey(key);
  if (named) {
    // A bare Escape also sets `meta`; only a modified key is alt+key.
    const alt = key.meta && named !== 'esc';
    return [keyEvent(named, { ctrl: key.ctrl, alt, shift: key.shift })];
  }

  if (!input) return [];
  // Ctrl+Space arrives as NUL, which Ink names after the byte above it.
  if (key.ctrl && input === '`') return [keyEvent(' ', { ctrl: true, alt: key.meta })];
  if (key.ctrl || key.meta) {
    return [keyEvent(input[0], { ctrl: key.ctrl, alt: key.meta })];
  }
  return [...input].map((c) => keyEvent(c));
}
