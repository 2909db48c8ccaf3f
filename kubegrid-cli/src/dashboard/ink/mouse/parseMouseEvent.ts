/**
 * Parse SGR 1006 mouse escape sequences from raw stdin data.
 */

import type { MouseInput } from 'kubegrid-shared';

// ESC [ < Cb ; Cx ; Cy M/m
const SGR_MOUSE_RE = /\x1b\[<(\d+);(\d+);(\d+)([Mm])/;

const BUTTONS = ['left', 'middle', 'right'] as const;

/** The mouse event in `data`, or null if it is not a mouse sequence. */
export function parseMouseEvent(data: Buffer | string): MouseInput | null {
  const str = typeof data === 'string' ? data : data.toString('utf-8');
  const match = SGR_MOUSE_RE.exec(str);
  if (!match) return null;

  const code = parseInt(match[1], 10);
  const isRelease = match[4] === 'm';

  // Protocol coordinates are 1-based.
  const x = parseInt(match[2], 10) - 1;
  const y = parseInt(match[3], 10) - 1;

  const shift = (code & 4) !== 0;
  const meta = (code & 8) !== 0;
  const ctrl = (code & 16) !== 0;
  const base = code & ~(4 | 8 | 16);

  if (base === 64 || base === 65) {
    return { type: base === 64 ? 'scroll-up' : 'scroll-down', button: 'none', x, y, shift, meta, ctrl };
  }
  if (base >= 32 && base <= 34) {
    return { type: 'drag', button: BUTTONS[base - 32], x, y, shift, meta, ctrl };
  }
  if (base >= 0 && base <= 2) {
    return { type: isRelease ? 'release' : 'click', button: BUTTONS[base], x, y, shift, meta, ctrl };
  }
  return null;
}
