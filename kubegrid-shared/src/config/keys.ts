/**
 * Key strings (`ctrl+q`, `alt+v`, `G`, `shift+tab`) and key events.
 *
 * Both sides are normalized to one canonical shape so bindings parsed from
 * config compare equal to the events read from the terminal.
 */

import type { KeyEvent } from '../events/types';

const NAMED_KEYS = new Set([
  'tab', 'backtab', 'enter', 'esc', 'backspace', 'delete',
  'up', 'down', 'left', 'right', 'home', 'end', 'pageup', 'pagedown',
]);

const MODIFIERS = new Set(['alt', 'ctrl', 'shift']);

export function keyEvent(key: string, mods: Partial<Omit<KeyEvent, 'key'>> = {}): KeyEvent {
  return { key, ctrl: mods.ctrl ?? false, alt: mods.alt ?? false, shift: mods.shift ?? false };
}

function isAsciiLetter(c: string): boolean {
  return /^[a-zA-Z]$/.test(c);
}

/**
 * Canonical form: shift+tab is `backtab` without shift; ctrl+letter is
 * lowercase without shift; other letters carry shift exactly when uppercase.
 */
export function normalizeKeyEvent(event: KeyEvent): KeyEvent {
  if (event.key === 'tab' && event.shift) return { ...event, key: 'backtab', shift: false };
  if (event.key === 'backtab' && event.shift) return { ...event, shift: false };

  if (event.key.length === 1 && isAsciiLetter(event.key)) {
    if (event.ctrl) return { ...event, key: event.key.toLowerCase(), shift: false };
    const upper = event.key === event.key.toUpperCase();
    if (!upper && event.shift) return { ...event, key: event.key.toUpperCase() };
    if (upper && !event.shift) return { ...event, shift: true };
  }
  return event;
}

/** Stable identity of a normalized key, used as a map key. */
export function keyId(event: KeyEvent): string {
  const k = normalizeKeyEvent(event);
  const parts: string[] = [];
  if (k.ctrl) parts.push('ctrl');
  if (k.alt) parts.push('alt');
  if (k.shift) parts.push('shift');
  parts.push(k.key);
  return parts.join('+');
}

/** Why a key string is malformed, or null when it is valid. */
export function validateKeyString(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return 'empty key string';
  const parts = splitKeyString(trimmed);
  for (const modifier of parts.slice(0, -1)) {
    if (!MODIFIERS.has(modifier.toLowerCase())) return `unknown modifier: ${modifier}`;
  }
  const last = parts[parts.length - 1];
  const lower = last.toLowerCase();
  if (NAMED_KEYS.has(lower) || lower === 'space' || last.length === 1) return null;
  if (lower.startsWith('f')) {
    return /^f\d{1,2}$/.test(lower) ? null : `invalid function key: ${last}`;
  }
  return `unrecognized key: ${last}`;
}

/** Parses a key string into a normalized event. Returns null when malformed. */
export function parseKeyString(input: string): KeyEvent | null {
  if (validateKeyString(input) !== null) return null;
  const parts = splitKeyString(input.trim());
  const mods = { ctrl: false, alt: false, shift: false };
  for (const modifier of parts.slice(0, -1)) {
    const m = modifier.toLowerCase();
    if (m === 'ctrl') mods.ctrl = true;
    else if (m === 'alt') mods.alt = true;
    else mods.shift = true;
  }

  const raw = parts[parts.length - 1];
  const lower = raw.toLowerCase();
  let key: string;
  if (lower === 'space') key = ' ';
  else if (raw.length === 1) key = raw;
  else key = lower;
  return normalizeKeyEvent({ key, ...mods });
}

/** `ctrl+q` → `Ctrl+Q`, `alt+v` → `Alt+V`. */
export function formatKeyDisplay(input: string): string {
  return splitKeyString(input.trim())
    .map((part) => (part ? part[0].toUpperCase() + part.slice(1) : part))
    .join('+');
}

const INPUT_SEQUENCES: Record<string, string> = {
  enter: '\r',
  tab: '\t',
  backtab: '\x1b[Z',
  backspace: '\x7f',
  esc: '\x1b',
  up: '\x1b[A',
  down: '\x1b[B',
  right: '\x1b[C',
  left: '\x1b[D',
  home: '\x1b[H',
  end: '\x1b[F',
  pageup: '\x1b[5~',
  pagedown: '\x1b[6~',
  delete: '\x1b[3~',
  f1: '\x1bOP',
  f2: '\x1bOQ',
  f3: '\x1bOR',
  f4: '\x1bOS',
  f5: '\x1b[15~',
  f6: '\x1b[17~',
  f7: '\x1b[18~',
  f8: '\x1b[19~',
  f9: '\x1b[20~',
  f10: '\x1b[21~',
  f11: '\x1b[23~',
  f12: '\x1b[24~',
};

/**
 * Bytes to write to a terminal session for a key press.
 * Ctrl+letter becomes its control byte; alt prefixes ESC. Empty for unmappable keys.
 */
export function keyToInputString(event: KeyEvent): string {
  if (event.key.length === 1) {
    if (event.ctrl && isAsciiLetter(event.key)) {
      return String.fromCharCode(event.key.toLowerCase().charCodeAt(0) - 96);
    }
    return event.alt ? `\x1b${event.key}` : event.key;
  }
  return INPUT_SEQUENCES[event.key] ?? '';
}

/** Splits on `+` while keeping a literal `+` key (`alt++`, `+`). */
function splitKeyString(input: string): string[] {
  if (input === '+') return ['+'];
  if (input.endsWith('++')) return [...input.slice(0, -2).split('+'), '+'];
  return input.split('+');
}
