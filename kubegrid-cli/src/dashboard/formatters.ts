/**
 * Text helpers for pane content.
 *
 * Panes produce lines in a small tag markup (`{bold}`, `{red-fg}`, `{/red-fg}`)
 * that the Ink layer turns into styled spans. Literal braces coming from the
 * cluster must be escaped with `escapeTags` before they are embedded.
 */

const TAG_RE = /\{[^{}]*\}/g;

/** Makes arbitrary text safe to embed in tagged markup. */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (c) => (c === '{' ? '{open}' : '{close}'));
}

/** Strip markup tags, turning `{open}`/`{close}` back into braces. */
export function stripTags(text: string): string {
  return text.replace(TAG_RE, (tag) => {
    if (tag === '{open}') return '{';
    if (tag === '{close}') return '}';
    return '';
  });
}

/** Return the visible (non-tag) length of text containing tags. */
export function visibleLength(text: string): number {
  return stripTags(text).length;
}

/** Tagged text with the character at `x` shown in reverse video. */
export function withCursor(text: string, x: number): string {
  const padded = text.padEnd(x + 1);
  return `${escapeTags(padded.slice(0, x))}{inverse}${escapeTags(padded[x])}{/inverse}${escapeTags(padded.slice(x + 1))}`;
}

/** Truncate plain text to maxLength, ending with an ellipsis if cut. */
export function truncate(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;
  if (maxLength === 1) return '…';
  return text.substring(0, maxLength - 1) + '…';
}

/** Truncate or right-pad plain text to exactly `width` characters. */
export function padCell(text: string, width: number): string {
  return truncate(text, width).padEnd(Math.max(0, width));
}

/** Drop the first `offset` characters; used for horizontal scrolling. */
export function sliceFrom(text: string, offset: number): string {
  return offset > 0 ? text.slice(offset) : text;
}

/** Break plain text into chunks of at most `width` characters. Empty input gives one empty line. */
export function hardWrap(text: string, width: number): string[] {
  if (width <= 0 || text.length <= width) return [text];
  const out: string[] = [];
  for (let i = 0; i < text.length; i += width) out.push(text.slice(i, i + width));
  return out;
}

/** Word-wrap plain text to a given column width, preserving existing line breaks. */
export function wordWrap(text: string, width: number): string[] {
  const out: string[] = [];
  for (const line of text.split('\n')) {
    if (line.length <= width) {
      out.push(line);
      continue;
    }
    let current = '';
    for (const word of line.split(' ')) {
      if (!current) {
        current = word;
      } else if (current.length + 1 + word.length <= width) {
        current += ' ' + word;
      } else {
        out.push(...hardWrap(current, width));
        current = word;
      }
    }
    out.push(...hardWrap(current, width));
  }
  return out;
}

/** Format epoch milliseconds as HH:MM:SS (local time). */
export function formatTime(ms: number): string {
  const d = new Date(ms);
  if (isNaN(d.getTime())) return '??:??:??';
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/**
 * First index of the window of `height` rows that keeps `selected` visible,
 * given the window currently starts at `offset`.
 */
export function scrollWindow(selected: number, offset: number, height: number, total: number): number {
  if (height <= 0 || total <= height) return 0;
  let start = offset;
  if (selected < start) start = selected;
  if (selected >= start + height) start = selected - height + 1;
  return Math.max(0, Math.min(start, total - height));
}
