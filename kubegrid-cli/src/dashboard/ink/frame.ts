/**
 * Pane borders drawn as text, so the title can sit in the top edge and the
 * footer in the bottom edge.
 */

import { truncate } from '../formatters';

function edge(width: number, label: string, left: string, right: string, alignRight: boolean): string {
  if (width < 2) return '';
  const inner = width - 2;
  const text = label && inner >= 4 ? ` ${truncate(label, inner - 3)} ` : '';
  const fill = '─'.repeat(Math.max(0, inner - text.length - 1));
  return alignRight ? `${left}${fill}${text}─${right}` : `${left}─${text}${fill}${right}`;
}

/** `┌─ title ───┐` */
export function topBorder(width: number, title: string): string {
  return edge(width, title, '┌', '┐', false);
}

/** `└─── footer ─┘` */
export function bottomBorder(width: number, footer: string | undefined): string {
  return edge(width, footer ?? '', '└', '┘', true);
}
