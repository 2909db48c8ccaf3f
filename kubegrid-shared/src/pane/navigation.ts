/**
 * Directional focus movement over a laid-out pane tree.
 */

import type { Direction, PaneId, Rect } from './types';

/**
 * Picks the pane to move focus to from `current` in `direction`.
 *
 * Candidates must lie entirely on the far side of the current pane's edge.
 * Candidates overlapping on the perpendicular axis win, nearest edge first,
 * larger overlap breaking ties. Otherwise the candidate whose centre is
 * closest (squared distance) is chosen. Ties keep layout order.
 */
export function findPaneInDirection(
  current: [PaneId, Rect],
  all: ReadonlyArray<[PaneId, Rect]>,
  direction: Direction,
): PaneId | null {
  const [currentId, cur] = current;
  const candidates = all.filter(([id, r]) => id !== currentId && isBeyond(cur, r, direction));
  if (candidates.length === 0) return null;

  let best: { id: PaneId; dist: number; overlap: number } | null = null;
  for (const [id, r] of candidates) {
    const overlap = perpendicularOverlap(cur, r, direction);
    if (overlap <= 0) continue;
    const dist = edgeDistance(cur, r, direction);
    if (!best || dist < best.dist || (dist === best.dist && overlap > best.overlap)) {
      best = { id, dist, overlap };
    }
  }
  if (best) return best.id;

  const [cx, cy] = center(cur);
  let nearest: { id: PaneId; d2: number } | null = null;
  for (const [id, r] of candidates) {
    const [rx, ry] = center(r);
    const d2 = (cx - rx) ** 2 + (cy - ry) ** 2;
    if (!nearest || d2 < nearest.d2) nearest = { id, d2 };
  }
  return nearest ? nearest.id : null;
}

function isBeyond(cur: Rect, r: Rect, direction: Direction): boolean {
  switch (direction) {
    case 'right': return r.x >= cur.x + cur.width;
    case 'left': return r.x + r.width <= cur.x;
    case 'down': return r.y >= cur.y + cur.height;
    case 'up': return r.y + r.height <= cur.y;
  }
}

function perpendicularOverlap(a: Rect, b: Rect, direction: Direction): number {
  const horizontal = direction === 'left' || direction === 'right';
  const aStart = horizontal ? a.y : a.x;
  const aEnd = horizontal ? a.y + a.height : a.x + a.width;
  const bStart = horizontal ? b.y : b.x;
  const bEnd = horizontal ? b.y + b.height : b.x + b.width;
  return Math.max(0, Math.min(aEnd, bEnd) - Math.max(aStart, bStart));
}

function edgeDistance(cur: Rect, r: Rect, direction: Direction): number {
  switch (direction) {
    case 'right': return r.x - (cur.x + cur.width);
    case 'left': return cur.x - (r.x + r.width);
    case 'down': return r.y - (cur.y + cur.height);
    case 'up': return cur.y - (r.y + r.height);
  }
}

function center(r: Rect): [number, number] {
  return [r.x + Math.floor(r.width / 2), r.y + Math.floor(r.height / 2)];
}
