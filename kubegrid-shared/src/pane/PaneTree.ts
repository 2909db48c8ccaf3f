/**
 * Binary space-partitioning tree of panes.
 *
 * Leaves are panes; internal nodes split their rectangle between two children
 * by orientation and ratio. The tree owns its nodes outright, is never empty,
 * and holds each PaneId at most once.
 */

import { InvariantViolationError, PaneNotFoundError } from '../errors';
import type { LeafNode, PaneId, PaneNode, ReadonlyPaneNode, Rect, SplitNode, SplitOrientation } from './types';

export const MIN_RATIO = 0.1;
export const MAX_RATIO = 0.9;
export const DEFAULT_RATIO = 0.5;

export class PaneTree {
  private _root: PaneNode;
  private _lastCreated: PaneId;
  private nextId: PaneId;

  constructor(rootId: PaneId = 1) {
    this._root = { type: 'leaf', id: rootId };
    this._lastCreated = rootId;
    this.nextId = rootId + 1;
  }

  get root(): ReadonlyPaneNode {
    return this._root;
  }

  /** Id of the most recently created leaf. */
  get lastCreated(): PaneId {
    return this._lastCreated;
  }

  get size(): number {
    return this.leafIds().length;
  }

  contains(id: PaneId): boolean {
    return findLeaf(this._root, id) !== null;
  }

  /**
   * Splits `target` into two. The original leaf stays as the first child,
   * a new leaf with a freshly allocated id becomes the second. Returns the new id.
   */
  split(target: PaneId, orientation: SplitOrientation, ratio: number = DEFAULT_RATIO): PaneId {
    const id = this.nextId;
    this.splitWithId(target, orientation, id, ratio);
    return id;
  }

  /** Same as {@link split}, for callers that allocate ids from a wider scope (tabs). */
  splitWithId(target: PaneId, orientation: SplitOrientation, newId: PaneId, ratio: number = DEFAULT_RATIO): void {
    if (!(ratio > 0 && ratio < 1)) {
      throw new RangeError(`Split ratio must be in (0, 1), got ${ratio}`);
    }
    if (!this.contains(target)) throw new PaneNotFoundError(target);
    if (this.contains(newId)) {
      throw new InvariantViolationError(`Pane ${newId} already exists in the tree`);
    }

    this._root = replaceLeaf(this._root, target, (leaf) => ({
      type: 'split',
      orientation,
      ratio,
      first: leaf,
      second: { type: 'leaf', id: newId },
    }));
    this._lastCreated = newId;
    this.nextId = Math.max(this.nextId, newId + 1);
  }

  /**
   * Removes `target`; its sibling subtree takes the parent's place.
   *
   * Returns the first leaf (depth-first) of the promoted sibling, which is
   * the natural next focus. Closing the only leaf is a no-op returning null.
   */
  close(target: PaneId): PaneId | null {
    if (this._root.type === 'leaf') {
      if (this._root.id === target) return null;
      throw new PaneNotFoundError(target);
    }

    const removed = removeLeaf(this._root, target);
    if (!removed) throw new PaneNotFoundError(target);
    this._root = removed.node;
    return removed.nextFocus;
  }

  /**
   * Moves the divider of the split directly containing `target`.
   * Growing enlarges the target's side. The ratio is clamped to [0.1, 0.9].
   * Returns false when `target` is the root leaf (nothing to resize).
   */
  resize(target: PaneId, amount: number, grow: boolean): boolean {
    if (!this.contains(target)) throw new PaneNotFoundError(target);
    const parent = findParent(this._root, target);
    if (!parent) return false;

    const targetIsFirst = parent.first.type === 'leaf' && parent.first.id === target;
    const delta = grow === targetIsFirst ? amount : -amount;
    parent.ratio = clampRatio(parent.ratio + delta);
    return true;
  }

  /** Partitions `area` top-down into one rectangle per leaf. */
  layout(area: Rect): Array<[PaneId, Rect]> {
    const out: Array<[PaneId, Rect]> = [];
    layoutNode(this._root, area, out);
    return out;
  }

  /** All leaf ids, depth-first, first child before second. */
  leafIds(): PaneId[] {
    const ids: PaneId[] = [];
    collectLeaves(this._root, ids);
    return ids;
  }
}

// ── Geometry ──

/**
 * Divides a rectangle between two children. The first child gets
 * `round(extent * ratio)` cells, the second the remainder.
 */
export function splitRect(rect: Rect, orientation: SplitOrientation, ratio: number): [Rect, Rect] {
  if (orientation === 'horizontal') {
    const firstHeight = Math.min(rect.height, Math.round(rect.height * ratio));
    return [
      { x: rect.x, y: rect.y, width: rect.width, height: firstHeight },
      { x: rect.x, y: rect.y + firstHeight, width: rect.width, height: rect.height - firstHeight },
    ];
  }
  const firstWidth = Math.min(rect.width, Math.round(rect.width * ratio));
  return [
    { x: rect.x, y: rect.y, width: firstWidth, height: rect.height },
    { x: rect.x + firstWidth, y: rect.y, width: rect.width - firstWidth, height: rect.height },
  ];
}

export function clampRatio(ratio: number): number {
  return Math.min(MAX_RATIO, Math.max(MIN_RATIO, ratio));
}

/** First leaf of a subtree, depth-first. */
export function firstLeaf(node: ReadonlyPaneNode): PaneId {
  let current = node;
  while (current.type === 'split') current = current.first;
  return current.id;
}

// ── Tree walking ──

function layoutNode(node: PaneNode, area: Rect, out: Array<[PaneId, Rect]>): void {
  if (node.type === 'leaf') {
    out.push([node.id, area]);
    return;
  }
  const [a, b] = splitRect(area, node.orientation, node.ratio);
  layoutNode(node.first, a, out);
  layoutNode(node.second, b, out);
}

function collectLeaves(node: PaneNode, ids: PaneId[]): void {
  if (node.type === 'leaf') {
    ids.push(node.id);
    return;
  }
  collectLeaves(node.first, ids);
  collectLeaves(node.second, ids);
}

function findLeaf(node: PaneNode, id: PaneId): LeafNode | null {
  if (node.type === 'leaf') return node.id === id ? node : null;
  return findLeaf(node.first, id) ?? findLeaf(node.second, id);
}

function isLeaf(node: PaneNode, id: PaneId): boolean {
  return node.type === 'leaf' && node.id === id;
}

function findParent(node: PaneNode, id: PaneId): SplitNode | null {
  if (node.type === 'leaf') return null;
  if (isLeaf(node.first, id) || isLeaf(node.second, id)) return node;
  return findParent(node.first, id) ?? findParent(node.second, id);
}

function replaceLeaf(node: PaneNode, id: PaneId, replace: (leaf: LeafNode) => PaneNode): PaneNode {
  if (node.type === 'leaf') return node.id === id ? replace(node) : node;
  node.first = replaceLeaf(node.first, id, replace);
  node.second = replaceLeaf(node.second, id, replace);
  return node;
}

function removeLeaf(node: SplitNode, id: PaneId): { node: PaneNode; nextFocus: PaneId } | null {
  if (isLeaf(node.first, id)) return { node: node.second, nextFocus: firstLeaf(node.second) };
  if (isLeaf(node.second, id)) return { node: node.first, nextFocus: firstLeaf(node.first) };

  if (node.first.type === 'split') {
    const removed = removeLeaf(node.first, id);
    if (removed) {
      node.first = removed.node;
      return { node, nextFocus: removed.nextFocus };
    }
  }
  if (node.second.type === 'split') {
    const removed = removeLeaf(node.second, id);
    if (removed) {
      node.second = removed.node;
      return { node, nextFocus: removed.nextFocus };
    }
  }
  return null;
}
