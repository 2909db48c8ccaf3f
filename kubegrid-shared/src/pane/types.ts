/**
 * Geometry and identity types for the tiling engine.
 */

/** Process-unique pane identifier. Allocated once, never reused. */
export type PaneId = number;

/** `horizontal` stacks top/bottom (divides height); `vertical` places left/right (divides width). */
export type SplitOrientation = 'horizontal' | 'vertical';

export type Direction = 'up' | 'down' | 'left' | 'right';

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LeafNode {
  type: 'leaf';
  id: PaneId;
}

export interface SplitNode {
  type: 'split';
  orientation: SplitOrientation;
  /** Fraction of the parent's extent given to `first`, in (0, 1). */
  ratio: number;
  first: PaneNode;
  second: PaneNode;
}

export type PaneNode = LeafNode | SplitNode;

/** Read-only view of a subtree, as handed out by `PaneTree.root`. */
export type ReadonlyPaneNode =
  | Readonly<LeafNode>
  | {
      readonly type: 'split';
      readonly orientation: SplitOrientation;
      readonly ratio: number;
      readonly first: ReadonlyPaneNode;
      readonly second: ReadonlyPaneNode;
    };
