import { describe, it, expect, expectTypeOf } from 'vitest';
import { PaneTree, splitRect, firstLeaf } from './PaneTree';
import { PaneNotFoundError } from '../errors';
import type { ReadonlyPaneNode, Rect } from './types';

const AREA: Rect = { x: 0, y: 0, width: 80, height: 24 };

/** Small deterministic PRNG so randomized sequences are reproducible. */
function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

describe('PaneTree', () => {
  it('starts with a single root leaf', () => {
    const tree = new PaneTree();
    expect(tree.leafIds()).toEqual([1]);
    expect(tree.lastCreated).toBe(1);
    expect(tree.layout(AREA)).toEqual([[1, AREA]]);
  });

  it('keeps the original leaf as the first child of a split', () => {
    const tree = new PaneTree();
    const id = tree.split(1, 'vertical');
    expect(id).toBe(2);
    expect(tree.leafIds()).toEqual([1, 2]);
    expect(tree.lastCreated).toBe(2);
    expect(tree.layout(AREA)).toEqual([
      [1, { x: 0, y: 0, width: 40, height: 24 }],
      [2, { x: 40, y: 0, width: 40, height: 24 }],
    ]);
  });

  it('lists leaves depth-first, first child before second', () => {
    const tree = new PaneTree();
    tree.split(1, 'vertical');
    tree.split(1, 'horizontal');
    expect(tree.leafIds()).toEqual([1, 3, 2]);
    expect(tree.layout(AREA)).toEqual([
      [1, { x: 0, y: 0, width: 40, height: 12 }],
      [3, { x: 0, y: 12, width: 40, height: 12 }],
      [2, { x: 40, y: 0, width: 40, height: 24 }],
    ]);
  });

  it('throws PaneNotFoundError when splitting a missing pane', () => {
    const tree = new PaneTree();
    expect(() => tree.split(42, 'vertical')).toThrow(PaneNotFoundError);
    expect(tree.leafIds()).toEqual([1]);
  });

  it('rejects ratios outside (0, 1)', () => {
    const tree = new PaneTree();
    expect(() => tree.split(1, 'vertical', 0)).toThrow(RangeError);
    expect(() => tree.split(1, 'vertical', 1)).toThrow(RangeError);
  });

  it('accepts externally allocated ids', () => {
    const tree = new PaneTree(5);
    tree.splitWithId(5, 'horizontal', 9, 0.7);
    expect(tree.leafIds()).toEqual([5, 9]);
    expect(tree.split(9, 'vertical')).toBe(10);
  });

  describe('close', () => {
    it('promotes the sibling and returns its first leaf', () => {
      const tree = new PaneTree();
      tree.split(1, 'vertical');
      tree.split(1, 'horizontal');
      expect(tree.close(3)).toBe(1);
      expect(tree.leafIds()).toEqual([1, 2]);
    });

    it('returns the first leaf of a promoted subtree', () => {
      const tree = new PaneTree();
      tree.split(1, 'vertical');
      tree.split(2, 'horizontal');
      tree.split(3, 'vertical');
      expect(tree.leafIds()).toEqual([1, 2, 3, 4]);
      expect(tree.close(1)).toBe(2);
      expect(tree.leafIds()).toEqual([2, 3, 4]);
    });

    it('is a no-op on the only leaf', () => {
      const tree = new PaneTree();
      expect(tree.close(1)).toBeNull();
      expect(tree.leafIds()).toEqual([1]);
    });

    it('throws for a pane that is not in the tree', () => {
      const tree = new PaneTree();
      tree.split(1, 'vertical');
      expect(() => tree.close(7)).toThrow(PaneNotFoundError);
      expect(() => new PaneTree().close(7)).toThrow(PaneNotFoundError);
    });

    it('restores the previous structure after split then close of the new leaf', () => {
      const tree = new PaneTree();
      tree.split(1, 'vertical', 0.3);
      tree.split(2, 'horizontal');
      const before = structuredClone(tree.root);

      const id = tree.split(2, 'vertical', 0.6);
      tree.close(id);
      expect(tree.root).toEqual(before);
    });
  });

  describe('resize', () => {
    it('grows and shrinks the target side of its parent split', () => {
      const tree = new PaneTree();
      tree.split(1, 'vertical');
      expect(tree.resize(1, 0.1, true)).toBe(true);
      expect(tree.root.type === 'split' && tree.root.ratio).toBeCloseTo(0.6);
      tree.resize(2, 0.2, true);
      expect(tree.root.type === 'split' && tree.root.ratio).toBeCloseTo(0.4);
    });

    it('clamps the ratio to [0.1, 0.9]', () => {
      const tree = new PaneTree();
      tree.split(1, 'vertical');
      tree.resize(1, 5, true);
      expect(tree.root.type === 'split' && tree.root.ratio).toBe(0.9);
      tree.resize(1, 5, false);
      expect(tree.root.type === 'split' && tree.root.ratio).toBe(0.1);
    });

    it('returns false for the root leaf', () => {
      expect(new PaneTree().resize(1, 0.1, true)).toBe(false);
    });
  });

  describe('layout', () => {
    it('gives the remainder to the second child', () => {
      const [a, b] = splitRect({ x: 0, y: 0, width: 80, height: 25 }, 'horizontal', 0.5);
      expect(a.height).toBe(13);
      expect(b).toEqual({ x: 0, y: 13, width: 80, height: 12 });
    });

    it('allows degenerate rectangles', () => {
      const tree = new PaneTree();
      tree.split(1, 'vertical');
      tree.split(2, 'vertical');
      const rects = tree.layout({ x: 0, y: 0, width: 1, height: 1 });
      expect(rects.map(([id]) => id)).toEqual([1, 2, 3]);
      expect(rects.reduce((sum, [, r]) => sum + r.width * r.height, 0)).toBe(1);
    });

    it('is idempotent for an unchanged tree', () => {
      const tree = new PaneTree();
      tree.split(1, 'horizontal', 0.3);
      tree.split(2, 'vertical', 0.7);
      expect(tree.layout(AREA)).toEqual(tree.layout(AREA));
    });
  });

  it('keeps ids unique and conserves area across random split/close sequences', () => {
    const rand = lcg(20240917);
    const tree = new PaneTree();
    const seen = new Set<number>([1]);

    for (let step = 0; step < 300; step++) {
      const leaves = tree.leafIds();
      const target = leaves[Math.floor(rand() * leaves.length)];
      if (rand() < 0.55 || leaves.length === 1) {
        const orientation = rand() < 0.5 ? 'horizontal' : 'vertical';
        const id = tree.split(target, orientation, [0.3, 0.5, 0.7][Math.floor(rand() * 3)]);
        expect(seen.has(id)).toBe(false);
        seen.add(id);
      } else {
        const next = tree.close(target);
        expect(next === null ? false : tree.contains(next)).toBe(true);
      }

      const ids = tree.leafIds();
      expect(new Set(ids).size).toBe(ids.length);
      const rects = tree.layout(AREA);
      expect(rects.map(([id]) => id)).toEqual(ids);
      const area = rects.reduce((sum, [, r]) => sum + r.width * r.height, 0);
      expect(area).toBe(AREA.width * AREA.height);
    }
  });

  it('firstLeaf walks first children', () => {
    const tree = new PaneTree();
    tree.split(1, 'vertical');
    tree.split(1, 'horizontal');
    expect(firstLeaf(tree.root)).toBe(1);
  });

  it('returns the same leaf order on repeated calls and in layout', () => {
    const tree = new PaneTree();
    tree.split(1, 'vertical');
    tree.split(1, 'horizontal');
    tree.split(2, 'horizontal', 0.3);
    tree.split(4, 'vertical');
    tree.split(3, 'vertical', 0.7);

    const first = tree.leafIds();
    expect(first).toEqual([1, 3, 6, 2, 4, 5]);
    expect(tree.leafIds()).toEqual(first);
    expect(tree.leafIds()).toEqual(first);
    expect(tree.layout(AREA).map(([id]) => id)).toEqual(first);
    expect(tree.layout(AREA).map(([id]) => id)).toEqual(tree.leafIds());
  });

  it('exposes the root as a read-only view', () => {
    const tree = new PaneTree();
    tree.split(1, 'vertical');
    expectTypeOf(tree.root).toEqualTypeOf<ReadonlyPaneNode>();
    expect(tree.root).toEqual({
      type: 'split',
      orientation: 'vertical',
      ratio: 0.5,
      first: { type: 'leaf', id: 1 },
      second: { type: 'leaf', id: 2 },
    });
  });
});
