/**
 * Geometry of the tab bar on the first screen row, shared by the renderer
 * and mouse hit-testing.
 */

/** Columns between two tab labels. */
export const TAB_GAP = 3;

export interface TabSlot {
  index: number;
  label: string;
  /** First column of the label. */
  start: number;
  /** One past the last column. */
  end: number;
}

export function tabLabel(index: number, name: string): string {
  return `[${index + 1}] ${name}`;
}

/** Labels laid out left to right, starting with the tab at `offset`. */
export function tabSlots(names: readonly string[], offset: number): TabSlot[] {
  const slots: TabSlot[] = [];
  let x = 0;
  for (let index = Math.max(0, offset); index < names.length; index++) {
    const label = tabLabel(index, names[index]);
    slots.push({ index, label, start: x, end: x + label.length });
    x += label.length + TAB_GAP;
  }
  return slots;
}

/** Tab under column `x`, or null on a gap or past the last label. */
export function tabAt(names: readonly string[], offset: number, x: number): number | null {
  const slot = tabSlots(names, offset).find((s) => x >= s.start && x < s.end);
  return slot ? slot.index : null;
}

/** Scroll offset that keeps the active tab fully inside `width` columns. */
export function tabScrollOffset(names: readonly string[], active: number, offset: number, width: number): number {
  if (active < offset) return active;
  let start = offset;
  for (;;) {
    const slot = tabSlots(names, start).find((s) => s.index === active);
    if (!slot || slot.end <= width || start >= active) return start;
    start++;
  }
}
