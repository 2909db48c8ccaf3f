import { describe, it, expect } from 'vitest';
import { tabAt, tabScrollOffset, tabSlots } from './tabStrip';

const names = ['Main', 'App Logs', 'Tab 3'];

describe('tabSlots', () => {
  it('places labels three columns apart', () => {
    expect(tabSlots(names, 0).map((s) => [s.label, s.start, s.end])).toEqual([
      ['[1] Main', 0, 8],
      ['[2] App Logs', 11, 23],
      ['[3] Tab 3', 26, 35],
    ]);
  });

  it('starts at the scroll offset', () => {
    expect(tabSlots(names, 1)[0]).toEqual({ index: 1, label: '[2] App Logs', start: 0, end: 12 });
  });
});

describe('tabAt', () => {
  it('hits labels and misses gaps', () => {
    expect(tabAt(names, 0, 0)).toBe(0);
    expect(tabAt(names, 0, 9)).toBeNull();
    expect(tabAt(names, 0, 22)).toBe(1);
    expect(tabAt(names, 0, 40)).toBeNull();
    expect(tabAt(names, 1, 0)).toBe(1);
  });
});

describe('tabScrollOffset', () => {
  it('scrolls right until the active tab fits', () => {
    expect(tabScrollOffset(names, 2, 0, 30)).toBe(1);
    expect(tabScrollOffset(names, 2, 0, 40)).toBe(0);
  });

  it('scrolls left to an active tab before the offset', () => {
    expect(tabScrollOffset(names, 0, 2, 30)).toBe(0);
  });
});
