import { describe, it, expect } from 'vitest';
import { TabManager } from './TabManager';
import { PaneNotFoundError } from '../errors';

describe('TabManager', () => {
  it('starts with one tab holding pane 1', () => {
    const tabs = new TabManager('Main');
    expect(tabs.tabs).toHaveLength(1);
    expect(tabs.active.name).toBe('Main');
    expect(tabs.active.focusedPane).toBe(1);
    expect(tabs.allPaneIds()).toEqual([1]);
  });

  it('allocates pane ids from one counter across tabs', () => {
    const tabs = new TabManager('Main');
    expect(tabs.splitPane(1, 'vertical')).toBe(2);
    expect(tabs.newTab('Second')).toBe(3);
    expect(tabs.splitPane(3, 'horizontal')).toBe(4);
    expect(tabs.allPaneIds()).toEqual([1, 2, 3, 4]);
    expect(tabs.findTabOf(4)).toBe(1);
    expect(tabs.findTabOf(2)).toBe(0);
  });

  it('refuses to split a pane of another tab', () => {
    const tabs = new TabManager('Main');
    tabs.newTab('Second');
    expect(() => tabs.splitPane(1, 'vertical')).toThrow(PaneNotFoundError);
  });

  it('never closes the last tab', () => {
    const tabs = new TabManager('Main');
    expect(tabs.closeTab(0)).toBeNull();
    expect(tabs.tabs).toHaveLength(1);
  });

  it('returns the panes of a closed tab and keeps the active index valid', () => {
    const tabs = new TabManager('Main');
    tabs.newTab('Second');
    tabs.splitPane(2, 'vertical');
    expect(tabs.activeIndex).toBe(1);
    expect(tabs.closeTab(1)).toEqual([2, 3]);
    expect(tabs.activeIndex).toBe(0);
    expect(tabs.allPaneIds()).toEqual([1]);
  });

  it('shifts the active index when an earlier tab closes', () => {
    const tabs = new TabManager('A');
    tabs.newTab('B');
    tabs.newTab('C');
    tabs.closeTab(0);
    expect(tabs.active.name).toBe('C');
  });

  it('cycles through tabs in both directions', () => {
    const tabs = new TabManager('A');
    tabs.newTab('B');
    tabs.newTab('C');
    tabs.nextTab();
    expect(tabs.active.name).toBe('A');
    tabs.prevTab();
    expect(tabs.active.name).toBe('C');
    expect(tabs.switchTab(1)).toBe(true);
    expect(tabs.active.name).toBe('B');
    expect(tabs.switchTab(5)).toBe(false);
  });
});
