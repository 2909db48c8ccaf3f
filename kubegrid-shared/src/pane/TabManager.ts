/**
 * Tabs, each owning an independent pane tree.
 *
 * Pane ids come from one counter shared by every tab, so an id identifies a
 * pane across the whole process and is never handed out twice.
 */

import { PaneNotFoundError } from '../errors';
import { PaneTree, DEFAULT_RATIO } from './PaneTree';
import type { PaneId, SplitOrientation } from './types';

export interface Tab {
  id: number;
  name: string;
  paneTree: PaneTree;
  focusedPane: PaneId;
  fullscreenPane: PaneId | null;
}

export class TabManager {
  private _tabs: Tab[] = [];
  private _activeIndex = 0;
  private nextPaneId: PaneId = 1;
  private nextTabId = 1;

  constructor(firstTabName: string) {
    this.newTab(firstTabName);
  }

  get tabs(): readonly Tab[] {
    return this._tabs;
  }

  get activeIndex(): number {
    return this._activeIndex;
  }

  get active(): Tab {
    return this._tabs[this._activeIndex];
  }

  allocPaneId(): PaneId {
    return this.nextPaneId++;
  }

  /** Creates a tab with a single fresh pane and activates it. Returns that pane's id. */
  newTab(name: string): PaneId {
    const rootId = this.allocPaneId();
    this._tabs.push({
      id: this.nextTabId++,
      name,
      paneTree: new PaneTree(rootId),
      focusedPane: rootId,
      fullscreenPane: null,
    });
    this._activeIndex = this._tabs.length - 1;
    return rootId;
  }

  /**
   * Closes the tab at `index`. The last remaining tab cannot be closed.
   * Returns the pane ids that belonged to it, or null when refused.
   */
  closeTab(index: number): PaneId[] | null {
    if (this._tabs.length <= 1 || index < 0 || index >= this._tabs.length) return null;
    const [removed] = this._tabs.splice(index, 1);
    if (this._activeIndex >= this._tabs.length) {
      this._activeIndex = this._tabs.length - 1;
    } else if (index < this._activeIndex) {
      this._activeIndex--;
    }
    return removed.paneTree.leafIds();
  }

  switchTab(index: number): boolean {
    if (index < 0 || index >= this._tabs.length) return false;
    this._activeIndex = index;
    return true;
  }

  nextTab(): void {
    this._activeIndex = (this._activeIndex + 1) % this._tabs.length;
  }

  prevTab(): void {
    this._activeIndex = (this._activeIndex + this._tabs.length - 1) % this._tabs.length;
  }

  /** Splits a pane of the active tab using a globally allocated id. */
  splitPane(target: PaneId, orientation: SplitOrientation, ratio: number = DEFAULT_RATIO): PaneId {
    const tree = this.active.paneTree;
    if (!tree.contains(target)) throw new PaneNotFoundError(target);
    const id = this.allocPaneId();
    tree.splitWithId(target, orientation, id, ratio);
    return id;
  }

  /** Every pane id of every tab, tab by tab. */
  allPaneIds(): PaneId[] {
    return this._tabs.flatMap((tab) => tab.paneTree.leafIds());
  }

  findTabOf(paneId: PaneId): number {
    return this._tabs.findIndex((tab) => tab.paneTree.contains(paneId));
  }
}
