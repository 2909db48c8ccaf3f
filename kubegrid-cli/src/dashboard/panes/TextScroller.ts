/**
 * Vertical and horizontal scroll state for panes that show a block of text.
 */

import type { PaneCommand } from '../commands';

const HSCROLL_STEP = 8;

export class TextScroller {
  private _offset = 0;
  private _column = 0;
  private page = 10;

  get offset(): number {
    return this._offset;
  }

  get column(): number {
    return this._column;
  }

  /** Returns the lines visible in a window of `height`, clamping the offset to the line count. */
  window<T>(lines: readonly T[], height: number): T[] {
    this.page = Math.max(1, height);
    this._offset = Math.max(0, Math.min(this._offset, lines.length - height));
    return lines.slice(this._offset, this._offset + height);
  }

  /** True when the command was a scroll command. */
  handle(command: PaneCommand): boolean {
    switch (command.type) {
      case 'select-next':
      case 'scroll-down':
        this._offset++;
        return true;
      case 'select-prev':
      case 'scroll-up':
        this._offset = Math.max(0, this._offset - 1);
        return true;
      case 'page-down':
        this._offset += this.page;
        return true;
      case 'page-up':
        this._offset = Math.max(0, this._offset - this.page);
        return true;
      case 'go-to-top':
        this._offset = 0;
        return true;
      case 'go-to-bottom':
        this._offset = Number.MAX_SAFE_INTEGER;
        return true;
      case 'scroll-left':
        this._column = Math.max(0, this._column - HSCROLL_STEP);
        return true;
      case 'scroll-right':
        this._column += HSCROLL_STEP;
        return true;
      default:
        return false;
    }
  }

  /** Scrolled to the last line (or nothing to scroll) for `total` lines in `height`. */
  atBottom(total: number, height: number): boolean {
    return this._offset >= total - height;
  }

  toBottom(): void {
    this._offset = Number.MAX_SAFE_INTEGER;
  }
}
