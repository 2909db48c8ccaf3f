/**
 * Multi-line text buffer with a cursor, for the SQL editor.
 */

import type { Direction } from 'kubegrid-shared';

const INDENT = '  ';

export class QueryEditor {
  private lines: string[] = [''];
  private _row = 0;
  private _col = 0;

  get row(): number {
    return this._row;
  }

  get col(): number {
    return this._col;
  }

  get lineList(): readonly string[] {
    return this.lines;
  }

  get content(): string {
    return this.lines.join('\n');
  }

  setContent(text: string): void {
    this.lines = text.split('\n');
    this._row = 0;
    this._col = 0;
  }

  insert(char: string): void {
    const line = this.lines[this._row];
    this.lines[this._row] = line.slice(0, this._col) + char + line.slice(this._col);
    this._col += char.length;
  }

  backspace(): void {
    if (this._col > 0) {
      const line = this.lines[this._row];
      this.lines[this._row] = line.slice(0, this._col - 1) + line.slice(this._col);
      this._col--;
    } else if (this._row > 0) {
      const [current] = this.lines.splice(this._row, 1);
      this._row--;
      this._col = this.lines[this._row].length;
      this.lines[this._row] += current;
    }
  }

  /** Replaces the `length` characters left of the cursor with `text`. */
  replaceBeforeCursor(length: number, text: string): void {
    const line = this.lines[this._row];
    const start = Math.max(0, this._col - length);
    this.lines[this._row] = line.slice(0, start) + text + line.slice(this._col);
    this._col = start + text.length;
  }

  newline(): void {
    const line = this.lines[this._row];
    this.lines[this._row] = line.slice(0, this._col);
    this.lines.splice(this._row + 1, 0, line.slice(this._col));
    this._row++;
    this._col = 0;
  }

  indent(): void {
    this.lines[this._row] = INDENT + this.lines[this._row];
    this._col += INDENT.length;
  }

  deindent(): void {
    const line = this.lines[this._row];
    const spaces = line.startsWith(INDENT) ? 2 : line.startsWith(' ') ? 1 : 0;
    if (spaces === 0) return;
    this.lines[this._row] = line.slice(spaces);
    this._col = Math.max(0, this._col - spaces);
  }

  move(direction: Direction | 'home' | 'end'): void {
    switch (direction) {
      case 'up':
        if (this._row > 0) {
          this._row--;
          this._col = Math.min(this._col, this.lines[this._row].length);
        }
        break;
      case 'down':
        if (this._row + 1 < this.lines.length) {
          this._row++;
          this._col = Math.min(this._col, this.lines[this._row].length);
        }
        break;
      case 'left':
        if (this._col > 0) {
          this._col--;
        } else if (this._row > 0) {
          this._row--;
          this._col = this.lines[this._row].length;
        }
        break;
      case 'right':
        if (this._col < this.lines[this._row].length) {
          this._col++;
        } else if (this._row + 1 < this.lines.length) {
          this._row++;
          this._col = 0;
        }
        break;
      case 'home':
        this._col = 0;
        break;
      case 'end':
        this._col = this.lines[this._row].length;
        break;
    }
  }
}
