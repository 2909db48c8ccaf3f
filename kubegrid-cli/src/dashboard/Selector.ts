/**
 * Filterable single-choice list behind the namespace, context and resource
 * switcher overlays.
 */

export class Selector<T> {
  private _filter = '';
  private _selected = 0;

  constructor(
    readonly title: string,
    private items: readonly T[],
    private readonly label: (item: T) => string,
  ) {}

  get filter(): string {
    return this._filter;
  }

  get selected(): number {
    return this._selected;
  }

  /** Items whose label contains the filter, case-insensitively, in original order. */
  get matches(): T[] {
    const needle = this._filter.toLowerCase();
    if (!needle) return [...this.items];
    return this.items.filter((item) => this.label(item).toLowerCase().includes(needle));
  }

  labels(): string[] {
    return this.matches.map(this.label);
  }

  current(): T | null {
    return this.matches[this._selected] ?? null;
  }

  setItems(items: readonly T[]): void {
    this.items = items;
    this.clamp();
  }

  input(char: string): void {
    this._filter += char;
    this._selected = 0;
  }

  backspace(): void {
    this._filter = this._filter.slice(0, -1);
    this._selected = 0;
  }

  next(): void {
    const count = this.matches.length;
    if (count > 0) this._selected = (this._selected + 1) % count;
  }

  prev(): void {
    const count = this.matches.length;
    if (count > 0) this._selected = (this._selected + count - 1) % count;
  }

  /** Moves the selection onto the first item matching `predicate`, if any. */
  selectWhere(predicate: (item: T) => boolean): void {
    const index = this.matches.findIndex(predicate);
    if (index >= 0) this._selected = index;
  }

  private clamp(): void {
    this._selected = Math.max(0, Math.min(this._selected, this.matches.length - 1));
  }
}
