/**
 * Live table of one resource kind, fed by the pane's watcher.
 *
 * Snapshots replace the rows wholesale; the selection follows the selected
 * object (by name and namespace) across snapshots, filtering and sorting.
 */

import { isNamespaced, kindInfo } from 'kubegrid-shared';
import type { PaneDelivery, Rect, ResourceKind, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags, padCell, scrollWindow, sliceFrom, truncate } from '../formatters';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame, SelectedResource } from './types';

const MAX_COLUMN_WIDTH = 48;
const COLUMN_GAP = '  ';
const HSCROLL_STEP = 4;

export interface ResourceListOptions {
  namespace: string;
  allNamespaces?: boolean;
  /** Configured visible columns, in display order. Unknown names are ignored. */
  columns?: string[];
}

export class ResourceListPane implements Pane {
  readonly viewType: ViewType;
  private headers: string[] = [];
  private rows: string[][] = [];
  private visible: number[] = [];
  private display: string[][] = [];
  private _namespace: string;
  private _allNamespaces: boolean;
  private readonly columns: string[] | undefined;
  private filter = '';
  private _sortColumn: number | null = null;
  private sortAscending = true;
  private selected = 0;
  private offset = 0;
  private hscroll = 0;
  private pageSize = 10;
  private loaded = false;
  private error: string | null = null;

  constructor(readonly kind: ResourceKind, options: ResourceListOptions) {
    this.viewType = { type: 'resource-list', kind };
    this._namespace = options.namespace;
    this._allNamespaces = options.allNamespaces ?? false;
    this.columns = options.columns;
  }

  get namespace(): string {
    return this._namespace;
  }

  get allNamespaces(): boolean {
    return this._allNamespaces;
  }

  /** Namespace the watcher should be bound to; empty means all. */
  get watchNamespace(): string {
    return this._allNamespaces ? '' : this._namespace;
  }

  get sortColumn(): number | null {
    return this._sortColumn;
  }

  get columnCount(): number {
    return this.visible.length;
  }

  get rowCount(): number {
    return this.display.length;
  }

  get selectedIndex(): number {
    return this.selected;
  }

  get filterText(): string {
    return this.filter;
  }

  get errorMessage(): string | null {
    return this.error;
  }

  /** Rows as shown (filtered and sorted), visible columns only. */
  visibleRows(): string[][] {
    return this.display.map((row) => this.visible.map((i) => row[i] ?? ''));
  }

  visibleHeaders(): string[] {
    return this.visible.map((i) => this.headers[i]);
  }

  /** Points the pane at another namespace scope; rows are cleared until the next snapshot. */
  setScope(namespace: string, allNamespaces: boolean): void {
    this._namespace = namespace;
    this._allNamespaces = allNamespaces;
    this.resetRows();
  }

  resetRows(): void {
    this.rows = [];
    this.display = [];
    this.loaded = false;
    this.error = null;
    this.selected = 0;
    this.offset = 0;
  }

  handleDelivery(event: PaneDelivery): void {
    if (event.type === 'resource-update') {
      this.applySnapshot(event.headers, event.rows);
    } else if (event.type === 'resource-error') {
      this.error = event.message;
    }
  }

  selectedResource(): SelectedResource | null {
    const row = this.display[this.selected];
    if (!row) return null;
    return this.identity(row);
  }

  handleCommand(command: PaneCommand): void {
    const last = Math.max(0, this.display.length - 1);
    switch (command.type) {
      case 'select-next':
      case 'scroll-down':
        this.selected = Math.min(last, this.selected + 1);
        break;
      case 'select-prev':
      case 'scroll-up':
        this.selected = Math.max(0, this.selected - 1);
        break;
      case 'go-to-top':
        this.selected = 0;
        break;
      case 'go-to-bottom':
        this.selected = last;
        break;
      case 'page-down':
        this.selected = Math.min(last, this.selected + this.pageSize);
        break;
      case 'page-up':
        this.selected = Math.max(0, this.selected - this.pageSize);
        break;
      case 'scroll-left':
        this.hscroll = Math.max(0, this.hscroll - HSCROLL_STEP);
        break;
      case 'scroll-right':
        this.hscroll += HSCROLL_STEP;
        break;
      case 'filter':
        this.refresh(() => { this.filter = command.text; });
        break;
      case 'clear-filter':
        this.refresh(() => { this.filter = ''; });
        break;
      case 'sort-by-column':
        if (command.column < 0 || command.column >= this.visible.length) break;
        this.refresh(() => {
          if (this._sortColumn === command.column) {
            this.sortAscending = !this.sortAscending;
          } else {
            this._sortColumn = command.column;
            this.sortAscending = true;
          }
        });
        break;
      case 'toggle-sort-order':
        if (this._sortColumn === null) break;
        this.refresh(() => { this.sortAscending = !this.sortAscending; });
        break;
      default:
        break;
    }
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    const { width, height } = contentSize(rect);
    const lines: string[] = [];

    if (this.error) {
      lines.push(`{${theme.error}-fg}${escapeTags(truncate(`Error: ${this.error}`, width))}{/${theme.error}-fg}`);
    }

    if (!this.loaded && this.rows.length === 0) {
      if (!this.error) lines.push(`{${theme.muted}-fg}loading…{/${theme.muted}-fg}`);
    } else if (this.display.length === 0) {
      lines.push(`{${theme.muted}-fg}${this.filter ? 'no matches' : 'no data'}{/${theme.muted}-fg}`);
    } else {
      const widths = this.columnWidths();
      const header = this.visible
        .map((col, i) => padCell(this.headers[col] + this.sortMarker(i), widths[i]))
        .join(COLUMN_GAP);
      lines.push(`{bold}${escapeTags(sliceFrom(header, this.hscroll))}{/bold}`);

      const bodyHeight = Math.max(1, height - lines.length);
      this.pageSize = bodyHeight;
      this.offset = scrollWindow(this.selected, this.offset, bodyHeight, this.display.length);
      const window = this.display.slice(this.offset, this.offset + bodyHeight);
      window.forEach((row, i) => {
        const text = this.visible.map((col, c) => padCell(row[col] ?? '', widths[c])).join(COLUMN_GAP);
        const plain = sliceFrom(text, this.hscroll);
        if (this.offset + i !== this.selected) {
          lines.push(escapeTags(plain));
        } else if (focused) {
          lines.push(`{${theme.selection}-bg}${escapeTags(plain.padEnd(width))}{/${theme.selection}-bg}`);
        } else {
          lines.push(`{bold}${escapeTags(plain)}{/bold}`);
        }
      });
    }

    return {
      title: this.title(),
      lines: lines.slice(0, height),
      footer: this.footer(),
      borderColor: borderColor(focused, theme),
    };
  }

  // ── Internals ──

  private title(): string {
    const scope = !isNamespaced(this.kind) ? '' : this._allNamespaces ? '(all)' : `(${this._namespace})`;
    const count = this.loaded ? ` [${this.display.length}]` : '';
    return `${kindInfo(this.kind).displayName}${scope}${count}`;
  }

  private footer(): string | undefined {
    const parts: string[] = [];
    if (this.filter) parts.push(`/${this.filter}`);
    if (this._sortColumn !== null) {
      const header = this.headers[this.visible[this._sortColumn]] ?? '';
      parts.push(`sort: ${header} ${this.sortAscending ? 'asc' : 'desc'}`);
    }
    return parts.length > 0 ? parts.join('  ') : undefined;
  }

  private sortMarker(visibleIndex: number): string {
    if (this._sortColumn !== visibleIndex) return '';
    return this.sortAscending ? '▲' : '▼';
  }

  private columnWidths(): number[] {
    return this.visible.map((col, i) => {
      let w = this.headers[col].length + (this._sortColumn === i ? 1 : 0);
      for (const row of this.display) w = Math.max(w, (row[col] ?? '').length);
      return Math.min(w, MAX_COLUMN_WIDTH);
    });
  }

  private applySnapshot(headers: string[], rows: string[][]): void {
    const headersChanged = headers.join('\0') !== this.headers.join('\0');
    this.refresh(() => {
      this.headers = headers;
      this.rows = rows;
      this.loaded = true;
      this.error = null;
      if (headersChanged) {
        this.visible = this.visibleColumns(headers);
        if (this._sortColumn !== null && this._sortColumn >= this.visible.length) this._sortColumn = null;
      }
    });
  }

  private visibleColumns(headers: string[]): number[] {
    const configured = (this.columns ?? [])
      .map((name) => headers.indexOf(name.toUpperCase()))
      .filter((i) => i >= 0);
    return configured.length > 0 ? configured : headers.map((_, i) => i);
  }

  /** Applies a mutation, recomputes the displayed rows and keeps the selected object selected. */
  private refresh(mutate: () => void): void {
    const before = this.display[this.selected];
    const keep = before ? this.identity(before) : null;
    mutate();
    this.display = this.computeDisplay();
    if (keep) {
      const index = this.display.findIndex((row) => {
        const id = this.identity(row);
        return id.name === keep.name && id.namespace === keep.namespace;
      });
      if (index >= 0) {
        this.selected = index;
        return;
      }
    }
    this.selected = Math.max(0, Math.min(this.selected, this.display.length - 1));
  }

  private computeDisplay(): string[][] {
    const needle = this.filter.toLowerCase();
    const filtered = needle
      ? this.rows.filter((row) => row.some((cell) => cell.toLowerCase().includes(needle)))
      : [...this.rows];
    if (this._sortColumn === null) return filtered;
    const col = this.visible[this._sortColumn];
    const dir = this.sortAscending ? 1 : -1;
    return filtered.sort((a, b) => dir * (a[col] ?? '').localeCompare(b[col] ?? '', undefined, { numeric: true }));
  }

  private identity(row: string[]): SelectedResource {
    const nameIdx = this.headers.indexOf('NAME');
    const nsIdx = this.headers.indexOf('NAMESPACE');
    const name = row[nameIdx >= 0 ? nameIdx : 0] ?? '';
    let namespace = '';
    if (isNamespaced(this.kind)) namespace = nsIdx >= 0 ? row[nsIdx] ?? this._namespace : this._namespace;
    return { kind: this.kind, name, namespace };
  }
}
