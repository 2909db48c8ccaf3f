/**
 * SQL console against a database pod: an editor on top, the last result
 * below. Results can be browsed row by row, copied and exported as CSV.
 *
 * At most one popup is open at a time: statement history, the save-name
 * prompt, the saved-query list, the export path dialog or the completion
 * list. The pane holds their state; the controller owns the stores behind
 * them and the input mode.
 */

import { columnWidths, complete, filterSavedQueries, resultToCsv, rowToCsv, viewLabel } from 'kubegrid-shared';
import type {
  PaneDelivery,
  QueryHistory,
  QueryHistoryEntry,
  QueryResult,
  QuerySchema,
  QuerySession,
  Rect,
  SavedQuery,
  ThemeConfig,
  ViewType,
} from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags, padCell, scrollWindow, sliceFrom, truncate, withCursor } from '../formatters';
import { QueryEditor } from './QueryEditor';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame, SelectedResource } from './types';

export type QueryStatus = 'connecting' | 'ready' | 'executing' | 'error';

export type QueryPopup =
  | { type: 'history'; entries: readonly QueryHistoryEntry[]; selected: number }
  | { type: 'save-name'; name: string }
  /** `selected` indexes the filtered list; `filter` and `rename` are null while not being typed. */
  | { type: 'saved'; entries: readonly SavedQuery[]; selected: number; filter: string | null; rename: string | null }
  | { type: 'export'; path: string }
  | { type: 'completion'; items: string[]; selected: number; prefix: string };

type SavedPopup = Extract<QueryPopup, { type: 'saved' }>;

const MAX_CELL_WIDTH = 40;
const HSCROLL_STEP = 8;
/** Results this long get a status-line reminder that they can be exported. */
export const EXPORT_HINT_ROWS = 100;
const NAME_COLUMN = 24;

function oneLine(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim();
}

export class QueryPane implements Pane {
  readonly viewType: ViewType;
  readonly editor = new QueryEditor();
  private _session: QuerySession | null = null;
  private _status: QueryStatus = 'connecting';
  private _serverVersion = '';
  private _result: QueryResult | null = null;
  private _error: string | null = null;
  private _lastSql: string | null = null;
  private selectedRow = 0;
  private rowOffset = 0;
  private editorOffset = 0;
  private hscroll = 0;
  private page = 10;
  private _popup: QueryPopup | null = null;
  private _schema: QuerySchema = { tables: [], columns: {} };
  private _history: QueryHistory | null = null;
  /** Set by the controller while the results have keyboard focus. */
  browsing = false;

  constructor(readonly pod: string, readonly namespace: string) {
    this.viewType = { type: 'query', pod, namespace };
  }

  get session(): QuerySession | null {
    return this._session;
  }

  get status(): QueryStatus {
    return this._status;
  }

  get serverVersion(): string {
    return this._serverVersion;
  }

  get result(): QueryResult | null {
    return this._result;
  }

  get error(): string | null {
    return this._error;
  }

  get lastSql(): string | null {
    return this._lastSql;
  }

  get popup(): QueryPopup | null {
    return this._popup;
  }

  get schema(): QuerySchema {
    return this._schema;
  }

  /** Statements run in this pane's database; null until the connection settings are known. */
  get history(): QueryHistory | null {
    return this._history;
  }

  get selectedIndex(): number {
    return this.selectedRow;
  }

  get rowCount(): number {
    return this._result?.rows.length ?? 0;
  }

  attach(session: QuerySession, history: QueryHistory | null = null): void {
    this._session?.cancel();
    this._session = session;
    this._history = history;
    this._status = 'connecting';
  }

  // ── Popups ──

  showHistory(entries: readonly QueryHistoryEntry[]): void {
    const selected = this._popup?.type === 'history' ? this._popup.selected : 0;
    this._popup = { type: 'history', entries, selected: Math.min(selected, Math.max(0, entries.length - 1)) };
  }

  promptSaveName(): void {
    this._popup = { type: 'save-name', name: '' };
  }

  /** Opens the saved-query list, or refreshes it in place keeping the filter. */
  showSaved(entries: readonly SavedQuery[]): void {
    const current = this._popup?.type === 'saved' ? this._popup : null;
    const popup: SavedPopup = { type: 'saved', entries, selected: current?.selected ?? 0, filter: current?.filter ?? null, rename: null };
    this._popup = popup;
    this.clampSaved(popup);
  }

  showExport(path: string): void {
    this._popup = { type: 'export', path };
  }

  /** Opens the completion list for the word at the cursor; false when nothing matches. */
  startCompletion(): boolean {
    const found = complete(this.editor.lineList, this.editor.row, this.editor.col, this._schema);
    this._popup = found ? { type: 'completion', items: found.items, selected: 0, prefix: found.prefix } : null;
    return found !== null;
  }

  closePopup(): void {
    this._popup = null;
  }

  popupMove(delta: 1 | -1): void {
    const popup = this._popup;
    if (!popup) return;
    switch (popup.type) {
      case 'history':
        popup.selected = Math.max(0, Math.min(popup.entries.length - 1, popup.selected + delta));
        break;
      case 'saved':
        popup.selected += delta;
        this.clampSaved(popup);
        break;
      case 'completion':
        popup.selected = (popup.selected + delta + popup.items.length) % popup.items.length;
        break;
      default:
        break;
    }
  }

  /** Typed text; in the completion list it goes to the editor and the list follows. */
  popupInput(char: string): void {
    const popup = this._popup;
    if (!popup) return;
    switch (popup.type) {
      case 'save-name':
        popup.name += char;
        break;
      case 'export':
        popup.path += char;
        break;
      case 'saved':
        if (popup.rename !== null) {
          popup.rename += char;
        } else if (popup.filter !== null) {
          popup.filter += char;
          popup.selected = 0;
          this.clampSaved(popup);
        }
        break;
      case 'completion':
        this.editor.insert(char);
        this.startCompletion();
        break;
      default:
        break;
    }
  }

  popupBackspace(): void {
    const popup = this._popup;
    if (!popup) return;
    switch (popup.type) {
      case 'save-name':
        popup.name = popup.name.slice(0, -1);
        break;
      case 'export':
        popup.path = popup.path.slice(0, -1);
        break;
      case 'saved':
        if (popup.rename !== null) {
          popup.rename = popup.rename.slice(0, -1);
        } else if (popup.filter !== null) {
          popup.filter = popup.filter.slice(0, -1);
          this.clampSaved(popup);
        }
        break;
      case 'completion':
        this.editor.backspace();
        this.startCompletion();
        break;
      default:
        break;
    }
  }

  startSavedFilter(): void {
    if (this._popup?.type !== 'saved') return;
    this._popup.filter = this._popup.filter ?? '';
    this._popup.rename = null;
  }

  startSavedRename(): void {
    const selection = this.savedSelection();
    if (this._popup?.type !== 'saved' || !selection) return;
    this._popup.rename = selection[1].name;
  }

  /** Leaves rename, then filter; false when neither was active. */
  closeSavedSubMode(): boolean {
    const popup = this._popup;
    if (popup?.type !== 'saved') return false;
    if (popup.rename !== null) {
      popup.rename = null;
      return true;
    }
    if (popup.filter !== null) {
      const keep = this.savedSelection()?.[0];
      popup.filter = null;
      popup.selected = keep ?? 0;
      this.clampSaved(popup);
      return true;
    }
    return false;
  }

  /** Index into the history and the entry under the cursor. */
  historySelection(): [number, QueryHistoryEntry] | null {
    if (this._popup?.type !== 'history') return null;
    const entry = this._popup.entries[this._popup.selected];
    return entry ? [this._popup.selected, entry] : null;
  }

  /** Index into the full saved list and the entry under the cursor. */
  savedSelection(): [number, SavedQuery] | null {
    if (this._popup?.type !== 'saved') return null;
    return this.savedVisible(this._popup)[this._popup.selected] ?? null;
  }

  /** Replaces the editor content with `sql` and closes the popup. */
  loadSql(sql: string): void {
    this.editor.setContent(sql);
    this._popup = null;
  }

  acceptCompletion(): void {
    if (this._popup?.type !== 'completion') return;
    const { items, selected, prefix } = this._popup;
    const word = items[selected];
    if (word !== undefined) this.editor.replaceBeforeCursor(prefix.length, word);
    this._popup = null;
  }

  /** Marks a statement as running; returns the trimmed SQL, or null when there is nothing to run. */
  beginExecute(): string | null {
    const sql = this.editor.content.trim();
    if (!sql || this._status === 'connecting') return null;
    this._status = 'executing';
    this._lastSql = sql;
    this._error = null;
    return sql;
  }

  /** Connection failed before the first result; the pane shows the message in its status line. */
  fail(message: string): void {
    this._status = 'error';
    this._error = message;
  }

  selectedRowCsv(): string | null {
    const row = this._result?.rows[this.selectedRow];
    return row ? rowToCsv(row) : null;
  }

  allRowsCsv(): string | null {
    return this._result && this._result.columns.length > 0 ? resultToCsv(this._result) : null;
  }

  handleDelivery(event: PaneDelivery): void {
    if (event.type === 'query-result') {
      if (this._status === 'connecting') {
        this._serverVersion = event.result.rows[0]?.[0] ?? '';
      } else {
        this._result = event.result;
        this.selectedRow = 0;
        this.rowOffset = 0;
        this.hscroll = 0;
      }
      this._status = 'ready';
      this._error = null;
    } else if (event.type === 'query-schema') {
      this._schema = event.schema;
    } else if (event.type === 'query-error') {
      this._status = this._status === 'connecting' ? 'error' : 'ready';
      this._error = event.message;
    }
  }

  selectedResource(): SelectedResource {
    return { kind: 'pods', name: this.pod, namespace: this.namespace };
  }

  handleCommand(command: PaneCommand): void {
    const last = Math.max(0, this.rowCount - 1);
    switch (command.type) {
      case 'query-input':
        this.editor.insert(command.char);
        break;
      case 'query-backspace':
        this.editor.backspace();
        break;
      case 'query-newline':
        this.editor.newline();
        break;
      case 'query-indent':
        this.editor.indent();
        break;
      case 'query-deindent':
        this.editor.deindent();
        break;
      case 'query-cursor':
        this.editor.move(command.direction);
        break;
      case 'query-scroll':
        this.selectedRow = command.direction === 'up'
          ? Math.max(0, this.selectedRow - this.page)
          : Math.min(last, this.selectedRow + this.page);
        break;
      case 'query-browse-next':
      case 'select-next':
        this.selectedRow = Math.min(last, this.selectedRow + 1);
        break;
      case 'query-browse-prev':
      case 'select-prev':
        this.selectedRow = Math.max(0, this.selectedRow - 1);
        break;
      case 'query-browse-left':
      case 'scroll-left':
        this.hscroll = Math.max(0, this.hscroll - HSCROLL_STEP);
        break;
      case 'query-browse-right':
      case 'scroll-right':
        this.hscroll += HSCROLL_STEP;
        break;
      default:
        break;
    }
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    const { width, height } = contentSize(rect);
    const editorHeight = Math.max(1, Math.min(this.editor.lineList.length, Math.floor(height / 3)));
    const lines: string[] = [];

    // ── Editor ──
    const row = this.editor.row;
    if (row < this.editorOffset) this.editorOffset = row;
    if (row >= this.editorOffset + editorHeight) this.editorOffset = row - editorHeight + 1;
    const editing = focused && !this.browsing;
    this.editor.lineList.slice(this.editorOffset, this.editorOffset + editorHeight).forEach((text, i) => {
      const lineNo = `{${theme.muted}-fg}${String(this.editorOffset + i + 1).padStart(3)} {/${theme.muted}-fg}`;
      const isCursorLine = editing && this.editorOffset + i === row;
      lines.push(lineNo + (isCursorLine ? withCursor(text, this.editor.col) : escapeTags(text)));
    });

    const completion = this._popup;
    if (completion?.type === 'completion') {
      const indent = ' '.repeat(4 + Math.max(0, this.editor.col - completion.prefix.length));
      const itemWidth = Math.max(...completion.items.map((item) => item.length));
      completion.items.forEach((item, i) => {
        const text = escapeTags(item.padEnd(itemWidth));
        lines.push(i === completion.selected
          ? `${indent}{${theme.selection}-bg}${text}{/${theme.selection}-bg}`
          : `${indent}{inverse}${text}{/inverse}`);
      });
    }

    lines.push(`{${theme.muted}-fg}${'─'.repeat(Math.max(0, width))}{/${theme.muted}-fg}`);
    lines.push(this.statusLine(theme, width));

    // ── Results ──
    const result = this._result;
    const popupLines = this.popupLines(theme, width);
    if (popupLines) {
      lines.push(...popupLines);
    } else if (result && result.columns.length > 0) {
      const widths = columnWidths(result).map((w) => Math.min(w, MAX_CELL_WIDTH));
      const header = result.columns.map((c, i) => padCell(c, widths[i])).join(' │ ');
      lines.push(`{bold}${escapeTags(sliceFrom(header, this.hscroll))}{/bold}`);
      const body = Math.max(1, height - lines.length);
      this.page = body;
      this.rowOffset = scrollWindow(this.selectedRow, this.rowOffset, body, result.rows.length);
      result.rows.slice(this.rowOffset, this.rowOffset + body).forEach((cells, i) => {
        const text = sliceFrom(cells.map((c, j) => padCell(c, widths[j] ?? 0)).join(' │ '), this.hscroll);
        const selected = this.browsing && this.rowOffset + i === this.selectedRow;
        lines.push(selected
          ? `{${theme.selection}-bg}${escapeTags(text.padEnd(width))}{/${theme.selection}-bg}`
          : escapeTags(text));
      });
    } else if (result?.notice) {
      lines.push(escapeTags(result.notice));
    }

    return {
      title: viewLabel(this.viewType),
      lines: lines.slice(0, height),
      footer: this.footer(),
      borderColor: borderColor(focused, theme),
    };
  }

  dispose(): void {
    this._session?.cancel();
    this._session = null;
  }

  private footer(): string {
    switch (this._popup?.type) {
      case 'history':
        return 'Enter load · d delete · Esc close';
      case 'saved':
        return 'Enter load · e rename · d delete · / filter · Esc close';
      case 'save-name':
      case 'export':
        return 'Enter confirm · Esc cancel';
      case 'completion':
        return 'Tab accept · Esc dismiss';
      default:
        return this.browsing ? 'y copy row · Y copy all · E export' : 'Ctrl+Enter run · Ctrl+R history · Ctrl+O saved';
    }
  }

  private savedVisible(popup: SavedPopup): Array<[number, SavedQuery]> {
    return filterSavedQueries(popup.entries, popup.filter ?? '');
  }

  private clampSaved(popup: SavedPopup): void {
    const count = this.savedVisible(popup).length;
    popup.selected = Math.max(0, Math.min(count - 1, popup.selected));
  }

  private selectableLine(text: string, selected: boolean, theme: ThemeConfig, width: number): string {
    const cell = escapeTags(padCell(text, width));
    return selected ? `{${theme.selection}-bg}${cell}{/${theme.selection}-bg}` : cell;
  }

  /** Body of an open list or prompt popup, drawn in place of the result table. */
  private popupLines(theme: ThemeConfig, width: number): string[] | null {
    const popup = this._popup;
    if (!popup) return null;
    const title = (text: string) => `{bold}${escapeTags(text)}{/bold}`;
    switch (popup.type) {
      case 'history': {
        if (popup.entries.length === 0) return [title('History'), `{${theme.muted}-fg}no statements yet{/${theme.muted}-fg}`];
        return [
          title(`History (${popup.entries.length})`),
          ...popup.entries.map((entry, i) => this.selectableLine(oneLine(entry.sql), i === popup.selected, theme, width)),
        ];
      }
      case 'save-name':
        return [title('Save query as'), withCursor(popup.name, popup.name.length)];
      case 'export':
        return [title('Export CSV to'), withCursor(popup.path, popup.path.length)];
      case 'saved': {
        const lines = [title('Saved queries')];
        if (popup.filter !== null) lines.push(`/${withCursor(popup.filter, popup.filter.length)}`);
        if (popup.rename !== null) lines.push(`Rename: ${withCursor(popup.rename, popup.rename.length)}`);
        const visible = this.savedVisible(popup);
        if (visible.length === 0) {
          lines.push(`{${theme.muted}-fg}${popup.entries.length === 0 ? 'no saved queries' : 'no match'}{/${theme.muted}-fg}`);
        }
        visible.forEach(([, entry], i) => {
          const text = `${padCell(entry.name, NAME_COLUMN)} ${oneLine(entry.sql)}`;
          lines.push(this.selectableLine(text, i === popup.selected, theme, width));
        });
        return lines;
      }
      case 'completion':
        return null;
    }
  }

  private statusLine(theme: ThemeConfig, width: number): string {
    switch (this._status) {
      case 'connecting':
        return `{${theme.muted}-fg}connecting…{/${theme.muted}-fg}`;
      case 'executing':
        return `{${theme.warning}-fg}executing…{/${theme.warning}-fg}`;
      case 'error':
        return `{${theme.error}-fg}${escapeTags(truncate(this._error ?? 'error', width))}{/${theme.error}-fg}`;
      case 'ready':
        if (this._error) return `{${theme.error}-fg}${escapeTags(truncate(this._error, width))}{/${theme.error}-fg}`;
        if (this._result) {
          const n = this._result.rows.length;
          const hint = n >= EXPORT_HINT_ROWS ? ' · E in results to export CSV' : '';
          return `{${theme.muted}-fg}${n} row${n === 1 ? '' : 's'}${hint}{/${theme.muted}-fg}`;
        }
        return `{${theme.muted}-fg}${escapeTags(truncate(this._serverVersion || 'connected', width))}{/${theme.muted}-fg}`;
    }
  }
}
