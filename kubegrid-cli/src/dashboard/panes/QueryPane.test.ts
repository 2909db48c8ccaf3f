import { describe, it, expect } from 'vitest';
import { defaultConfig } from 'kubegrid-shared';
import type { PaneDelivery, QueryResult, SavedQuery } from 'kubegrid-shared';
import { QueryEditor } from './QueryEditor';
import { QueryPane } from './QueryPane';

const theme = defaultConfig().theme;
const rect = { x: 0, y: 0, width: 40, height: 12 };

function result(r: QueryResult): PaneDelivery {
  return { type: 'query-result', paneId: 5, seq: 1, result: r };
}

function type(pane: QueryPane, text: string): void {
  for (const char of text) pane.handleCommand({ type: 'query-input', char });
}

describe('QueryEditor', () => {
  it('splits and joins lines', () => {
    const editor = new QueryEditor();
    for (const c of 'selectx') editor.insert(c);
    editor.move('left');
    editor.newline();
    expect(editor.lineList).toEqual(['select', 'x']);
    editor.backspace();
    expect(editor.content).toBe('selectx');
    expect(editor.col).toBe(6);
  });

  it('indents and deindents the cursor line', () => {
    const editor = new QueryEditor();
    editor.insert('a');
    editor.indent();
    expect(editor.content).toBe('  a');
    expect(editor.col).toBe(3);
    editor.deindent();
    expect(editor.content).toBe('a');
    expect(editor.col).toBe(1);
  });

  it('replaces the word before the cursor', () => {
    const editor = new QueryEditor();
    editor.setContent('select * from us where');
    editor.move('end');
    for (let i = 0; i < 6; i++) editor.move('left');
    editor.replaceBeforeCursor(2, 'users');
    expect(editor.content).toBe('select * from users where');
    expect(editor.col).toBe(19);
  });

  it('clamps the column when moving between lines', () => {
    const editor = new QueryEditor();
    editor.setContent('select *\nfrom t');
    editor.move('end');
    expect([editor.row, editor.col]).toEqual([0, 8]);
    editor.move('down');
    expect([editor.row, editor.col]).toEqual([1, 6]);
    editor.move('up');
    expect([editor.row, editor.col]).toEqual([0, 6]);
    editor.move('end');
    editor.move('right');
    expect([editor.row, editor.col]).toEqual([1, 0]);
  });
});

describe('QueryPane', () => {
  it('records the server version from the connection check', () => {
    const pane = new QueryPane('pg-0', 'db');
    expect(pane.beginExecute()).toBeNull();
    pane.handleDelivery(result({ columns: ['version'], rows: [['PostgreSQL 16.2']] }));
    expect(pane.status).toBe('ready');
    expect(pane.serverVersion).toBe('PostgreSQL 16.2');
    expect(pane.result).toBeNull();
  });

  it('runs the editor content and browses the result', () => {
    const pane = new QueryPane('pg-0', 'db');
    pane.handleDelivery(result({ columns: ['version'], rows: [['PostgreSQL 16.2']] }));
    type(pane, ' select id, name from users ');
    expect(pane.beginExecute()).toBe('select id, name from users');
    expect(pane.status).toBe('executing');

    pane.handleDelivery(result({ columns: ['id', 'name'], rows: [['1', 'ada'], ['2', 'lin, jr']] }));
    pane.handleCommand({ type: 'query-browse-next' });
    pane.handleCommand({ type: 'query-browse-next' });
    expect(pane.selectedIndex).toBe(1);
    expect(pane.selectedRowCsv()).toBe('2,"lin, jr"');
    expect(pane.allRowsCsv()).toBe('id,name\n1,ada\n2,"lin, jr"\n');
  });

  it('keeps the previous result when a statement fails', () => {
    const pane = new QueryPane('pg-0', 'db');
    pane.handleDelivery(result({ columns: [], rows: [] }));
    type(pane, 'select 1');
    pane.beginExecute();
    pane.handleDelivery(result({ columns: ['?column?'], rows: [['1']] }));
    pane.beginExecute();
    pane.handleDelivery({ type: 'query-error', paneId: 5, seq: 2, message: 'syntax error' });
    expect(pane.status).toBe('ready');
    expect(pane.error).toBe('syntax error');
    expect(pane.rowCount).toBe(1);
  });

  it('reports a failed connection', () => {
    const pane = new QueryPane('pg-0', 'db');
    pane.handleDelivery({ type: 'query-error', paneId: 5, seq: 1, message: 'psql: not found' });
    expect(pane.status).toBe('error');
  });

  it('mentions export under a large result', () => {
    const pane = new QueryPane('pg-0', 'db');
    pane.handleDelivery(result({ columns: ['version'], rows: [['PostgreSQL 16.2']] }));
    type(pane, 'select n');
    pane.beginExecute();
    pane.handleDelivery(result({ columns: ['n'], rows: Array.from({ length: 100 }, (_, i) => [String(i)]) }));
    expect(pane.render(rect, true, theme).lines[2]).toBe('{gray-fg}100 rows · E in results to export CSV{/gray-fg}');
  });
});

describe('QueryPane popups', () => {
  function connected(): QueryPane {
    const pane = new QueryPane('pg-0', 'db');
    pane.handleDelivery(result({ columns: ['version'], rows: [['PostgreSQL 16.2']] }));
    return pane;
  }

  it('draws the history in place of the result', () => {
    const pane = connected();
    pane.showHistory([{ sql: 'select\n  1', ts: '' }, { sql: 'select 2', ts: '' }]);
    const frame = pane.render(rect, true, theme);
    expect(frame.lines.slice(3)).toEqual([
      '{bold}History (2){/bold}',
      `{blue-bg}${'select 1'.padEnd(38)}{/blue-bg}`,
      'select 2'.padEnd(38),
    ]);
    expect(frame.footer).toBe('Enter load · d delete · Esc close');
    pane.popupMove(1);
    pane.popupMove(1);
    expect(pane.historySelection()).toEqual([1, { sql: 'select 2', ts: '' }]);
  });

  it('edits the save name', () => {
    const pane = connected();
    pane.promptSaveName();
    for (const c of 'daily') pane.popupInput(c);
    pane.popupBackspace();
    expect(pane.popup).toEqual({ type: 'save-name', name: 'dail' });
  });

  it('selects through a saved-query filter by full-list index', () => {
    const entries: SavedQuery[] = [
      { name: 'Active users', sql: 'a', ts: '' },
      { name: 'Big orders', sql: 'b', ts: '' },
      { name: 'Users by day', sql: 'c', ts: '' },
    ];
    const pane = connected();
    pane.showSaved(entries);
    pane.startSavedFilter();
    pane.popupInput('u');
    pane.popupInput('s');
    pane.popupMove(1);
    expect(pane.savedSelection()?.[0]).toBe(2);
    expect(pane.closeSavedSubMode()).toBe(true);
    expect(pane.closeSavedSubMode()).toBe(false);
    expect(pane.savedSelection()?.[0]).toBe(2);
  });

  it('cycles completion candidates and inserts the chosen one', () => {
    const pane = connected();
    pane.handleDelivery({
      type: 'query-schema',
      paneId: 5,
      seq: 1,
      schema: { tables: ['orders', 'order_items'], columns: {} },
    });
    type(pane, 'select * from o');
    expect(pane.startCompletion()).toBe(true);
    pane.popupMove(-1);
    pane.acceptCompletion();
    expect(pane.editor.content).toBe('select * from order_items');
    expect(pane.popup).toBeNull();
  });
});
