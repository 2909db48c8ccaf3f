/**
 * SQL completion for the query editor.
 *
 * The word before the cursor is completed from what the text around it
 * implies: table names after FROM/JOIN/UPDATE/INTO/TABLE, the columns of a
 * table after `table.` or `alias.`, the columns of the tables in the FROM
 * clause after SELECT/WHERE/ON and friends, and keywords otherwise.
 */

import type { QuerySchema } from '../events/types';
import keywords from './sqlKeywords.json';

export const MAX_COMPLETIONS = 8;

export const SQL_KEYWORDS: readonly string[] = keywords;

export type CompletionContext =
  | { type: 'keyword' }
  | { type: 'table' }
  | { type: 'table-column'; table: string }
  | { type: 'column'; tables: string[] };

export interface Completion {
  items: string[];
  /** The partial word the chosen item replaces. */
  prefix: string;
}

const TABLE_KEYWORDS = new Set(['FROM', 'JOIN', 'UPDATE', 'INTO', 'TABLE']);
const COLUMN_KEYWORDS = new Set(['SELECT', 'WHERE', 'HAVING', 'SET', 'ON', 'AND', 'OR', 'BY']);
const CONTEXT_KEYWORDS = new Set([...TABLE_KEYWORDS, ...COLUMN_KEYWORDS, 'INSERT']);

// Words that can follow FROM/JOIN without being a table name or an alias.
const CLAUSE_WORDS = new Set([
  'SELECT', 'FROM', 'WHERE', 'JOIN', 'ON', 'AND', 'OR', 'HAVING', 'GROUP', 'ORDER', 'LIMIT', 'OFFSET',
  'LEFT', 'RIGHT', 'INNER', 'OUTER', 'CROSS', 'FULL', 'NATURAL', 'SET', 'INTO', 'VALUES', 'UPDATE',
  'INSERT', 'DELETE', 'CREATE', 'WITH', 'UNION', 'INTERSECT', 'EXCEPT', 'AS', 'LATERAL', 'USING',
]);

/** Identifiers and keywords; dotted names such as `public.users` stay one token. */
function sqlTokens(text: string): string[] {
  return text.match(/[A-Za-z0-9_]+(?:\.[A-Za-z0-9_]+)*/g) ?? [];
}

function lastSegment(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1);
}

/** Letters and underscores immediately before `col`. */
export function tokenBeforeCursor(line: string, col: number): string {
  const end = Math.min(col, line.length);
  let start = end;
  while (start > 0 && /[A-Za-z_]/.test(line[start - 1])) start--;
  return line.slice(start, end);
}

/** Tables named after FROM or JOIN, without schema qualifiers, first mention first. */
export function fromTables(query: string): string[] {
  const tokens = sqlTokens(query);
  const tables: string[] = [];
  for (let i = 0; i + 1 < tokens.length; i++) {
    if (tokens[i].toUpperCase() !== 'FROM' && tokens[i].toUpperCase() !== 'JOIN') continue;
    const candidate = tokens[i + 1];
    if (CLAUSE_WORDS.has(candidate.toUpperCase())) continue;
    const table = lastSegment(candidate);
    if (!tables.some((t) => t.toLowerCase() === table.toLowerCase())) tables.push(table);
    i++;
  }
  return tables;
}

/** Lower-cased alias → table, from `FROM users u` and `JOIN orders AS o`. */
export function aliasMap(query: string): Map<string, string> {
  const tokens = sqlTokens(query);
  const aliases = new Map<string, string>();
  for (let i = 0; i + 1 < tokens.length; i++) {
    if (tokens[i].toUpperCase() !== 'FROM' && tokens[i].toUpperCase() !== 'JOIN') continue;
    const table = tokens[i + 1];
    if (CLAUSE_WORDS.has(table.toUpperCase())) continue;
    const aliasAt = tokens[i + 2]?.toUpperCase() === 'AS' ? i + 3 : i + 2;
    const alias = tokens[aliasAt];
    if (!alias || CLAUSE_WORDS.has(alias.toUpperCase()) || alias.includes('.')) continue;
    aliases.set(alias.toLowerCase(), lastSegment(table));
  }
  return aliases;
}

function lastContextKeyword(text: string): string | null {
  let last: string | null = null;
  for (const token of sqlTokens(text)) {
    const upper = token.toUpperCase();
    if (CONTEXT_KEYWORDS.has(upper)) last = upper;
  }
  return last;
}

/** What kind of word belongs at the cursor of a multi-line query. */
export function completionContext(lines: readonly string[], row: number, col: number): CompletionContext {
  const current = lines[row] ?? '';
  const before = [...lines.slice(0, row), current.slice(0, col)].join('\n');
  const prefix = tokenBeforeCursor(current, col);
  const head = before.slice(0, before.length - prefix.length);

  const trimmed = head.trimEnd();
  if (trimmed.endsWith('.')) {
    const qualifier = /([A-Za-z_][A-Za-z0-9_]*)$/.exec(trimmed.slice(0, -1));
    if (qualifier) {
      const name = qualifier[1];
      const table = aliasMap(lines.join('\n')).get(name.toLowerCase()) ?? name;
      return { type: 'table-column', table };
    }
  }

  const keyword = lastContextKeyword(head);
  if (keyword && TABLE_KEYWORDS.has(keyword)) return { type: 'table' };
  if (keyword && COLUMN_KEYWORDS.has(keyword)) return { type: 'column', tables: fromTables(lines.join('\n')) };
  return { type: 'keyword' };
}

function columnsOf(schema: QuerySchema, table: string): string[] {
  const wanted = table.toLowerCase();
  const key = Object.keys(schema.columns).find((name) => name.toLowerCase() === wanted);
  return key ? schema.columns[key] ?? [] : [];
}

function startsWithIgnoringCase(word: string, prefix: string): boolean {
  return word.toLowerCase().startsWith(prefix.toLowerCase());
}

function matchingKeywords(prefix: string): string[] {
  const upper = prefix.toUpperCase();
  return SQL_KEYWORDS.filter((keyword) => keyword.startsWith(upper));
}

export function completionItems(context: CompletionContext, prefix: string, schema: QuerySchema): string[] {
  switch (context.type) {
    case 'keyword':
      return prefix ? matchingKeywords(prefix).slice(0, MAX_COMPLETIONS) : [];
    case 'table':
      return schema.tables.filter((table) => startsWithIgnoringCase(table, prefix)).slice(0, MAX_COMPLETIONS);
    case 'table-column':
      return columnsOf(schema, context.table)
        .filter((column) => startsWithIgnoringCase(column, prefix))
        .slice(0, MAX_COMPLETIONS);
    case 'column': {
      const items: string[] = [];
      const columns = context.tables.flatMap((table) => columnsOf(schema, table));
      const extra = prefix ? matchingKeywords(prefix) : [];
      for (const word of [...columns.filter((c) => startsWithIgnoringCase(c, prefix)), ...extra]) {
        if (!items.includes(word)) items.push(word);
        if (items.length === MAX_COMPLETIONS) break;
      }
      return items;
    }
  }
}

/** Candidates for the word at the cursor, or null when there are none. */
export function complete(lines: readonly string[], row: number, col: number, schema: QuerySchema): Completion | null {
  const prefix = tokenBeforeCursor(lines[row] ?? '', col);
  const items = completionItems(completionContext(lines, row, col), prefix, schema);
  return items.length > 0 ? { items, prefix } : null;
}
