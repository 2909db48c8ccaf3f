/**
 * Statements run against one database, newest first. Kept per
 * namespace/pod/database in its own file.
 */

import { z } from 'zod';
import { readJsonList, writeJsonList } from './jsonStore';

export const MAX_HISTORY = 200;

const HistoryEntrySchema = z.object({
  sql: z.string(),
  /** ISO-8601 time the statement was run. */
  ts: z.string(),
});

export type QueryHistoryEntry = z.infer<typeof HistoryEntrySchema>;

export class QueryHistory {
  private _entries: QueryHistoryEntry[];

  private constructor(readonly file: string, entries: QueryHistoryEntry[]) {
    this._entries = entries;
  }

  static load(file: string): QueryHistory {
    return new QueryHistory(file, readJsonList(file, HistoryEntrySchema).slice(0, MAX_HISTORY));
  }

  get entries(): readonly QueryHistoryEntry[] {
    return this._entries;
  }

  /** Records `sql` at the front unless it repeats the latest entry. Throws if the file cannot be written. */
  append(sql: string, now: Date = new Date()): void {
    if (this._entries[0]?.sql === sql) return;
    this._entries = [{ sql, ts: now.toISOString() }, ...this._entries].slice(0, MAX_HISTORY);
    writeJsonList(this.file, this._entries);
  }

  delete(index: number): void {
    if (index < 0 || index >= this._entries.length) return;
    this._entries = this._entries.filter((_, i) => i !== index);
    writeJsonList(this.file, this._entries);
  }
}
