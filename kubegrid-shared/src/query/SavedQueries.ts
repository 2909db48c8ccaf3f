/**
 * Named statements shared by every query pane.
 */

import { z } from 'zod';
import { readJsonList, writeJsonList } from './jsonStore';

const SavedQuerySchema = z.object({
  name: z.string(),
  sql: z.string(),
  ts: z.string(),
});

export type SavedQuery = z.infer<typeof SavedQuerySchema>;

/** Entries whose name contains `filter`, case-insensitively, with their index in the full list. */
export function filterSavedQueries(entries: readonly SavedQuery[], filter: string): Array<[number, SavedQuery]> {
  const needle = filter.toLowerCase();
  const indexed = entries.map((entry, i): [number, SavedQuery] => [i, entry]);
  return needle ? indexed.filter(([, entry]) => entry.name.toLowerCase().includes(needle)) : indexed;
}

export class SavedQueries {
  private _entries: SavedQuery[];

  private constructor(readonly file: string, entries: SavedQuery[]) {
    this._entries = entries;
  }

  static load(file: string): SavedQueries {
    return new SavedQueries(file, readJsonList(file, SavedQuerySchema));
  }

  get entries(): readonly SavedQuery[] {
    return this._entries;
  }

  add(name: string, sql: string, now: Date = new Date()): void {
    this._entries = [...this._entries, { name, sql, ts: now.toISOString() }];
    this.save();
  }

  rename(index: number, name: string): void {
    const entry = this._entries[index];
    if (!entry) return;
    this._entries = this._entries.map((e, i) => (i === index ? { ...e, name } : e));
    this.save();
  }

  delete(index: number): void {
    if (index < 0 || index >= this._entries.length) return;
    this._entries = this._entries.filter((_, i) => i !== index);
    this.save();
  }

  private save(): void {
    writeJsonList(this.file, this._entries);
  }
}
