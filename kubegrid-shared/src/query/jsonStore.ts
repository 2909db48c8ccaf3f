/**
 * Small JSON array files under the config directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';

const log = getLogger('store');

/** Reads an array of `item`. A missing file is empty; an unreadable or invalid one is logged and treated as empty. */
export function readJsonList<T extends z.ZodTypeAny>(file: string, item: T): Array<z.infer<T>> {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    log.warn({ file, err: errorMessage(err) }, 'could not read store');
    return [];
  }
  try {
    return z.array(item).parse(JSON.parse(raw));
  } catch (err) {
    log.warn({ file, err: errorMessage(err) }, 'ignoring invalid store');
    return [];
  }
}

export function writeJsonList(file: string, entries: readonly unknown[]): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(entries, null, 2) + '\n');
}
