import { describe, it, expect, afterEach, vi } from 'vitest';
import * as path from 'path';
import {
  getConfigDir,
  getConfigPath,
  getLogExportPath,
  getQueryExportPath,
  getQueryHistoryPath,
  getSavedQueriesPath,
} from './paths';

describe('getConfigDir', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('ends with kubegrid', () => {
    expect(getConfigDir()).toMatch(/kubegrid$/);
  });

  it.skipIf(process.platform === 'win32')('honours XDG_CONFIG_HOME', () => {
    vi.stubEnv('XDG_CONFIG_HOME', '/tmp/xdg');
    expect(getConfigDir()).toBe(path.join('/tmp/xdg', 'kubegrid'));
    expect(getConfigPath()).toBe(path.join('/tmp/xdg', 'kubegrid', 'config.json'));
  });
});

describe('getLogExportPath', () => {
  it('names the file after the pod and a colon-free timestamp', () => {
    const file = getLogExportPath('web-0', new Date('2024-05-01T10:22:03.456Z'));
    expect(path.basename(file)).toBe('web-0-2024-05-01T10-22-03.log');
  });
});

describe('getQueryExportPath', () => {
  it('uses a csv name beside the log exports', () => {
    const file = getQueryExportPath('pg-0', new Date('2024-05-01T10:22:03.456Z'));
    expect(path.basename(file)).toBe('pg-0-query-2024-05-01T10-22-03.csv');
  });
});

describe('query store paths', () => {
  it('keeps one history file per namespace, pod and database', () => {
    expect(getQueryHistoryPath('data', 'pg-0', 'shop', '/cfg')).toBe(path.join('/cfg', 'query_history', 'data__pg-0__shop.json'));
  });

  it('replaces characters that are unsafe in file names', () => {
    expect(path.basename(getQueryHistoryPath('data', 'pg/0', 'my db', '/cfg'))).toBe('data__pg_0__my_db.json');
  });

  it('stores saved queries beside the config', () => {
    expect(getSavedQueriesPath('/cfg')).toBe(path.join('/cfg', 'saved_queries.json'));
  });
});
