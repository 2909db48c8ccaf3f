import { describe, it, expect, vi } from 'vitest';
import type { Writable } from 'stream';
import {
  FIELD_SEPARATOR,
  QuerySession,
  SCHEMA_SQL,
  buildPsqlCommand,
  columnWidths,
  csvEscape,
  parsePsqlOutput,
  queryConfigFromEnv,
  resultToCsv,
  rowToCsv,
  schemaFromResult,
} from './QuerySession';
import type { ExecIo, ExecSource } from '../cluster/types';
import type { AppEvent } from '../events/types';

const US = FIELD_SEPARATOR;

describe('queryConfigFromEnv', () => {
  it('reads the postgres variables and defaults the port', () => {
    expect(queryConfigFromEnv('db-0', 'data', { POSTGRES_DB: 'shop', POSTGRES_USER: 'app', POSTGRES_PASSWORD: 'test-secret' })).toEqual({
      pod: 'db-0',
      namespace: 'data',
      database: 'shop',
      user: 'app',
      password: 'test-secret',
      port: '5432',
    });
    expect(queryConfigFromEnv('db-0', 'data', { PGPORT: '6543' }).port).toBe('6543');
  });
});

describe('buildPsqlCommand', () => {
  it('passes the password through the environment and selects unaligned output', () => {
    const config = queryConfigFromEnv('db-0', 'data', { POSTGRES_DB: 'shop', POSTGRES_USER: 'app', POSTGRES_PASSWORD: 'test-secret' });
    expect(buildPsqlCommand(config, 'select 1')).toEqual([
      'env', 'PGPASSWORD=test-secret',
      'psql', '-h', 'localhost', '-p', '5432', '-U', 'app', '-d', 'shop',
      '-X', '-A', '-F', US, '-P', 'footer=off', '-v', 'ON_ERROR_STOP=1', '-c', 'select 1',
    ]);
  });

  it('omits unset credentials', () => {
    const config = queryConfigFromEnv('db-0', 'data', {});
    expect(buildPsqlCommand(config, 'select 1').slice(0, 5)).toEqual(['psql', '-h', 'localhost', '-p', '5432']);
  });
});

describe('parsePsqlOutput', () => {
  it('splits the header and rows on the field separator', () => {
    const output = `id${US}name\n1${US}alice\n2${US}\n`;
    expect(parsePsqlOutput(output)).toEqual({
      columns: ['id', 'name'],
      rows: [['1', 'alice'], ['2', '']],
    });
  });

  it('keeps single-column results as tables', () => {
    expect(parsePsqlOutput('version\nPostgreSQL 16.2\n')).toEqual({ columns: ['version'], rows: [['PostgreSQL 16.2']] });
  });

  it('reports command tags as notices', () => {
    expect(parsePsqlOutput('UPDATE 3\n')).toEqual({ columns: [], rows: [], notice: 'UPDATE 3' });
    expect(parsePsqlOutput('')).toEqual({ columns: [], rows: [], notice: 'OK' });
  });
});

describe('csv helpers', () => {
  it('quotes values containing commas, quotes or newlines', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape('two\nlines')).toBe('"two\nlines"');
  });

  it('renders a row and a whole result', () => {
    expect(rowToCsv(['1', 'a,b'])).toBe('1,"a,b"');
    expect(resultToCsv({ columns: ['id', 'name'], rows: [['1', 'alice']] })).toBe('id,name\n1,alice\n');
  });

  it('sizes columns to the widest of header and cells', () => {
    expect(columnWidths({ columns: ['id', 'name'], rows: [['100', 'al'], ['2']] })).toEqual([3, 4]);
  });
});

describe('schemaFromResult', () => {
  it('groups columns under their table in first-seen order', () => {
    const result = {
      columns: ['table_name', 'column_name'],
      rows: [['users', 'id'], ['users', 'name'], ['orders', 'id'], ['users', 'id'], ['', 'stray']],
    };
    expect(schemaFromResult(result)).toEqual({
      tables: ['users', 'orders'],
      columns: { users: ['id', 'name'], orders: ['id'] },
    });
  });
});

describe('QuerySession', () => {
  function fakeExec(stdout: string, code: number, stderr = ''): ExecSource & { commands: string[][] } {
    const commands: string[][] = [];
    return {
      commands,
      podContainers: async () => ['postgres', 'metrics'],
      exec: async (_pod, _ns, container, command, io: ExecIo, tty, onExit) => {
        expect(container).toBe('postgres');
        expect(tty).toBe(false);
        commands.push(command);
        const out: Writable = io.stdout;
        out.write(stdout);
        io.stderr.write(stderr);
        setTimeout(() => onExit(code), 0);
        return { stop: () => {} };
      },
    };
  }

  const config = queryConfigFromEnv('db-0', 'data', { POSTGRES_USER: 'app' });

  it('posts parsed rows for a successful statement', async () => {
    const source = fakeExec(`n\n1\n`, 0);
    const events: AppEvent[] = [];
    const session = new QuerySession(source, config);
    session.run('select 1 as n', { paneId: 4, seq: 3, send: (e) => { events.push(e); } });

    await vi.waitFor(() => expect(events).toHaveLength(1));
    expect(events[0]).toEqual({ type: 'query-result', paneId: 4, seq: 3, result: { columns: ['n'], rows: [['1']] } });
    expect(source.commands[0][source.commands[0].length - 1]).toBe('select 1 as n');
    expect(session.busy).toBe(false);
  });

  it('posts stderr as the error of a failed statement', async () => {
    const source = fakeExec('', 1, 'ERROR:  relation "nope" does not exist\n');
    const events: AppEvent[] = [];
    const session = new QuerySession(source, config);
    session.run('select * from nope', { paneId: 4, seq: 1, send: (e) => { events.push(e); } });

    await vi.waitFor(() => expect(events).toHaveLength(1));
    expect(events[0]).toEqual({ type: 'query-error', paneId: 4, seq: 1, message: 'ERROR:  relation "nope" does not exist' });
  });

  it('loads the schema after a successful connect', async () => {
    const outputs = [
      `version\nPostgreSQL 16.2\n`,
      `table_name${US}column_name\nusers${US}id\nusers${US}name\norders${US}id\n`,
    ];
    const commands: string[][] = [];
    const source: ExecSource = {
      podContainers: async () => ['postgres'],
      exec: async (_pod, _ns, _container, command, io: ExecIo, _tty, onExit) => {
        io.stdout.write(outputs[commands.length] ?? '');
        commands.push(command);
        setTimeout(() => onExit(0), 0);
        return { stop: () => {} };
      },
    };
    const events: AppEvent[] = [];
    new QuerySession(source, config).connect({ paneId: 2, seq: 1, send: (e) => { events.push(e); } });

    await vi.waitFor(() => expect(events).toHaveLength(2));
    expect(events[0]).toEqual({
      type: 'query-result', paneId: 2, seq: 1, result: { columns: ['version'], rows: [['PostgreSQL 16.2']] },
    });
    expect(events[1]).toEqual({
      type: 'query-schema', paneId: 2, seq: 1,
      schema: { tables: ['users', 'orders'], columns: { users: ['id', 'name'], orders: ['id'] } },
    });
    expect(commands[1][commands[1].length - 1]).toBe(SCHEMA_SQL);
  });

  it('does not load the schema when the connection fails', async () => {
    const source = fakeExec('', 2, 'psql: error: connection refused\n');
    const events: AppEvent[] = [];
    new QuerySession(source, config).connect({ paneId: 2, seq: 1, send: (e) => { events.push(e); } });

    await vi.waitFor(() => expect(events).toHaveLength(1));
    expect(events[0]).toEqual({ type: 'query-error', paneId: 2, seq: 1, message: 'psql: error: connection refused' });
    expect(source.commands).toHaveLength(1);
  });
});
