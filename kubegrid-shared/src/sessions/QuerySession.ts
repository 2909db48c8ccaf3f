/**
 * SQL console against a PostgreSQL pod: each statement runs `psql` through
 * the exec API and the unaligned output is parsed into a table.
 */

import { Writable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import type { ExecSource, Subscription } from '../cluster/types';
import type { QueryResult, QuerySchema } from '../events/types';
import type { DeliveryTarget } from './types';

const log = getLogger('query');

export const FIELD_SEPARATOR = '\x1f';

export interface QueryConfig {
  pod: string;
  namespace: string;
  database: string;
  user: string;
  password: string;
  port: string;
}

/** Connection settings from the literal env of the pod's first container. */
export function queryConfigFromEnv(pod: string, namespace: string, env: Record<string, string>): QueryConfig {
  return {
    pod,
    namespace,
    database: env.POSTGRES_DB ?? '',
    user: env.POSTGRES_USER ?? '',
    password: env.POSTGRES_PASSWORD ?? '',
    port: env.PGPORT ?? '5432',
  };
}

export function buildPsqlCommand(config: QueryConfig, sql: string): string[] {
  const command: string[] = [];
  if (config.password) command.push('env', `PGPASSWORD=${config.password}`);
  command.push('psql', '-h', 'localhost', '-p', config.port);
  if (config.user) command.push('-U', config.user);
  if (config.database) command.push('-d', config.database);
  command.push('-X', '-A', '-F', FIELD_SEPARATOR, '-P', 'footer=off', '-v', 'ON_ERROR_STOP=1', '-c', sql);
  return command;
}

const COMMAND_TAG = /^(INSERT|UPDATE|DELETE|MERGE|SELECT|CREATE|DROP|ALTER|TRUNCATE|GRANT|REVOKE|COMMENT|BEGIN|COMMIT|ROLLBACK|SET|RESET|VACUUM|ANALYZE|COPY|DO|CALL|LISTEN|NOTIFY)\b[\w ]*$/;

/** Parses `psql -A -F <US>` output: a header line, then one line per row. */
export function parsePsqlOutput(output: string): QueryResult {
  const lines = output.split('\n');
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  if (lines.length === 0) return { columns: [], rows: [], notice: 'OK' };
  if (lines.length === 1 && !lines[0].includes(FIELD_SEPARATOR) && COMMAND_TAG.test(lines[0])) {
    return { columns: [], rows: [], notice: lines[0] };
  }

  const columns = lines[0].split(FIELD_SEPARATOR);
  const rows = lines.slice(1).map((line) => {
    const cells = line.split(FIELD_SEPARATOR);
    while (cells.length < columns.length) cells.push('');
    return cells;
  });
  return { columns, rows };
}

export const SCHEMA_SQL =
  'SELECT table_name, column_name FROM information_schema.columns ' +
  "WHERE table_schema NOT IN ('pg_catalog', 'information_schema') " +
  'ORDER BY table_name, ordinal_position';

/** Folds `(table_name, column_name)` rows into a schema; tables keep first-seen order. */
export function schemaFromResult(result: QueryResult): QuerySchema {
  const schema: QuerySchema = { tables: [], columns: {} };
  for (const [table, column] of result.rows) {
    if (!table) continue;
    let columns = schema.columns[table];
    if (!columns) {
      columns = [];
      schema.columns[table] = columns;
      schema.tables.push(table);
    }
    if (column && !columns.includes(column)) columns.push(column);
  }
  return schema;
}

export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function rowToCsv(row: string[]): string {
  return row.map(csvEscape).join(',');
}

/** Header line plus every row, newline-terminated. */
export function resultToCsv(result: QueryResult): string {
  return [result.columns, ...result.rows].map((row) => `${rowToCsv(row)}\n`).join('');
}

/** Display width of each column: the longer of the header and its widest cell. */
export function columnWidths(result: QueryResult): number[] {
  return result.columns.map((header, i) =>
    result.rows.reduce((max, row) => Math.max(max, (row[i] ?? '').length), header.length),
  );
}

interface Outcome {
  result: (result: QueryResult) => void;
  error: (message: string) => void;
}

export class QuerySession {
  private running: Subscription | null = null;
  private container: string | null = null;
  private runs = 0;

  constructor(
    private readonly source: ExecSource,
    readonly config: QueryConfig,
  ) {}

  get busy(): boolean {
    return this.running !== null;
  }

  /**
   * Checks connectivity; the server version comes back as a one-cell result.
   * The table and column names for completion are fetched right after.
   */
  connect(target: DeliveryTarget): void {
    const { paneId, seq, send } = target;
    this.start('select version()', target, {
      result: (result) => {
        send({ type: 'query-result', paneId, seq, result });
        this.loadSchema(target);
      },
      error: (message) => send({ type: 'query-error', paneId, seq, message }),
    });
  }

  run(sql: string, target: DeliveryTarget): void {
    const { paneId, seq, send } = target;
    this.start(sql, target, {
      result: (result) => send({ type: 'query-result', paneId, seq, result }),
      error: (message) => send({ type: 'query-error', paneId, seq, message }),
    });
  }

  loadSchema(target: DeliveryTarget): void {
    const { paneId, seq, send } = target;
    this.start(SCHEMA_SQL, target, {
      result: (result) => send({ type: 'query-schema', paneId, seq, schema: schemaFromResult(result) }),
      error: (message) => log.warn({ pod: this.config.pod, namespace: this.config.namespace }, `schema not loaded: ${message}`),
    });
  }

  cancel(): void {
    this.runs++;
    this.running?.stop();
    this.running = null;
  }

  private start(sql: string, target: DeliveryTarget, outcome: Outcome): void {
    this.cancel();
    this.execute(sql, target, outcome).catch((err: unknown) => {
      this.running = null;
      outcome.error(errorMessage(err));
    });
  }

  private async execute(sql: string, target: DeliveryTarget, outcome: Outcome): Promise<void> {
    const run = ++this.runs;
    const { pod, namespace } = this.config;
    const container = this.container ?? (await this.source.podContainers(pod, namespace))[0] ?? '';
    this.container = container;

    let stdout = '';
    let stderr = '';
    const collect = (append: (text: string) => void) => {
      const decoder = new StringDecoder('utf8');
      return new Writable({
        write: (chunk: Buffer, _encoding, callback) => {
          append(decoder.write(chunk));
          callback();
        },
      });
    };

    const { paneId } = target;
    let finished = false;
    log.debug({ pod, namespace, sql }, 'running query');
    const subscription = await this.source.exec(
      pod, namespace, container, buildPsqlCommand(this.config, sql),
      {
        stdout: collect((text) => { stdout += text; }),
        stderr: collect((text) => { stderr += text; }),
        stdin: null,
      },
      false,
      (code, message) => {
        finished = true;
        if (run !== this.runs) return;
        this.running = null;
        if (code === 0) {
          outcome.result(parsePsqlOutput(stdout));
          return;
        }
        const reason = stderr.trim() || message || `psql exited with code ${code ?? 'unknown'}`;
        log.info({ pod, paneId, code }, `query failed: ${reason}`);
        outcome.error(reason);
      },
    );
    if (finished) return;
    if (run !== this.runs) {
      subscription.stop();
      return;
    }
    this.running = subscription;
  }
}
