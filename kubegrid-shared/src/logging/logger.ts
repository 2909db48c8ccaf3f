/**
 * Application logger.
 *
 * The dashboard owns the terminal, so nothing is logged to stdout. Records go
 * to a file under the config directory and into an in-memory ring that the
 * App Logs pane renders.
 */

import pino from 'pino';
import type { DestinationStream, Logger, StreamEntry } from 'pino';
import { getLogPath } from '../paths';

export type { Logger } from 'pino';

export type LogLevelLabel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  time: number;
  level: LogLevelLabel;
  component?: string;
  msg: string;
}

const LEVEL_LABELS: Record<number, LogLevelLabel> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
};

const DEFAULT_RING_CAPACITY = 500;

/** Pino destination keeping the last N records in memory. */
export class LogRing implements DestinationStream {
  private buffer: LogEntry[] = [];
  private _version = 0;

  constructor(private readonly capacity: number = DEFAULT_RING_CAPACITY) {}

  /** Increments on every append and clear. */
  get version(): number {
    return this._version;
  }

  write(chunk: string): void {
    for (const line of chunk.split('\n')) {
      if (!line.trim()) continue;
      const entry = parseRecord(line);
      if (entry) this.push(entry);
    }
  }

  push(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.capacity) {
      this.buffer.splice(0, this.buffer.length - this.capacity);
    }
    this._version++;
  }

  entries(): readonly LogEntry[] {
    return this.buffer;
  }

  clear(): void {
    this.buffer = [];
    this._version++;
  }
}

function parseRecord(line: string): LogEntry | null {
  let record: unknown;
  try {
    record = JSON.parse(line);
  } catch {
    return { time: Date.now(), level: 'info', msg: line };
  }
  if (typeof record !== 'object' || record === null) return null;

  const time = 'time' in record && typeof record.time === 'number' ? record.time : Date.now();
  const levelNum = 'level' in record && typeof record.level === 'number' ? record.level : 30;
  const component = 'component' in record && typeof record.component === 'string' ? record.component : undefined;
  let msg = 'msg' in record && typeof record.msg === 'string' ? record.msg : '';
  if ('err' in record && typeof record.err === 'object' && record.err !== null
    && 'message' in record.err && typeof record.err.message === 'string') {
    msg = msg ? `${msg}: ${record.err.message}` : record.err.message;
  }
  return { time, level: LEVEL_LABELS[levelNum] ?? 'info', component, msg };
}

export interface CreateLoggerOptions {
  level?: string;
  /** Log file; omit for a ring-only logger. */
  file?: string;
  ring?: LogRing;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const streams: StreamEntry[] = [];
  if (options.file) {
    streams.push({ level: 'trace', stream: pino.destination({ dest: options.file, mkdir: true, sync: true }) });
  }
  if (options.ring) {
    streams.push({ level: 'trace', stream: options.ring });
  }

  return pino(
    {
      level: options.level ?? 'info',
      base: { app: 'kubegrid' },
      timestamp: pino.stdTimeFunctions.epochTime,
    },
    pino.multistream(streams),
  );
}

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

/** Records shown by the App Logs pane. */
export const appLogRing = new LogRing();

export const logger: Logger = createLogger({
  level: process.env.KUBEGRID_LOG_LEVEL || (isTest ? 'silent' : 'info'),
  file: isTest ? undefined : getLogPath(),
  ring: appLogRing,
});

export function getLogger(component: string): Logger {
  return logger.child({ component });
}
