/**
 * Follows a pod's log and posts the lines to a pane in batches.
 *
 * A dropped stream reconnects with exponential backoff, asking only for the
 * lines written since the last one seen.
 */

import { PassThrough } from 'stream';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import type { LogSource, Subscription } from '../cluster/types';
import type { DeliveryTarget } from './types';

const log = getLogger('logs');

export type LogStreamStatus = 'connecting' | 'streaming' | 'reconnecting' | 'stopped' | 'error';

export interface LogRequest {
  pod: string;
  namespace: string;
  /** First container of the pod when omitted. */
  container?: string;
  follow?: boolean;
  tailLines?: number;
  timestamps?: boolean;
}

export interface LogStreamOptions {
  /** Line batching window; 0 posts every chunk immediately. */
  batchMs?: number;
  maxFailures?: number;
  backoffMs?: (attempt: number) => number;
  now?: () => number;
}

export interface ParsedLogLine {
  timestamp: string | null;
  content: string;
}

const TIMESTAMP_PREFIX = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})) (.*)$/s;

/** Splits the RFC 3339 prefix the API adds when timestamps are requested. */
export function parseLogLine(raw: string): ParsedLogLine {
  const match = TIMESTAMP_PREFIX.exec(raw);
  if (!match) return { timestamp: null, content: raw };
  return { timestamp: match[1], content: match[2] };
}

/** 1s, 2s, 4s ... capped at 30s. */
export function logBackoffMs(attempt: number): number {
  return Math.min(2 ** Math.min(attempt, 5), 30) * 1000;
}

/** Seconds to ask for on reconnect so nothing between the last line and now is lost. */
export function reconnectSinceSeconds(lastLineAt: number | null, now: number): number | undefined {
  if (lastLineAt === null) return undefined;
  return Math.floor(Math.max(0, now - lastLineAt) / 1000) + 1;
}

export class LogStream {
  private readonly opts: Required<LogStreamOptions>;
  private subscription: Subscription | null = null;
  private pending: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;
  private lastLineAt: number | null = null;
  private failures = 0;
  private _status: LogStreamStatus = 'connecting';
  private _container = '';

  constructor(
    private readonly source: LogSource,
    readonly request: LogRequest,
    private readonly target: DeliveryTarget,
    options: LogStreamOptions = {},
  ) {
    this.opts = { batchMs: 50, maxFailures: 5, backoffMs: logBackoffMs, now: Date.now, ...options };
  }

  get status(): LogStreamStatus {
    return this._status;
  }

  get container(): string {
    return this._container;
  }

  get active(): boolean {
    return this._status !== 'stopped' && this._status !== 'error';
  }

  start(): void {
    this.run().catch((err: unknown) => {
      log.error({ err, pod: this.request.pod }, 'log stream crashed');
      this.fail(errorMessage(err));
    });
  }

  stop(): void {
    if (!this.active) return;
    this._status = 'stopped';
    this.subscription?.stop();
    this.subscription = null;
    this.flush();
    this.wake?.();
  }

  private async run(): Promise<void> {
    const { pod, namespace } = this.request;
    this._container = this.request.container ?? (await this.source.podContainers(pod, namespace))[0] ?? '';
    let lastError = '';

    while (this.active) {
      try {
        await this.streamOnce();
        if (!this.active) return;
        if (this.request.follow === false) {
          this._status = 'stopped';
          return;
        }
        log.debug({ pod }, 'log stream ended, reconnecting');
      } catch (err) {
        if (!this.active) return;
        this.failures++;
        lastError = errorMessage(err);
        log.warn({ pod, namespace, failures: this.failures, err: lastError }, 'log stream failed');
      }

      if (this.failures >= this.opts.maxFailures) {
        this.fail(`Log stream failed: ${lastError}`);
        return;
      }
      this._status = 'reconnecting';
      await this.sleep(this.opts.backoffMs(this.failures));
    }
  }

  private streamOnce(): Promise<void> {
    const { pod, namespace, follow = true, tailLines, timestamps = false } = this.request;
    const sink = new PassThrough();
    sink.setEncoding('utf8');
    let partial = '';

    sink.on('data', (chunk: string) => {
      const parts = (partial + chunk).split('\n');
      partial = parts.pop() ?? '';
      this.push(parts);
    });

    return new Promise<void>((resolve, reject) => {
      sink.on('end', () => {
        if (partial) this.push([partial]);
        partial = '';
        this.flush();
        this.subscription = null;
        resolve();
      });
      sink.on('error', reject);

      this.source
        .streamLogs(pod, namespace, this._container, {
          follow,
          tailLines: this.failures === 0 ? tailLines : undefined,
          sinceSeconds: reconnectSinceSeconds(this.lastLineAt, this.opts.now()),
          timestamps,
        }, sink)
        .then((subscription) => {
          if (!this.active) {
            subscription.stop();
            return;
          }
          this.subscription = subscription;
          this.failures = 0;
          this._status = 'streaming';
        }, reject);
    });
  }

  private push(lines: string[]): void {
    if (lines.length === 0 || !this.active) return;
    for (const line of lines) this.pending.push(line.endsWith('\r') ? line.slice(0, -1) : line);
    this.lastLineAt = this.opts.now();
    if (this.opts.batchMs <= 0) {
      this.flush();
    } else if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => this.flush(), this.opts.batchMs);
    }
  }

  private flush(): void {
    if (this.flushTimer) clearTimeout(this.flushTimer);
    this.flushTimer = null;
    if (this.pending.length === 0) return;
    const lines = this.pending;
    this.pending = [];
    const { paneId, seq, send } = this.target;
    send({ type: 'log-lines', paneId, seq, lines });
  }

  private fail(message: string): void {
    this._status = 'error';
    this.subscription?.stop();
    this.subscription = null;
    const { paneId, seq, send } = this.target;
    send({ type: 'log-error', paneId, seq, message });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
