/**
 * Interactive shell inside a pod container, attached over the exec API with
 * a TTY. Output is posted to the pane as it arrives.
 */

import { PassThrough, Writable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import type { ExecSource, Subscription } from '../cluster/types';
import type { DeliveryTarget, TerminalSession } from './types';

const log = getLogger('exec');

/** Prefer bash when the image has it. */
export const DEFAULT_EXEC_COMMAND = ['/bin/sh', '-c', 'command -v bash >/dev/null 2>&1 && exec bash || exec sh'];

export interface ExecRequest {
  pod: string;
  namespace: string;
  container?: string;
  command?: string[];
}

export class ExecSession implements TerminalSession {
  private readonly stdin = new PassThrough();
  private subscription: Subscription | null = null;
  private _exited = false;
  private _container = '';

  constructor(
    private readonly source: ExecSource,
    readonly request: ExecRequest,
    private readonly target: DeliveryTarget,
  ) {}

  get exited(): boolean {
    return this._exited;
  }

  get container(): string {
    return this._container;
  }

  start(): void {
    this.attach().catch((err: unknown) => {
      log.warn({ pod: this.request.pod, err: errorMessage(err) }, 'exec failed');
      this.output(`\r\nexec failed: ${errorMessage(err)}\r\n`);
      this.exit(null);
    });
  }

  write(data: string): void {
    if (this._exited) return;
    this.stdin.write(data);
  }

  /** The exec API only reads the size from a TTY stdout, so the remote size stays at its default. */
  resize(_columns: number, _rows: number): void {}

  stop(): void {
    if (this._exited) return;
    this._exited = true;
    this.stdin.end();
    this.subscription?.stop();
    this.subscription = null;
  }

  private async attach(): Promise<void> {
    const { pod, namespace, command = DEFAULT_EXEC_COMMAND } = this.request;
    this._container = this.request.container ?? (await this.source.podContainers(pod, namespace))[0] ?? '';
    const stdout = this.sink();
    const stderr = this.sink();

    const subscription = await this.source.exec(
      pod, namespace, this._container, command,
      { stdout, stderr, stdin: this.stdin },
      true,
      (code, message) => {
        if (code !== 0 && message) this.output(`\r\n${message}\r\n`);
        this.exit(code);
      },
    );
    if (this._exited) subscription.stop();
    else this.subscription = subscription;
    log.info({ pod, namespace, container: this._container }, 'exec attached');
  }

  private sink(): Writable {
    const decoder = new StringDecoder('utf8');
    return new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        const text = decoder.write(chunk);
        if (text) this.output(text);
        callback();
      },
    });
  }

  private output(data: string): void {
    const { paneId, seq, send } = this.target;
    send({ type: 'session-output', paneId, seq, data });
  }

  private exit(code: number | null): void {
    const alreadyStopped = this._exited;
    this._exited = true;
    this.subscription = null;
    this.stdin.end();
    if (alreadyStopped) return;
    const { paneId, seq, send } = this.target;
    send({ type: 'session-exited', paneId, seq, code });
  }
}
