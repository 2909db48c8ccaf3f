/**
 * Local shell on a pseudo-terminal, for the plain terminal view.
 */

import { spawn } from 'node-pty';
import type { IPty } from 'node-pty';
import { getLogger } from '../logging/logger';
import type { DeliveryTarget, TerminalSession } from './types';

const log = getLogger('shell');

export interface LocalShellOptions {
  /** Falls back to $SHELL, then the platform default. */
  shell?: string;
  cwd?: string;
  columns: number;
  rows: number;
  env?: Record<string, string | undefined>;
}

export function defaultShell(configured?: string): string {
  if (configured) return configured;
  if (process.env.SHELL) return process.env.SHELL;
  return process.platform === 'win32' ? 'powershell.exe' : '/bin/sh';
}

export class LocalShell implements TerminalSession {
  private pty: IPty | null = null;
  private _exited = false;

  constructor(
    private readonly target: DeliveryTarget,
    private readonly options: LocalShellOptions,
  ) {}

  get exited(): boolean {
    return this._exited;
  }

  start(): void {
    const shell = defaultShell(this.options.shell);
    const { paneId, seq, send } = this.target;
    try {
      this.pty = spawn(shell, [], {
        name: 'xterm-256color',
        cols: Math.max(1, this.options.columns),
        rows: Math.max(1, this.options.rows),
        cwd: this.options.cwd ?? process.cwd(),
        env: { ...process.env, ...this.options.env },
      });
    } catch (err) {
      log.error({ err, shell }, 'failed to spawn shell');
      send({ type: 'session-output', paneId, seq, data: `failed to start ${shell}\r\n` });
      this._exited = true;
      send({ type: 'session-exited', paneId, seq, code: null });
      return;
    }

    log.info({ shell, pid: this.pty.pid }, 'shell started');
    this.pty.onData((data) => send({ type: 'session-output', paneId, seq, data }));
    this.pty.onExit(({ exitCode }) => {
      this._exited = true;
      this.pty = null;
      send({ type: 'session-exited', paneId, seq, code: exitCode });
    });
  }

  write(data: string): void {
    this.pty?.write(data);
  }

  resize(columns: number, rows: number): void {
    if (!this.pty || columns < 1 || rows < 1) return;
    this.pty.resize(columns, rows);
  }

  stop(): void {
    if (!this.pty) return;
    this._exited = true;
    this.pty.kill();
    this.pty = null;
  }
}
