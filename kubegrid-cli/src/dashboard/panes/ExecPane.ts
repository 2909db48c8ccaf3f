/**
 * Terminal view for a local shell or a shell inside a pod.
 *
 * Session output is fed into a headless xterm that keeps the screen state
 * (cursor movement, erase, alternate screen); rendering reads its buffer.
 */

import headless from '@xterm/headless';
import type { Terminal as XTerm } from '@xterm/headless';
import { viewLabel } from 'kubegrid-shared';
import type { PaneDelivery, Rect, TerminalSession, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags, withCursor } from '../formatters';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame, SelectedResource } from './types';

const { Terminal } = headless;

const SCROLLBACK = 5000;

export interface ExecPaneOptions {
  columns: number;
  rows: number;
  /** Called once xterm has parsed a chunk, so the screen can be redrawn. */
  onParsed?: () => void;
}

export class ExecPane implements Pane {
  private readonly term: XTerm;
  private readonly onParsed: () => void;
  private _exitCode: number | null = null;
  private _exited = false;

  constructor(
    readonly viewType: ViewType,
    private readonly session: TerminalSession,
    options: ExecPaneOptions,
  ) {
    this.term = new Terminal({
      cols: Math.max(2, options.columns),
      rows: Math.max(1, options.rows),
      scrollback: SCROLLBACK,
      allowProposedApi: true,
    });
    this.onParsed = options.onParsed ?? (() => {});
  }

  get exited(): boolean {
    return this._exited;
  }

  get exitCode(): number | null {
    return this._exitCode;
  }

  handleDelivery(event: PaneDelivery): void {
    if (event.type === 'session-output') {
      this.term.write(event.data, this.onParsed);
    } else if (event.type === 'session-exited') {
      this._exited = true;
      this._exitCode = event.code;
      const status = event.code === null ? 'terminated' : `exited with code ${event.code}`;
      this.term.write(`\r\n[process ${status}]\r\n`, this.onParsed);
    }
  }

  selectedResource(): SelectedResource | null {
    if (this.viewType.type !== 'exec') return null;
    return { kind: 'pods', name: this.viewType.pod, namespace: this.viewType.namespace };
  }

  handleCommand(command: PaneCommand): void {
    switch (command.type) {
      case 'send-input':
        if (!this._exited) {
          this.term.scrollToBottom();
          this.session.write(command.data);
        }
        break;
      case 'scroll-up':
      case 'select-prev':
        this.term.scrollLines(-1);
        break;
      case 'scroll-down':
      case 'select-next':
        this.term.scrollLines(1);
        break;
      case 'page-up':
        this.term.scrollPages(-1);
        break;
      case 'page-down':
        this.term.scrollPages(1);
        break;
      case 'go-to-top':
        this.term.scrollToTop();
        break;
      case 'go-to-bottom':
        this.term.scrollToBottom();
        break;
      default:
        break;
    }
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    const { width, height } = contentSize(rect);
    if (width >= 2 && height >= 1 && (width !== this.term.cols || height !== this.term.rows)) {
      this.term.resize(width, height);
      this.session.resize(width, height);
    }

    const buffer = this.term.buffer.active;
    const atBottom = buffer.viewportY === buffer.baseY;
    const lines: string[] = [];
    for (let row = 0; row < this.term.rows; row++) {
      const text = buffer.getLine(buffer.viewportY + row)?.translateToString(true) ?? '';
      const cursorHere = focused && !this._exited && atBottom && row === buffer.cursorY;
      lines.push(cursorHere ? withCursor(text, buffer.cursorX) : escapeTags(text));
    }
    while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

    return {
      title: this._exited ? `${viewLabel(this.viewType)} [exited]` : viewLabel(this.viewType),
      lines,
      footer: atBottom ? undefined : `scrollback -${buffer.baseY - buffer.viewportY}`,
      borderColor: borderColor(focused, theme),
    };
  }

  onFocusChange(): void {
    this.term.scrollToBottom();
  }

  dispose(): void {
    this.session.stop();
    this.term.dispose();
  }
}
