/**
 * Follows a pod's log. Scrolling up pauses follow; returning to the bottom
 * resumes it. The filter hides non-matching lines and highlights matches.
 */

import { viewLabel } from 'kubegrid-shared';
import type { LogStream, PaneDelivery, Rect, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags, hardWrap } from '../formatters';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame, SelectedResource } from './types';

export const MAX_LOG_LINES = 10_000;

export interface LogsPaneOptions {
  container?: string;
  maxLines?: number;
}

export class LogsPane implements Pane {
  readonly viewType: ViewType;
  private lines: string[] = [];
  private readonly maxLines: number;
  private stream: LogStream | null = null;
  private _follow = true;
  private _wrap = false;
  private filter = '';
  /** Visual lines between the bottom of the view and the end of the log. */
  private scrollBack = 0;
  private page = 10;
  private error: string | null = null;

  constructor(
    readonly pod: string,
    readonly namespace: string,
    options: LogsPaneOptions = {},
  ) {
    this.viewType = { type: 'logs', pod, namespace, container: options.container };
    this.maxLines = options.maxLines ?? MAX_LOG_LINES;
  }

  get follow(): boolean {
    return this._follow;
  }

  get wrap(): boolean {
    return this._wrap;
  }

  get filterText(): string {
    return this.filter;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /** Replaces the stream feeding this pane, stopping the previous one. */
  attach(stream: LogStream): void {
    this.stream?.stop();
    this.stream = stream;
    this.lines = [];
    this.scrollBack = 0;
    this._follow = true;
    this.error = null;
  }

  /** The lines a save would write: everything matching the current filter. */
  exportLines(): string[] {
    return this.matching();
  }

  handleDelivery(event: PaneDelivery): void {
    if (event.type === 'log-lines') {
      this.lines.push(...event.lines);
      if (this.lines.length > this.maxLines) this.lines.splice(0, this.lines.length - this.maxLines);
      if (!this._follow) this.scrollBack += this.filter ? event.lines.filter((l) => this.matches(l)).length : event.lines.length;
      this.error = null;
    } else if (event.type === 'log-error') {
      this.error = event.message;
    }
  }

  selectedResource(): SelectedResource {
    return { kind: 'pods', name: this.pod, namespace: this.namespace };
  }

  handleCommand(command: PaneCommand): void {
    switch (command.type) {
      case 'select-prev':
      case 'scroll-up':
        this.scrollBy(1);
        break;
      case 'select-next':
      case 'scroll-down':
        this.scrollBy(-1);
        break;
      case 'page-up':
        this.scrollBy(this.page);
        break;
      case 'page-down':
        this.scrollBy(-this.page);
        break;
      case 'go-to-top':
        this.scrollBy(Number.MAX_SAFE_INTEGER);
        break;
      case 'go-to-bottom':
        this.scrollBack = 0;
        this._follow = true;
        break;
      case 'toggle-follow':
        this._follow = !this._follow;
        if (this._follow) this.scrollBack = 0;
        break;
      case 'toggle-wrap':
        this._wrap = !this._wrap;
        this.scrollBack = 0;
        break;
      case 'filter':
        this.filter = command.text;
        this.scrollBack = 0;
        break;
      case 'clear-filter':
        this.filter = '';
        this.scrollBack = 0;
        break;
      default:
        break;
    }
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    const { width, height } = contentSize(rect);
    const body = Math.max(0, this.error ? height - 1 : height);
    this.page = Math.max(1, body);

    const visual = this._wrap
      ? this.matching().flatMap((line) => hardWrap(line, Math.max(1, width)))
      : this.matching();
    this.scrollBack = Math.min(this.scrollBack, Math.max(0, visual.length - body));
    const end = visual.length - this.scrollBack;
    const window = visual.slice(Math.max(0, end - body), end);

    const lines = window.map((line) => this.highlight(line, theme));
    if (this.error) lines.unshift(`{${theme.error}-fg}${escapeTags(this.error)}{/${theme.error}-fg}`);
    if (lines.length === 0 && !this.error) {
      lines.push(`{${theme.muted}-fg}${this.filter ? 'no matching lines' : 'waiting for log lines…'}{/${theme.muted}-fg}`);
    }

    const container = this.stream?.container;
    return {
      title: container ? `${viewLabel(this.viewType)} [${container}]` : viewLabel(this.viewType),
      lines,
      footer: this.footer(),
      borderColor: borderColor(focused, theme),
    };
  }

  dispose(): void {
    this.stream?.stop();
    this.stream = null;
  }

  // ── Internals ──

  private scrollBy(lines: number): void {
    this.scrollBack = Math.max(0, Math.min(this.scrollBack + lines, Math.max(0, this.matching().length - 1)));
    this._follow = this.scrollBack === 0;
  }

  private footer(): string {
    const parts = [this._follow ? 'follow' : 'paused'];
    if (this._wrap) parts.push('wrap');
    if (this.filter) parts.push(`/${this.filter}`);
    const status = this.stream?.status;
    if (status && status !== 'streaming') parts.push(status);
    return parts.join(' · ');
  }

  private matches(line: string): boolean {
    return line.toLowerCase().includes(this.filter.toLowerCase());
  }

  private matching(): string[] {
    return this.filter ? this.lines.filter((line) => this.matches(line)) : this.lines;
  }

  private highlight(line: string, theme: ThemeConfig): string {
    if (!this.filter) return escapeTags(line);
    const lower = line.toLowerCase();
    const needle = this.filter.toLowerCase();
    let out = '';
    let from = 0;
    let at = lower.indexOf(needle);
    while (at >= 0) {
      out += escapeTags(line.slice(from, at));
      out += `{${theme.warning}-fg}{bold}${escapeTags(line.slice(at, at + needle.length))}{/bold}{/${theme.warning}-fg}`;
      from = at + needle.length;
      at = lower.indexOf(needle, from);
    }
    return out + escapeTags(line.slice(from));
  }
}
