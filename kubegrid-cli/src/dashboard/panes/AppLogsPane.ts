/**
 * The application's own log records, read from the in-memory ring the
 * logger mirrors into.
 */

import type { LogEntry, LogLevelLabel, LogRing, Rect, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags, formatTime } from '../formatters';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame } from './types';

function levelColor(level: LogLevelLabel, theme: ThemeConfig): string {
  switch (level) {
    case 'error':
    case 'fatal':
      return theme.error;
    case 'warn':
      return theme.warning;
    case 'info':
      return theme.accent;
    default:
      return theme.muted;
  }
}

export function formatLogEntry(entry: LogEntry, theme: ThemeConfig): string {
  const color = levelColor(entry.level, theme);
  const level = entry.level.toUpperCase().padEnd(5);
  const component = entry.component ? `[${escapeTags(entry.component)}] ` : '';
  return `{${theme.muted}-fg}${formatTime(entry.time)}{/${theme.muted}-fg} {${color}-fg}${level}{/${color}-fg} ${component}${escapeTags(entry.msg)}`;
}

export class AppLogsPane implements Pane {
  readonly viewType: ViewType = { type: 'plugin', name: 'AppLogs' };
  /** Lines between the bottom of the view and the newest record; 0 follows. */
  private scrollBack = 0;
  private page = 10;
  private seenVersion: number;

  constructor(private readonly ring: LogRing) {
    this.seenVersion = ring.version;
  }

  handleCommand(command: PaneCommand): void {
    const max = Math.max(0, this.ring.entries().length - 1);
    switch (command.type) {
      case 'select-prev':
      case 'scroll-up':
        this.scrollBack = Math.min(max, this.scrollBack + 1);
        break;
      case 'select-next':
      case 'scroll-down':
        this.scrollBack = Math.max(0, this.scrollBack - 1);
        break;
      case 'page-up':
        this.scrollBack = Math.min(max, this.scrollBack + this.page);
        break;
      case 'page-down':
        this.scrollBack = Math.max(0, this.scrollBack - this.page);
        break;
      case 'go-to-top':
        this.scrollBack = max;
        break;
      case 'go-to-bottom':
        this.scrollBack = 0;
        break;
      default:
        break;
    }
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    const { height } = contentSize(rect);
    this.page = Math.max(1, height);
    const entries = this.ring.entries();

    // Keep a scrolled-back view anchored while new records arrive.
    const added = this.ring.version - this.seenVersion;
    if (this.scrollBack > 0 && added > 0) this.scrollBack += added;
    this.seenVersion = this.ring.version;
    this.scrollBack = Math.min(this.scrollBack, Math.max(0, entries.length - height));

    const end = entries.length - this.scrollBack;
    const lines = entries.slice(Math.max(0, end - height), end).map((e) => formatLogEntry(e, theme));
    return {
      title: 'App Logs',
      lines: lines.length > 0 ? lines : [`{${theme.muted}-fg}no log records yet{/${theme.muted}-fg}`],
      footer: this.scrollBack > 0 ? `-${this.scrollBack}` : undefined,
      borderColor: borderColor(focused, theme),
    };
  }
}
