/**
 * Table of active port forwards. Deleting a row stops that forward.
 */

import { formatDuration } from 'kubegrid-shared';
import type { PortForwardInfo, Rect, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags, padCell, scrollWindow } from '../formatters';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame, SelectedResource } from './types';

const HEADERS = ['ID', 'POD', 'NAMESPACE', 'LOCAL', 'REMOTE', 'AGE'];

export class PortForwardsPane implements Pane {
  readonly viewType: ViewType = { type: 'plugin', name: 'PortForwards' };
  private selected = 0;
  private offset = 0;

  constructor(
    private readonly forwards: () => PortForwardInfo[],
    private readonly now: () => number = Date.now,
  ) {}

  selectedForward(): PortForwardInfo | null {
    const list = this.forwards();
    return list[Math.min(this.selected, list.length - 1)] ?? null;
  }

  selectedResource(): SelectedResource | null {
    const forward = this.selectedForward();
    return forward ? { kind: 'pods', name: forward.pod, namespace: forward.namespace } : null;
  }

  handleCommand(command: PaneCommand): void {
    const last = Math.max(0, this.forwards().length - 1);
    switch (command.type) {
      case 'select-next':
      case 'scroll-down':
        this.selected = Math.min(last, this.selected + 1);
        break;
      case 'select-prev':
      case 'scroll-up':
        this.selected = Math.max(0, this.selected - 1);
        break;
      case 'go-to-top':
        this.selected = 0;
        break;
      case 'go-to-bottom':
        this.selected = last;
        break;
      default:
        break;
    }
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    const { width, height } = contentSize(rect);
    const list = this.forwards();
    this.selected = Math.max(0, Math.min(this.selected, list.length - 1));
    if (list.length === 0) {
      return {
        title: 'Port Forwards [0]',
        lines: [`{${theme.muted}-fg}no active port forwards{/${theme.muted}-fg}`],
        borderColor: borderColor(focused, theme),
      };
    }

    const now = this.now();
    const rows = list.map((f) => [
      String(f.id),
      f.pod,
      f.namespace,
      `127.0.0.1:${f.localPort}`,
      String(f.remotePort),
      formatDuration((now - f.startedAt) / 1000),
    ]);
    const widths = HEADERS.map((h, i) => rows.reduce((w, r) => Math.max(w, r[i].length), h.length));
    const format = (cells: string[]) => cells.map((c, i) => padCell(c, widths[i])).join('  ');

    const lines = [`{bold}${escapeTags(format(HEADERS))}{/bold}`];
    const body = Math.max(1, height - 1);
    this.offset = scrollWindow(this.selected, this.offset, body, rows.length);
    rows.slice(this.offset, this.offset + body).forEach((row, i) => {
      const text = format(row);
      lines.push(this.offset + i === this.selected && focused
        ? `{${theme.selection}-bg}${escapeTags(text.padEnd(width))}{/${theme.selection}-bg}`
        : escapeTags(text));
    });

    return {
      title: `Port Forwards [${list.length}]`,
      lines,
      borderColor: borderColor(focused, theme),
    };
  }
}
