/**
 * Describe-style summary of one object, fetched once when the pane opens.
 */

import { detailSections, viewLabel } from 'kubegrid-shared';
import type { DetailSection, PaneDelivery, Rect, ResourceKind, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags, sliceFrom } from '../formatters';
import { TextScroller } from './TextScroller';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame, SelectedResource } from './types';

const LABEL_WIDTH = 16;

export class DetailPane implements Pane {
  readonly viewType: ViewType;
  private sections: DetailSection[] | null = null;
  private error: string | null = null;
  private readonly scroller = new TextScroller();

  constructor(
    readonly kind: ResourceKind,
    readonly name: string,
    readonly namespace: string,
    private readonly now: () => number = Date.now,
  ) {
    this.viewType = { type: 'detail', kind, name, namespace };
  }

  handleDelivery(event: PaneDelivery): void {
    if (event.type === 'resource-detail') {
      this.sections = detailSections(this.kind, event.object, this.now());
      this.error = null;
    } else if (event.type === 'resource-error') {
      this.error = event.message;
    }
  }

  selectedResource(): SelectedResource {
    return { kind: this.kind, name: this.name, namespace: this.namespace };
  }

  handleCommand(command: PaneCommand): void {
    this.scroller.handle(command);
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    const { height } = contentSize(rect);
    let lines: string[];
    if (this.error) {
      lines = [`{${theme.error}-fg}${escapeTags(this.error)}{/${theme.error}-fg}`];
    } else if (!this.sections) {
      lines = [`{${theme.muted}-fg}loading…{/${theme.muted}-fg}`];
    } else {
      lines = this.scroller.window(this.bodyLines(this.sections, theme), height);
    }
    return {
      title: viewLabel(this.viewType),
      lines,
      borderColor: borderColor(focused, theme),
    };
  }

  private bodyLines(sections: DetailSection[], theme: ThemeConfig): string[] {
    const out: string[] = [];
    for (const section of sections) {
      if (out.length > 0) out.push('');
      out.push(`{bold}{${theme.accent}-fg}${escapeTags(section.title)}{/${theme.accent}-fg}{/bold}`);
      for (const [label, value] of section.fields) {
        const [first, ...rest] = value.split('\n');
        const pad = ' '.repeat(LABEL_WIDTH + 2);
        out.push(escapeTags(sliceFrom(`  ${`${label}:`.padEnd(LABEL_WIDTH)}${first}`, this.scroller.column)));
        for (const line of rest) out.push(escapeTags(sliceFrom(pad + line, this.scroller.column)));
      }
    }
    return out;
  }
}
