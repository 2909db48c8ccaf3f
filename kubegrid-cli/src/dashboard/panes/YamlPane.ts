/**
 * Read-only document view for `view yaml` and `describe`.
 */

import { viewLabel } from 'kubegrid-shared';
import type { Rect, ResourceKind, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags, sliceFrom } from '../formatters';
import { TextScroller } from './TextScroller';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame, SelectedResource } from './types';

const YAML_KEY = /^(\s*(?:- )?)([\w./-]+:)(.*)$/;

export class YamlPane implements Pane {
  readonly viewType: ViewType;
  private readonly lines: string[];
  private readonly scroller = new TextScroller();

  constructor(
    readonly kind: ResourceKind,
    readonly name: string,
    readonly namespace: string,
    readonly mode: 'yaml' | 'describe',
    content: string,
  ) {
    this.viewType = { type: 'yaml', kind, name, namespace, mode };
    this.lines = content.replace(/\n$/, '').split('\n');
  }

  get lineCount(): number {
    return this.lines.length;
  }

  selectedResource(): SelectedResource {
    return { kind: this.kind, name: this.name, namespace: this.namespace };
  }

  handleCommand(command: PaneCommand): void {
    this.scroller.handle(command);
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    const { height } = contentSize(rect);
    const visible = this.scroller.window(this.lines, height);
    const last = Math.min(this.lines.length, this.scroller.offset + height);
    return {
      title: viewLabel(this.viewType),
      lines: visible.map((line) => this.highlight(sliceFrom(line, this.scroller.column), theme)),
      footer: `${last}/${this.lines.length}`,
      borderColor: borderColor(focused, theme),
    };
  }

  private highlight(line: string, theme: ThemeConfig): string {
    if (this.mode !== 'yaml') return escapeTags(line);
    const match = YAML_KEY.exec(line);
    if (!match) return escapeTags(line);
    const [, indent, key, rest] = match;
    return `${escapeTags(indent)}{${theme.accent}-fg}${escapeTags(key)}{/${theme.accent}-fg}${escapeTags(rest)}`;
  }
}
