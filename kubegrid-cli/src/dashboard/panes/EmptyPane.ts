/**
 * Placeholder created by a split until the user opens something in it.
 */

import type { Rect, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import { escapeTags } from '../formatters';
import { borderColor } from './types';
import type { Pane, PaneFrame } from './types';

export class EmptyPane implements Pane {
  readonly viewType: ViewType = { type: 'empty' };

  constructor(private readonly hint: string = 'Press : to open a resource list') {}

  handleCommand(_command: PaneCommand): void {}

  render(_rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    return {
      title: 'Empty',
      lines: ['', `{${theme.muted}-fg}${escapeTags(this.hint)}{/${theme.muted}-fg}`],
      borderColor: borderColor(focused, theme),
    };
  }
}
