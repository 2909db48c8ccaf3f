/**
 * Keybinding reference, built from the dispatcher's reverse tables so it
 * always reflects the loaded configuration. Dot-leader aligned.
 */

import { KEYBINDING_GROUPS } from 'kubegrid-shared';
import type { KeybindingGroup, Rect, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';
import type { BindingInfo } from '../KeybindingDispatcher';
import { escapeTags } from '../formatters';
import { TextScroller } from './TextScroller';
import { borderColor, contentSize } from './types';
import type { Pane, PaneFrame } from './types';

const GROUP_TITLES: Record<KeybindingGroup, string> = {
  global: 'Global',
  mutate: 'Mutating actions (confirmed)',
  interact: 'Interact',
  browse: 'Browse',
  navigation: 'Navigation',
  tui: 'Panes and tabs',
};

const MODE_NOTES: Array<[string, string]> = [
  ['Esc', 'Leave insert, filter or query mode'],
  ['Ctrl+Enter', 'Run query (query editor)'],
  ['y / Y / E', 'Copy row / copy all / export CSV (query results)'],
  ['Middle click', 'Close tab or pane'],
];

const KEY_WIDTH = 14;
const ROW_WIDTH = 56;

function helpRow(key: string, desc: string): string {
  const dots = '·'.repeat(Math.max(1, ROW_WIDTH - KEY_WIDTH - desc.length));
  return `  {bold}${escapeTags(key)}{/bold}${' '.repeat(Math.max(0, KEY_WIDTH - key.length))} {gray-fg}${dots}{/gray-fg} ${escapeTags(desc)}`;
}

export class HelpPane implements Pane {
  readonly viewType: ViewType = { type: 'help' };
  private readonly lines: string[];
  private readonly scroller = new TextScroller();

  constructor(bindings: BindingInfo[]) {
    const lines: string[] = [];
    for (const group of KEYBINDING_GROUPS) {
      const rows = bindings.filter((b) => b.group === group);
      if (rows.length === 0) continue;
      if (lines.length > 0) lines.push('');
      lines.push(`{bold}  ${GROUP_TITLES[group]}{/bold}`);
      for (const b of rows) lines.push(helpRow(b.key, b.description));
    }
    lines.push('', '{bold}  Modes{/bold}');
    for (const [key, desc] of MODE_NOTES) lines.push(helpRow(key, desc));
    this.lines = lines;
  }

  handleCommand(command: PaneCommand): void {
    this.scroller.handle(command);
  }

  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame {
    return {
      title: 'Help',
      lines: this.scroller.window(this.lines, contentSize(rect).height),
      borderColor: borderColor(focused, theme),
    };
  }
}
