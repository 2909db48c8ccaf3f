/**
 * Resolves key presses to commands.
 *
 * Text-entry modes map keys themselves before any configured binding is
 * consulted. Every other mode resolves the global group first, so the quit
 * key works there no matter what the focused pane is doing. In normal mode
 * the remaining groups are tried in order: mutate (flagged for
 * confirmation), interact, browse, navigation, tui.
 */

import {
  KEYBINDING_GROUPS,
  formatKeyDisplay,
  getLogger,
  keyId,
  keyToInputString,
  normalizeKeyEvent,
  parseKeyString,
} from 'kubegrid-shared';
import type { Direction, KeyEvent, KeybindingGroup, KeybindingsConfig } from 'kubegrid-shared';
import { pane } from './commands';
import type { Command, InputMode } from './commands';
import descriptions from './bindingDescriptions.json';

const log = getLogger('keys');

export interface ResolvedCommand {
  command: Command;
  /** Mutating actions go through the confirmation dialog first. */
  requiresConfirm: boolean;
}

export interface BindingInfo {
  group: KeybindingGroup;
  name: string;
  /** Display form, e.g. `Alt+V`. */
  key: string;
  description: string;
}

const FOCUS_DIRECTIONS: Record<string, Direction> = {
  focus_up: 'up',
  focus_down: 'down',
  focus_left: 'left',
  focus_right: 'right',
};

// ── Name → command tables ──

function globalCommand(name: string): Command | null {
  switch (name) {
    case 'quit': return { type: 'quit' };
    case 'help': return { type: 'show-help' };
    case 'app_logs': return { type: 'toggle-app-logs' };
    case 'port_forwards': return { type: 'toggle-port-forwards' };
    case 'enter_insert': return { type: 'enter-mode', mode: 'insert' };
    case 'namespace_selector': return { type: 'enter-mode', mode: 'namespace-selector' };
    case 'context_selector': return { type: 'enter-mode', mode: 'context-selector' };
    default: return null;
  }
}

function mutateCommand(name: string): Command | null {
  switch (name) {
    case 'delete': return { type: 'delete-resource' };
    case 'restart_rollout': return { type: 'restart-rollout' };
    default: return null;
  }
}

function interactCommand(name: string): Command | null {
  switch (name) {
    case 'exec': return { type: 'exec-into' };
    case 'open_query': return { type: 'open-query' };
    case 'port_forward': return { type: 'port-forward' };
    case 'view_logs': return { type: 'view-logs' };
    default: return null;
  }
}

function browseCommand(name: string): Command | null {
  switch (name) {
    case 'view_yaml': return { type: 'view-yaml' };
    case 'view_describe': return { type: 'view-describe' };
    case 'view_logs': return { type: 'view-logs' };
    case 'save_logs': return { type: 'save-logs' };
    case 'filter': return { type: 'enter-mode', mode: 'filter-input' };
    case 'resource_switcher': return { type: 'enter-resource-switcher' };
    case 'sort_column': return { type: 'sort-column' };
    case 'toggle_sort_order': return pane({ type: 'toggle-sort-order' });
    case 'toggle_all_namespaces': return { type: 'toggle-all-namespaces' };
    case 'toggle_follow': return pane({ type: 'toggle-follow' });
    case 'toggle_wrap': return pane({ type: 'toggle-wrap' });
    default: return null;
  }
}

function navigationCommand(name: string): Command | null {
  switch (name) {
    case 'scroll_up':
    case 'select_prev': return pane({ type: 'select-prev' });
    case 'scroll_down':
    case 'select_next': return pane({ type: 'select-next' });
    case 'select': return pane({ type: 'select' });
    case 'back': return pane({ type: 'back' });
    case 'go_to_top': return pane({ type: 'go-to-top' });
    case 'go_to_bottom': return pane({ type: 'go-to-bottom' });
    case 'page_up': return pane({ type: 'page-up' });
    case 'page_down': return pane({ type: 'page-down' });
    case 'scroll_left': return pane({ type: 'scroll-left' });
    case 'scroll_right': return pane({ type: 'scroll-right' });
    default: return null;
  }
}

function tuiCommand(name: string): Command | null {
  const direction = FOCUS_DIRECTIONS[name];
  if (direction) return { type: 'focus-direction', direction };

  const tab = /^goto_tab_(\d+)$/.exec(name);
  if (tab) {
    const n = parseInt(tab[1], 10);
    return n >= 1 ? { type: 'goto-tab', index: n - 1 } : null;
  }

  switch (name) {
    case 'split_vertical': return { type: 'split-vertical' };
    case 'split_horizontal': return { type: 'split-horizontal' };
    case 'close_pane': return { type: 'close-pane' };
    case 'toggle_fullscreen': return { type: 'toggle-fullscreen' };
    case 'resize_grow': return { type: 'resize-grow' };
    case 'resize_shrink': return { type: 'resize-shrink' };
    case 'new_tab': return { type: 'new-tab' };
    case 'close_tab': return { type: 'close-tab' };
    case 'next_tab': return { type: 'next-tab' };
    case 'prev_tab': return { type: 'prev-tab' };
    case 'open_terminal': return { type: 'open-terminal' };
    case 'focus_next': return { type: 'focus-next' };
    case 'focus_prev': return { type: 'focus-prev' };
    default: return null;
  }
}

const RESOLVERS: Record<KeybindingGroup, (name: string) => Command | null> = {
  global: globalCommand,
  mutate: mutateCommand,
  interact: interactCommand,
  browse: browseCommand,
  navigation: navigationCommand,
  tui: tuiCommand,
};

/** Groups consulted in normal mode after the global group. */
const NORMAL_ORDER: KeybindingGroup[] = ['mutate', 'interact', 'browse', 'navigation', 'tui'];

function describe(group: KeybindingGroup, name: string): string {
  const table: Record<string, string> = descriptions[group];
  if (table[name]) return table[name];
  return name.startsWith('goto_tab_') ? `Go to tab ${name.slice('goto_tab_'.length)}` : name;
}

// ── Mode-specific keys ──

function isPlainChar(key: KeyEvent): boolean {
  return key.key.length === 1 && !key.ctrl && !key.alt;
}

function isArrow(key: KeyEvent): boolean {
  return key.key === 'up' || key.key === 'down' || key.key === 'left' || key.key === 'right';
}

function selectorKeys(key: KeyEvent): Command | null {
  switch (key.key) {
    case 'enter': return { type: 'selector-confirm' };
    case 'esc': return { type: 'exit-mode' };
    case 'up': return { type: 'selector-prev' };
    case 'down': return { type: 'selector-next' };
    case 'backspace': return { type: 'selector-backspace' };
  }
  return isPlainChar(key) ? { type: 'selector-input', char: key.key } : null;
}

function queryEditorKeys(key: KeyEvent): Command | null {
  if (key.key === 'enter' && (key.ctrl || key.alt)) return { type: 'query-execute' };
  if (key.key === 'down' && key.ctrl) return { type: 'enter-mode', mode: 'query-browse' };
  if (key.ctrl && !key.alt) {
    switch (key.key) {
      case 'r': return { type: 'query-open-history' };
      case 's': return { type: 'query-save-prompt' };
      case 'o': return { type: 'query-open-saved' };
      case ' ': return { type: 'query-complete' };
    }
  }
  switch (key.key) {
    case 'esc': return { type: 'exit-mode' };
    case 'enter': return pane({ type: 'query-newline' });
    case 'tab': return pane({ type: 'query-indent' });
    case 'backtab': return pane({ type: 'query-deindent' });
    case 'backspace': return pane({ type: 'query-backspace' });
    case 'up': return pane({ type: 'query-cursor', direction: 'up' });
    case 'down': return pane({ type: 'query-cursor', direction: 'down' });
    case 'left': return pane({ type: 'query-cursor', direction: 'left' });
    case 'right': return pane({ type: 'query-cursor', direction: 'right' });
    case 'home': return pane({ type: 'query-cursor', direction: 'home' });
    case 'end': return pane({ type: 'query-cursor', direction: 'end' });
    case 'pageup': return pane({ type: 'query-scroll', direction: 'up' });
    case 'pagedown': return pane({ type: 'query-scroll', direction: 'down' });
  }
  return isPlainChar(key) ? pane({ type: 'query-input', char: key.key }) : null;
}

function queryBrowseKeys(key: KeyEvent): Command | null {
  if (key.key === 'up' && key.ctrl) return { type: 'enter-mode', mode: 'query-editor' };
  switch (key.key) {
    case 'esc': return { type: 'exit-mode' };
    case 'enter': return { type: 'enter-mode', mode: 'query-editor' };
    case 'down': return pane({ type: 'query-browse-next' });
    case 'up': return pane({ type: 'query-browse-prev' });
    case 'left': return pane({ type: 'query-browse-left' });
    case 'right': return pane({ type: 'query-browse-right' });
    case 'pageup': return pane({ type: 'query-scroll', direction: 'up' });
    case 'pagedown': return pane({ type: 'query-scroll', direction: 'down' });
  }
  if (!isPlainChar(key)) return null;
  switch (key.key) {
    case 'j': return pane({ type: 'query-browse-next' });
    case 'k': return pane({ type: 'query-browse-prev' });
    case 'h': return pane({ type: 'query-browse-left' });
    case 'l': return pane({ type: 'query-browse-right' });
    case 'y': return { type: 'query-copy-row' };
    case 'Y': return { type: 'query-copy-all' };
    case 'E': return { type: 'query-export' };
    default: return null;
  }
}

function queryHistoryKeys(key: KeyEvent): Command | null {
  switch (key.key) {
    case 'esc': return { type: 'popup-cancel' };
    case 'enter': return { type: 'popup-confirm' };
    case 'down': return { type: 'popup-next' };
    case 'up': return { type: 'popup-prev' };
  }
  if (!isPlainChar(key)) return null;
  switch (key.key) {
    case 'j': return { type: 'popup-next' };
    case 'k': return { type: 'popup-prev' };
    case 'd': return { type: 'popup-delete' };
    default: return null;
  }
}

/**
 * Plain characters become popup input. In the saved-query list the
 * controller reads them as commands unless a filter or rename is being typed.
 */
function textPopupKeys(key: KeyEvent, lists: boolean): Command | null {
  switch (key.key) {
    case 'esc': return { type: 'popup-cancel' };
    case 'enter': return { type: 'popup-confirm' };
    case 'backspace': return { type: 'popup-backspace' };
  }
  if (lists && key.key === 'down') return { type: 'popup-next' };
  if (lists && key.key === 'up') return { type: 'popup-prev' };
  return isPlainChar(key) ? { type: 'popup-input', char: key.key } : null;
}

function completionKeys(key: KeyEvent): Command | null {
  if (key.ctrl && key.key === 'n') return { type: 'popup-next' };
  if (key.ctrl && key.key === 'p') return { type: 'popup-prev' };
  if (key.key === 'tab') return { type: 'popup-confirm' };
  return textPopupKeys(key, true);
}

/**
 * Keys handled by the mode itself. `undefined` means the mode has no say and
 * the configured bindings decide; `null` means the key is swallowed.
 */
function explicitOverride(key: KeyEvent, mode: InputMode): Command | null | undefined {
  switch (mode) {
    case 'insert': {
      if (key.key === 'esc') return { type: 'exit-mode' };
      const data = keyToInputString(key);
      return data ? pane({ type: 'send-input', data }) : null;
    }
    case 'namespace-selector':
    case 'context-selector':
    case 'resource-switcher':
      return selectorKeys(key);
    case 'confirm-dialog':
      if (key.key === 'y' || key.key === 'enter') return { type: 'confirm-action' };
      if (key.key === 'n' || key.key === 'esc') return { type: 'deny-action' };
      return null;
    case 'filter-input':
      if (key.key === 'esc') return { type: 'filter-cancel' };
      if (key.key === 'enter') return { type: 'exit-mode' };
      if (key.key === 'backspace') return { type: 'filter-backspace' };
      return isPlainChar(key) ? { type: 'filter-input', char: key.key } : null;
    case 'port-forward-input':
      if (key.key === 'esc') return { type: 'port-forward-cancel' };
      if (key.key === 'enter') return { type: 'port-forward-confirm' };
      if (key.key === 'tab' || key.key === 'backtab' || isArrow(key)) return { type: 'port-forward-toggle-field' };
      if (key.key === 'backspace') return { type: 'port-forward-backspace' };
      return /^\d$/.test(key.key) && !key.ctrl && !key.alt ? { type: 'port-forward-input', char: key.key } : null;
    case 'query-editor':
      return queryEditorKeys(key);
    case 'query-history':
      return queryHistoryKeys(key);
    case 'save-query-name':
    case 'export-dialog':
      return textPopupKeys(key, false);
    case 'saved-queries':
      return textPopupKeys(key, true);
    case 'completion':
      return completionKeys(key);
    default:
      return undefined;
  }
}

export class KeybindingDispatcher {
  private readonly tables = new Map<KeybindingGroup, Map<string, Command>>();
  private readonly reverse = new Map<KeybindingGroup, BindingInfo[]>();
  private _mode: InputMode = 'normal';

  constructor(config: KeybindingsConfig) {
    for (const group of KEYBINDING_GROUPS) {
      const table = new Map<string, Command>();
      const reverse: BindingInfo[] = [];
      for (const [name, keyString] of Object.entries(config[group])) {
        const command = RESOLVERS[group](name);
        const key = parseKeyString(keyString);
        if (!command || !key) {
          log.warn({ group, name, key: keyString }, 'ignoring unusable keybinding');
          continue;
        }
        table.set(keyId(key), command);
        reverse.push({ group, name, key: formatKeyDisplay(keyString), description: describe(group, name) });
      }
      this.tables.set(group, table);
      this.reverse.set(group, reverse);
    }
  }

  get mode(): InputMode {
    return this._mode;
  }

  setMode(mode: InputMode): void {
    this._mode = mode;
  }

  /** Resolves a key in the current mode. */
  dispatch(input: KeyEvent): ResolvedCommand | null {
    return this.mapInputToCommand(input, this._mode);
  }

  /** Pure lookup: same key and mode always give the same command. */
  mapInputToCommand(input: KeyEvent, mode: InputMode): ResolvedCommand | null {
    const key = normalizeKeyEvent(input);
    const override = explicitOverride(key, mode);
    if (override !== undefined) {
      return override ? { command: override, requiresConfirm: false } : null;
    }

    const id = keyId(key);
    const global = this.lookup('global', id);
    if (global) return { command: global, requiresConfirm: false };

    if (mode === 'query-browse') {
      const command = queryBrowseKeys(key);
      return command ? { command, requiresConfirm: false } : null;
    }
    if (mode !== 'normal') return null;

    for (const group of NORMAL_ORDER) {
      const command = this.lookup(group, id);
      if (command) return { command, requiresConfirm: group === 'mutate' };
    }
    return null;
  }

  /** Display form of the key bound to `name` in any group, e.g. for hints. */
  keyFor(name: string): string | null {
    for (const group of KEYBINDING_GROUPS) {
      const binding = this.reverse.get(group)?.find((b) => b.name === name);
      if (binding) return binding.key;
    }
    return null;
  }

  shortcuts(group: KeybindingGroup): BindingInfo[] {
    return this.reverse.get(group) ?? [];
  }

  allBindings(): BindingInfo[] {
    return KEYBINDING_GROUPS.flatMap((group) => this.shortcuts(group));
  }

  private lookup(group: KeybindingGroup, id: string): Command | undefined {
    return this.tables.get(group)?.get(id);
  }
}
