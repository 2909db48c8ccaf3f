/**
 * Input modes and the commands keys resolve to.
 *
 * Commands are plain data; the controller interprets them. Pane-scoped
 * commands are wrapped as `{ type: 'pane' }` and reach only the focused pane.
 */

import type { Direction } from 'kubegrid-shared';

export type InputMode =
  | 'normal'
  | 'insert'
  | 'namespace-selector'
  | 'context-selector'
  | 'resource-switcher'
  | 'confirm-dialog'
  | 'filter-input'
  | 'port-forward-input'
  | 'query-editor'
  | 'query-browse'
  | 'query-history'
  | 'save-query-name'
  | 'saved-queries'
  | 'export-dialog'
  | 'completion';

/** Query pane popups; each returns to the editor or the result browser when closed. */
export const QUERY_POPUP_MODES: ReadonlySet<InputMode> = new Set<InputMode>([
  'query-history',
  'save-query-name',
  'saved-queries',
  'export-dialog',
  'completion',
]);

/** Modes that show a blocking overlay; the mouse is ignored while one is open. */
export const MODAL_MODES: ReadonlySet<InputMode> = new Set<InputMode>([
  'confirm-dialog',
  'port-forward-input',
  'namespace-selector',
  'context-selector',
  'resource-switcher',
  ...QUERY_POPUP_MODES,
]);

export type PaneCommand =
  | { type: 'select-next' }
  | { type: 'select-prev' }
  | { type: 'select' }
  | { type: 'back' }
  | { type: 'go-to-top' }
  | { type: 'go-to-bottom' }
  | { type: 'page-up' }
  | { type: 'page-down' }
  | { type: 'scroll-up' }
  | { type: 'scroll-down' }
  | { type: 'scroll-left' }
  | { type: 'scroll-right' }
  | { type: 'toggle-follow' }
  | { type: 'toggle-wrap' }
  | { type: 'toggle-sort-order' }
  | { type: 'sort-by-column'; column: number }
  | { type: 'send-input'; data: string }
  | { type: 'filter'; text: string }
  | { type: 'clear-filter' }
  | { type: 'query-input'; char: string }
  | { type: 'query-backspace' }
  | { type: 'query-newline' }
  | { type: 'query-indent' }
  | { type: 'query-deindent' }
  | { type: 'query-cursor'; direction: Direction | 'home' | 'end' }
  | { type: 'query-scroll'; direction: 'up' | 'down' }
  | { type: 'query-browse-next' }
  | { type: 'query-browse-prev' }
  | { type: 'query-browse-left' }
  | { type: 'query-browse-right' };

export type Command =
  // Global
  | { type: 'quit' }
  | { type: 'show-help' }
  | { type: 'toggle-app-logs' }
  | { type: 'toggle-port-forwards' }
  | { type: 'focus-next' }
  | { type: 'focus-prev' }
  | { type: 'focus-direction'; direction: Direction }
  | { type: 'split-vertical' }
  | { type: 'split-horizontal' }
  | { type: 'close-pane' }
  | { type: 'new-tab' }
  | { type: 'close-tab' }
  | { type: 'next-tab' }
  | { type: 'prev-tab' }
  | { type: 'goto-tab'; index: number }
  | { type: 'toggle-fullscreen' }
  | { type: 'resize-grow' }
  | { type: 'resize-shrink' }
  | { type: 'enter-mode'; mode: InputMode }
  | { type: 'exit-mode' }
  | { type: 'open-terminal' }
  // Selectors (namespace, context, resource switcher share these)
  | { type: 'selector-input'; char: string }
  | { type: 'selector-backspace' }
  | { type: 'selector-confirm' }
  | { type: 'selector-next' }
  | { type: 'selector-prev' }
  | { type: 'enter-resource-switcher' }
  // Confirmation dialog
  | { type: 'confirm-action' }
  | { type: 'deny-action' }
  // Filter
  | { type: 'filter-input'; char: string }
  | { type: 'filter-backspace' }
  | { type: 'filter-cancel' }
  // Port-forward dialog
  | { type: 'port-forward-input'; char: string }
  | { type: 'port-forward-backspace' }
  | { type: 'port-forward-toggle-field' }
  | { type: 'port-forward-confirm' }
  | { type: 'port-forward-cancel' }
  // Query pane
  | { type: 'query-execute' }
  | { type: 'query-copy-row' }
  | { type: 'query-copy-all' }
  /** Opens the export dialog with a suggested path. */
  | { type: 'query-export' }
  | { type: 'query-open-history' }
  | { type: 'query-open-saved' }
  | { type: 'query-save-prompt' }
  | { type: 'query-complete' }
  // Query popups (history, save name, saved queries, export, completion)
  | { type: 'popup-next' }
  | { type: 'popup-prev' }
  | { type: 'popup-input'; char: string }
  | { type: 'popup-backspace' }
  | { type: 'popup-confirm' }
  | { type: 'popup-delete' }
  | { type: 'popup-cancel' }
  // Resource actions
  | { type: 'view-yaml' }
  | { type: 'view-describe' }
  | { type: 'view-logs' }
  | { type: 'save-logs' }
  | { type: 'exec-into' }
  | { type: 'open-query' }
  | { type: 'port-forward' }
  | { type: 'delete-resource' }
  | { type: 'restart-rollout' }
  | { type: 'sort-column' }
  | { type: 'toggle-all-namespaces' }
  | { type: 'pane'; command: PaneCommand };

export type CommandType = Command['type'];

export function pane(command: PaneCommand): Command {
  return { type: 'pane', command };
}
