/**
 * Dashboard state and the single place where events change it.
 *
 * Keys resolve to commands through the dispatcher. Global commands are
 * handled here; pane commands reach only the focused pane of the active tab.
 * Background deliveries pass the watcher manager's sequence filter before
 * they reach the one pane they are addressed to, so a pane that has been
 * rebound or closed never sees output from its old subscription.
 */

import * as fs from 'fs';
import {
  ExecSession,
  InvariantViolationError,
  LocalShell,
  LogStream,
  PortForwardRegistry,
  QueryHistory,
  QuerySession,
  RESOURCE_KINDS,
  SavedQueries,
  TabManager,
  WatcherManager,
  appLogRing,
  errorMessage,
  findPaneInDirection,
  getConfigDir,
  getLogExportPath,
  getLogger,
  getQueryExportPath,
  getQueryHistoryPath,
  getSavedQueriesPath,
  isInteractiveView,
  isPaneDelivery,
  kindInfo,
  parsePortInput,
  parseResourceKind,
  queryConfigFromEnv,
  suggestRemotePort,
  viewLabel,
} from 'kubegrid-shared';
import type {
  AppConfig,
  AppEvent,
  ClusterClient,
  ContextInfo,
  DeliveryTarget,
  Direction,
  InformerOptions,
  KeyEvent,
  LocalShellOptions,
  LogRing,
  LogStreamOptions,
  MouseInput,
  PaneDelivery,
  PaneId,
  PluginName,
  Rect,
  ResourceKind,
  SplitOrientation,
  Tab,
  TerminalSession,
  ThemeConfig,
  ToastLevel,
  ViewType,
} from 'kubegrid-shared';
import { copyToClipboard } from './clipboard';
import type { CopyToClipboard } from './clipboard';
import { MODAL_MODES, QUERY_POPUP_MODES } from './commands';
import type { Command, InputMode, PaneCommand } from './commands';
import { KeybindingDispatcher } from './KeybindingDispatcher';
import { Selector } from './Selector';
import { tabAt, tabScrollOffset } from './tabStrip';
import { AppLogsPane } from './panes/AppLogsPane';
import { DetailPane } from './panes/DetailPane';
import { EmptyPane } from './panes/EmptyPane';
import { ExecPane } from './panes/ExecPane';
import { HelpPane } from './panes/HelpPane';
import { LogsPane } from './panes/LogsPane';
import { PortForwardsPane } from './panes/PortForwardsPane';
import { QueryPane } from './panes/QueryPane';
import { ResourceListPane } from './panes/ResourceListPane';
import { YamlPane } from './panes/YamlPane';
import { contentSize } from './panes/types';
import type { Pane, PaneFrame, SelectedResource } from './panes/types';

const log = getLogger('controller');

// ── Constants ──

export const MIN_COLUMNS = 40;
export const MIN_ROWS = 10;
const RESIZE_STEP = 0.05;
const ALL_NAMESPACES = 'All Namespaces';
const MAX_TOASTS = 3;
const TOAST_MS: Record<ToastLevel, number> = { info: 3000, warning: 4000, error: 6000 };

// ── Types ──

export interface Toast {
  id: number;
  level: ToastLevel;
  message: string;
  expiresAt: number;
}

type PendingAction =
  | { type: 'quit' }
  | { type: 'delete'; resource: SelectedResource }
  | { type: 'restart'; resource: SelectedResource }
  | { type: 'save-logs'; path: string; content: string };

interface PortForwardDialog {
  pod: string;
  namespace: string;
  local: string;
  remote: string;
  field: 'local' | 'remote';
  /** Set once the user types a remote port, so a late suggestion does not overwrite it. */
  remoteEdited: boolean;
  error: string | null;
}

type SelectorState =
  | { type: 'namespace'; selector: Selector<string> }
  | { type: 'context'; selector: Selector<ContextInfo> }
  | { type: 'resource'; selector: Selector<ResourceKind> };

export type Overlay =
  | { type: 'selector'; title: string; filter: string; items: string[]; selected: number }
  | { type: 'confirm'; message: string }
  | {
    type: 'port-forward';
    pod: string;
    local: string;
    remote: string;
    field: 'local' | 'remote';
    error: string | null;
  };

export interface RenderedPane {
  id: PaneId;
  rect: Rect;
  focused: boolean;
  frame: PaneFrame;
}

export interface StatusInfo {
  context: string;
  namespace: string;
  /** [key, label] pairs for the right zone. */
  hints: Array<[string, string]>;
}

/** Everything the Ink layer needs to draw one frame. */
export interface DashboardView {
  columns: number;
  rows: number;
  tooSmall: boolean;
  tabs: string[];
  activeTab: number;
  tabOffset: number;
  panes: RenderedPane[];
  mode: InputMode;
  overlay: Overlay | null;
  /** Filter being typed, while in filter-input mode. */
  filter: string | null;
  toasts: Toast[];
  status: StatusInfo;
  theme: ThemeConfig;
}

export type ShellFactory = (target: DeliveryTarget, options: LocalShellOptions) => TerminalSession;

export interface ControllerDeps {
  config: AppConfig;
  /** Null when no kubeconfig could be loaded; cluster actions then report it. */
  client: ClusterClient | null;
  send: (event: AppEvent) => void;
  columns?: number;
  rows?: number;
  initialView?: ResourceKind;
  namespace?: string;
  allNamespaces?: boolean;
  now?: () => number;
  clipboard?: CopyToClipboard;
  writeFile?: (path: string, content: string) => Promise<void>;
  shellFactory?: ShellFactory;
  logRing?: LogRing;
  informer?: InformerOptions;
  logStream?: LogStreamOptions;
  /** Where query history and saved queries live; defaults to the config directory. */
  stateDir?: string;
}

function startLocalShell(target: DeliveryTarget, options: LocalShellOptions): TerminalSession {
  const shell = new LocalShell(target, options);
  shell.start();
  return shell;
}

function writeTextFile(path: string, content: string): Promise<void> {
  return fs.promises.writeFile(path, content, 'utf8');
}

function deleteMessage(resource: SelectedResource): string {
  const kind = kindInfo(resource.kind).apiKind;
  return resource.namespace
    ? `Delete ${kind} ${resource.name}\nin namespace ${resource.namespace}?`
    : `Delete ${kind} ${resource.name}?`;
}

// ── Controller ──

export class DashboardController {
  private readonly config: AppConfig;
  private readonly send: (event: AppEvent) => void;
  private readonly now: () => number;
  private readonly clipboard: CopyToClipboard;
  private readonly writeFile: (path: string, content: string) => Promise<void>;
  private readonly shellFactory: ShellFactory;
  private readonly logRing: LogRing;
  private readonly logStreamOptions: LogStreamOptions;
  private readonly defaultKind: ResourceKind;
  private readonly stateDir: string;

  private readonly tabs = new TabManager('Main');
  private readonly panes = new Map<PaneId, Pane>();
  private readonly watchers: WatcherManager;
  private readonly forwards: PortForwardRegistry;
  private readonly dispatcher: KeybindingDispatcher;

  private client: ClusterClient | null;
  private pendingContext: { name: string; client: ClusterClient } | null = null;
  private namespace: string;
  private allNamespaces: boolean;
  private namespaces: string[] = [];

  private columns: number;
  private rows: number;
  private tabOffset = 0;
  private selector: SelectorState | null = null;
  private pendingConfirm: { message: string; action: PendingAction } | null = null;
  private portForward: PortForwardDialog | null = null;
  private filterBuffer = '';
  private _toasts: Toast[] = [];
  private nextToastId = 1;
  private _running = true;
  private savedQueries: SavedQueries | null = null;

  constructor(deps: ControllerDeps) {
    this.config = deps.config;
    this.send = deps.send;
    this.now = deps.now ?? Date.now;
    this.clipboard = deps.clipboard ?? copyToClipboard;
    this.writeFile = deps.writeFile ?? writeTextFile;
    this.shellFactory = deps.shellFactory ?? startLocalShell;
    this.logRing = deps.logRing ?? appLogRing;
    this.logStreamOptions = deps.logStream ?? {};
    this.stateDir = deps.stateDir ?? getConfigDir();
    this.client = deps.client;
    this.namespace = deps.namespace ?? deps.client?.namespace ?? this.config.general.defaultNamespace;
    this.allNamespaces = deps.allNamespaces ?? false;
    this.columns = deps.columns ?? 80;
    this.rows = deps.rows ?? 24;
    this.defaultKind = deps.initialView ?? parseResourceKind(this.config.general.defaultView) ?? 'pods';

    this.dispatcher = new KeybindingDispatcher(this.config.keybindings);
    this.watchers = new WatcherManager({ source: this.client, send: this.send, informer: deps.informer });
    this.forwards = new PortForwardRegistry(this.client, this.send, this.now);

    this.showResourceList(this.tabs.active.focusedPane, this.defaultKind);
  }

  // ── Read access ──

  get running(): boolean {
    return this._running;
  }

  get mode(): InputMode {
    return this.dispatcher.mode;
  }

  get activeTab(): Tab {
    return this.tabs.active;
  }

  get tabCount(): number {
    return this.tabs.tabs.length;
  }

  get focusedId(): PaneId {
    return this.tabs.active.focusedPane;
  }

  get toasts(): readonly Toast[] {
    return this._toasts;
  }

  get staleDropped(): number {
    return this.watchers.staleDropped;
  }

  get currentNamespace(): string {
    return this.allNamespaces ? '' : this.namespace;
  }

  pane(id: PaneId): Pane | undefined {
    return this.panes.get(id);
  }

  paneIds(): PaneId[] {
    return [...this.panes.keys()];
  }

  focusedPane(): Pane | undefined {
    return this.panes.get(this.focusedId);
  }

  currentSeq(id: PaneId): number | undefined {
    return this.watchers.currentSeq(id);
  }

  tabNames(): string[] {
    return this.tabs.tabs.map((tab) => tab.name);
  }

  /** Pane rectangles of the active tab: the body between the tab bar and the status bar. */
  paneLayout(): Array<[PaneId, Rect]> {
    const tab = this.tabs.active;
    const body: Rect = { x: 0, y: 1, width: this.columns, height: Math.max(0, this.rows - 2) };
    if (tab.fullscreenPane !== null) return [[tab.fullscreenPane, body]];
    return tab.paneTree.layout(body);
  }

  paneAt(x: number, y: number): PaneId | null {
    const hit = this.paneLayout().find(([, r]) => x >= r.x && x < r.x + r.width && y >= r.y && y < r.y + r.height);
    return hit ? hit[0] : null;
  }

  /** Throws when the pane trees and the pane map disagree. */
  assertPaneInvariants(): void {
    const leaves = new Set<PaneId>();
    for (const tab of this.tabs.tabs) {
      const ids = tab.paneTree.leafIds();
      if (!ids.includes(tab.focusedPane)) {
        throw new InvariantViolationError(`tab ${tab.id} focuses pane ${tab.focusedPane} outside its tree`);
      }
      if (tab.fullscreenPane !== null && !ids.includes(tab.fullscreenPane)) {
        throw new InvariantViolationError(`tab ${tab.id} has fullscreen pane ${tab.fullscreenPane} outside its tree`);
      }
      for (const id of ids) {
        if (leaves.has(id)) throw new InvariantViolationError(`pane ${id} appears in two trees`);
        leaves.add(id);
      }
    }
    const keys = this.paneIds();
    if (keys.length !== leaves.size || keys.some((id) => !leaves.has(id))) {
      throw new InvariantViolationError(`pane map [${keys.join(', ')}] does not match tree leaves [${[...leaves].join(', ')}]`);
    }
  }

  view(): DashboardView {
    const names = this.tabNames();
    this.tabOffset = tabScrollOffset(names, this.tabs.activeIndex, this.tabOffset, this.columns);
    const tooSmall = this.columns < MIN_COLUMNS || this.rows < MIN_ROWS;
    const theme = this.config.theme;
    const focused = this.focusedId;

    const panes: RenderedPane[] = [];
    if (!tooSmall) {
      for (const [id, rect] of this.paneLayout()) {
        const pane = this.panes.get(id);
        if (pane) panes.push({ id, rect, focused: id === focused, frame: pane.render(rect, id === focused, theme) });
      }
    }

    return {
      columns: this.columns,
      rows: this.rows,
      tooSmall,
      tabs: names,
      activeTab: this.tabs.activeIndex,
      tabOffset: this.tabOffset,
      panes,
      mode: this.mode,
      overlay: this.overlay(),
      filter: this.mode === 'filter-input' ? this.filterBuffer : null,
      toasts: [...this._toasts],
      status: {
        context: this.client?.context ?? 'no cluster',
        namespace: this.allNamespaces ? 'all' : this.namespace,
        hints: this.hints(),
      },
      theme,
    };
  }

  // ── Events ──

  handleEvent(event: AppEvent): void {
    if (isPaneDelivery(event)) {
      this.deliver(event);
      return;
    }
    switch (event.type) {
      case 'key':
        this.handleKey(event.key);
        break;
      case 'mouse':
        this.handleMouse(event.mouse);
        break;
      case 'tick':
        this.expireToasts();
        break;
      case 'resize':
        this.columns = event.columns;
        this.rows = event.rows;
        break;
      case 'yaml-ready':
        this.openDocument(event);
        break;
      case 'namespaces':
        this.namespaces = event.namespaces;
        if (this.selector?.type === 'namespace') this.selector.selector.setItems(this.namespaceItems());
        break;
      case 'context-switched':
        this.applyContext(event.context, event.namespace, event.namespaces);
        break;
      case 'context-switch-failed':
        if (this.pendingContext?.name === event.context) this.pendingContext = null;
        this.notify('error', `Failed to switch context ${event.context}: ${event.message}`);
        break;
      case 'remote-port': {
        const dialog = this.portForward;
        if (dialog && dialog.pod === event.pod && dialog.namespace === event.namespace && !dialog.remoteEdited) {
          dialog.remote = String(event.port);
        }
        break;
      }
      case 'port-forward-started':
        break;
      case 'port-forward-stopped':
        if (event.reason) this.notify('warning', `Port-forward ${event.id} stopped: ${event.reason}`);
        break;
      case 'toast':
        this.notify(event.level, event.message);
        break;
    }
  }

  handleKey(key: KeyEvent): void {
    const resolved = this.dispatcher.dispatch(key);
    if (!resolved) return;
    const { command } = resolved;
    if (resolved.requiresConfirm || (command.type === 'quit' && this.config.general.confirmQuit)) {
      this.requestConfirmation(command);
      return;
    }
    this.handleCommand(command);
  }

  handleMouse(mouse: MouseInput): void {
    if (MODAL_MODES.has(this.mode)) return;

    if (mouse.y === 0) {
      if (mouse.type !== 'click') return;
      this.tabOffset = tabScrollOffset(this.tabNames(), this.tabs.activeIndex, this.tabOffset, this.columns);
      const index = tabAt(this.tabNames(), this.tabOffset, mouse.x);
      if (index === null) return;
      if (mouse.button === 'left') this.switchTab(index);
      else if (mouse.button === 'middle') this.closeTab(index);
      return;
    }
    if (mouse.y >= this.rows - 1) return;

    const id = this.paneAt(mouse.x, mouse.y);
    if (id === null) return;
    switch (mouse.type) {
      case 'scroll-up':
        this.panes.get(id)?.handleCommand({ type: 'scroll-up' });
        break;
      case 'scroll-down':
        this.panes.get(id)?.handleCommand({ type: 'scroll-down' });
        break;
      case 'click':
        if (mouse.button === 'left') this.setFocus(id);
        else if (mouse.button === 'middle') this.closePane(id);
        break;
      default:
        break;
    }
  }

  handleCommand(command: Command): void {
    log.debug({ command: command.type, mode: this.mode }, 'command');
    switch (command.type) {
      case 'quit':
        this.quit();
        break;
      case 'show-help':
        this.toggleHelp();
        break;
      case 'toggle-app-logs':
        this.togglePluginTab('AppLogs');
        break;
      case 'toggle-port-forwards':
        this.togglePluginTab('PortForwards');
        break;
      case 'focus-next':
        this.cycleFocus(1);
        break;
      case 'focus-prev':
        this.cycleFocus(-1);
        break;
      case 'focus-direction':
        this.focusDirection(command.direction);
        break;
      case 'split-vertical':
        this.splitFocused('vertical');
        break;
      case 'split-horizontal':
        this.splitFocused('horizontal');
        break;
      case 'close-pane':
        this.closePane(this.focusedId);
        break;
      case 'new-tab': {
        const root = this.tabs.newTab(`Tab ${this.tabs.tabs.length + 1}`);
        this.showResourceList(root, this.defaultKind);
        this.syncModeWithFocus();
        break;
      }
      case 'close-tab':
        this.closeTab(this.tabs.activeIndex);
        break;
      case 'next-tab':
        this.tabs.nextTab();
        this.syncModeWithFocus();
        break;
      case 'prev-tab':
        this.tabs.prevTab();
        this.syncModeWithFocus();
        break;
      case 'goto-tab':
        this.switchTab(command.index);
        break;
      case 'toggle-fullscreen': {
        const tab = this.tabs.active;
        tab.fullscreenPane = tab.fullscreenPane === null ? tab.focusedPane : null;
        break;
      }
      case 'resize-grow':
      case 'resize-shrink':
        this.tabs.active.paneTree.resize(this.focusedId, RESIZE_STEP, command.type === 'resize-grow');
        break;
      case 'enter-mode':
        this.enterMode(command.mode);
        break;
      case 'exit-mode':
        this.exitMode();
        break;
      case 'open-terminal':
        this.openTerminal();
        break;

      case 'enter-resource-switcher':
        this.openResourceSwitcher();
        break;
      case 'selector-input':
        this.selector?.selector.input(command.char);
        break;
      case 'selector-backspace':
        this.selector?.selector.backspace();
        break;
      case 'selector-next':
        this.selector?.selector.next();
        break;
      case 'selector-prev':
        this.selector?.selector.prev();
        break;
      case 'selector-confirm':
        this.confirmSelector();
        break;

      case 'confirm-action': {
        const pending = this.pendingConfirm;
        this.exitMode();
        if (pending) this.runAction(pending.action);
        break;
      }
      case 'deny-action':
        this.exitMode();
        break;

      case 'filter-input':
        this.filterBuffer += command.char;
        this.routePaneCommand({ type: 'filter', text: this.filterBuffer });
        break;
      case 'filter-backspace':
        this.filterBuffer = this.filterBuffer.slice(0, -1);
        this.routePaneCommand(this.filterBuffer ? { type: 'filter', text: this.filterBuffer } : { type: 'clear-filter' });
        break;
      case 'filter-cancel':
        this.filterBuffer = '';
        this.routePaneCommand({ type: 'clear-filter' });
        this.setMode('normal');
        break;

      case 'port-forward-input':
        this.editPort((value) => (value === '0' ? command.char : value + command.char).slice(0, 5));
        break;
      case 'port-forward-backspace':
        this.editPort((value) => value.slice(0, -1));
        break;
      case 'port-forward-toggle-field':
        if (this.portForward) this.portForward.field = this.portForward.field === 'local' ? 'remote' : 'local';
        break;
      case 'port-forward-confirm':
        this.confirmPortForward();
        break;
      case 'port-forward-cancel':
        this.exitMode();
        break;

      case 'query-execute':
        this.executeQuery();
        break;
      case 'query-copy-row':
      case 'query-copy-all':
        this.copyQueryResult(command.type === 'query-copy-all');
        break;
      case 'query-export':
        this.openExportDialog();
        break;
      case 'query-open-history':
        this.openQueryHistory();
        break;
      case 'query-open-saved':
        this.openSavedQueries();
        break;
      case 'query-save-prompt':
        this.promptSaveQuery();
        break;
      case 'query-complete':
        this.triggerCompletion();
        break;
      case 'popup-next':
      case 'popup-prev':
        this.focusedQuery()?.popupMove(command.type === 'popup-next' ? 1 : -1);
        break;
      case 'popup-input':
        this.popupInput(command.char);
        break;
      case 'popup-backspace':
        this.popupBackspace();
        break;
      case 'popup-confirm':
        this.confirmPopup();
        break;
      case 'popup-delete':
        this.deletePopupEntry();
        break;
      case 'popup-cancel':
        this.cancelPopup();
        break;

      case 'view-yaml':
        this.fetchDocument('yaml');
        break;
      case 'view-describe':
        this.fetchDocument('describe');
        break;
      case 'view-logs':
        this.viewLogs();
        break;
      case 'save-logs':
        this.saveLogs();
        break;
      case 'exec-into':
        this.execInto();
        break;
      case 'open-query':
        this.openQuery();
        break;
      case 'port-forward':
        this.togglePortForward();
        break;
      case 'delete-resource':
      case 'restart-rollout': {
        const action = this.actionFor(command.type);
        if (action) this.runAction(action);
        break;
      }
      case 'sort-column':
        this.sortNextColumn();
        break;
      case 'toggle-all-namespaces':
        this.toggleAllNamespaces();
        break;
      case 'pane':
        this.routePaneCommand(command.command);
        break;
    }
  }

  /** Stops every producer and disposes every pane. */
  shutdown(): void {
    this.watchers.stopAll();
    this.forwards.stopAll();
    for (const pane of this.panes.values()) pane.dispose?.();
  }

  // ── Routing ──

  private deliver(event: PaneDelivery): void {
    if (!this.watchers.accept(event)) return;
    const pane = this.panes.get(event.paneId);
    if (!pane?.handleDelivery) return;
    pane.handleDelivery(event);
    if (event.type === 'session-exited') this.sessionExited(event.paneId, event.code);
  }

  private sessionExited(id: PaneId, code: number | null): void {
    if (code === 0) {
      this.closePane(id);
    } else if (id === this.focusedId && this.mode === 'insert') {
      this.setMode('normal');
    }
  }

  private routePaneCommand(command: PaneCommand): void {
    const id = this.focusedId;
    const pane = this.panes.get(id);
    if (!pane) return;
    if (command.type === 'select' && pane instanceof ResourceListPane) {
      this.openDetail(pane);
      return;
    }
    if (command.type === 'back' && (pane instanceof DetailPane || pane instanceof YamlPane)) {
      this.closePane(id);
      return;
    }
    pane.handleCommand(command);
  }

  // ── Modes ──

  private setMode(mode: InputMode): void {
    this.dispatcher.setMode(mode);
    const focused = this.focusedPane();
    if (focused instanceof QueryPane) focused.browsing = mode === 'query-browse' || mode === 'export-dialog';
  }

  private enterMode(mode: InputMode): void {
    const focused = this.focusedPane();
    switch (mode) {
      case 'insert':
        if (focused instanceof QueryPane) this.setMode('query-editor');
        else if (focused && isInteractiveView(focused.viewType)) this.setMode('insert');
        break;
      case 'query-editor':
      case 'query-browse':
        if (focused instanceof QueryPane) this.setMode(mode);
        break;
      case 'namespace-selector':
        this.openNamespaceSelector();
        break;
      case 'context-selector':
        this.openContextSelector();
        break;
      case 'resource-switcher':
        this.openResourceSwitcher();
        break;
      case 'filter-input':
        if (focused instanceof ResourceListPane || focused instanceof LogsPane) {
          this.filterBuffer = focused.filterText;
          this.setMode('filter-input');
        }
        break;
      case 'normal':
        this.exitMode();
        break;
      case 'confirm-dialog':
      case 'port-forward-input':
      case 'query-history':
      case 'save-query-name':
      case 'saved-queries':
      case 'export-dialog':
      case 'completion':
        // Opened by the action that needs them.
        break;
    }
  }

  private exitMode(): void {
    this.selector = null;
    this.pendingConfirm = null;
    this.portForward = null;
    const focused = this.focusedPane();
    if (focused instanceof QueryPane) focused.closePopup();
    this.setMode('normal');
  }

  /** Keeps the mode consistent with the pane that now has focus. */
  private syncModeWithFocus(): void {
    const focused = this.focusedPane();
    const mode = this.mode;
    if (focused instanceof QueryPane) {
      const popupGone = QUERY_POPUP_MODES.has(mode) && !focused.popup;
      if (mode === 'normal' || mode === 'insert' || popupGone) this.setMode('query-editor');
      return;
    }
    if (mode === 'query-editor' || mode === 'query-browse' || QUERY_POPUP_MODES.has(mode)) {
      this.setMode('normal');
    } else if (mode === 'insert' && !(focused && isInteractiveView(focused.viewType))) {
      this.setMode('normal');
    }
  }

  private overlay(): Overlay | null {
    if (this.pendingConfirm) return { type: 'confirm', message: this.pendingConfirm.message };
    if (this.portForward) {
      const { pod, local, remote, field, error } = this.portForward;
      return { type: 'port-forward', pod, local, remote, field, error };
    }
    if (this.selector) {
      const { selector } = this.selector;
      return {
        type: 'selector',
        title: selector.title,
        filter: selector.filter,
        items: selector.labels(),
        selected: selector.selected,
      };
    }
    return null;
  }

  private hints(): Array<[string, string]> {
    switch (this.mode) {
      case 'insert':
        return [['Esc', 'leave insert']];
      case 'filter-input':
        return [['Enter', 'keep'], ['Esc', 'clear']];
      case 'query-editor':
        return [['Ctrl+Enter', 'run'], ['Ctrl+Space', 'complete'], ['Ctrl+R', 'history'], ['Ctrl+Down', 'results'], ['Esc', 'leave']];
      case 'query-history':
        return [['Enter', 'load'], ['d', 'delete'], ['Esc', 'close']];
      case 'save-query-name':
        return [['Enter', 'save'], ['Esc', 'cancel']];
      case 'saved-queries':
        return [['Enter', 'load'], ['e', 'rename'], ['d', 'delete'], ['/', 'filter'], ['Esc', 'close']];
      case 'export-dialog':
        return [['Enter', 'export'], ['Esc', 'cancel']];
      case 'completion':
        return [['Tab', 'accept'], ['Up/Down', 'choose'], ['Esc', 'dismiss']];
      case 'query-browse':
        return [['y', 'copy row'], ['Y', 'copy all'], ['E', 'export'], ['Esc', 'leave']];
      default: {
        const named: Array<[string, string]> = [
          ['help', 'help'],
          ['resource_switcher', 'resources'],
          ['namespace_selector', 'namespace'],
          ['quit', 'quit'],
        ];
        const hints: Array<[string, string]> = [];
        for (const [name, label] of named) {
          const key = this.dispatcher.keyFor(name);
          if (key) hints.push([key, label]);
        }
        return hints;
      }
    }
  }

  // ── Toasts ──

  private notify(level: ToastLevel, message: string): void {
    if (level === 'error') log.warn({ toast: message }, 'error shown');
    this._toasts.push({ id: this.nextToastId++, level, message, expiresAt: this.now() + TOAST_MS[level] });
    if (this._toasts.length > MAX_TOASTS) this._toasts.shift();
  }

  private expireToasts(): void {
    const now = this.now();
    this._toasts = this._toasts.filter((toast) => toast.expiresAt > now);
  }

  // ── Pane bookkeeping ──

  private target(id: PaneId): DeliveryTarget {
    return { paneId: id, seq: this.watchers.nextSeq(id), send: this.send };
  }

  /**
   * Puts `pane` at `id`, retiring whatever was there. Pass `rebinding` when the
   * caller binds the pane straight after: `bind` then does the only seq bump.
   */
  private replacePane(id: PaneId, pane: Pane, rebinding = false): void {
    const old = this.panes.get(id);
    if (old) {
      if (!rebinding) this.watchers.release(id);
      old.dispose?.();
    }
    this.panes.set(id, pane);
  }

  private disposePane(id: PaneId): void {
    this.watchers.unbind(id);
    this.panes.get(id)?.dispose?.();
    this.panes.delete(id);
  }

  private showResourceList(id: PaneId, kind: ResourceKind): void {
    const pane = new ResourceListPane(kind, {
      namespace: this.namespace,
      allNamespaces: this.allNamespaces,
      columns: this.config.views[kind],
    });
    this.replacePane(id, pane, true);
    this.watchers.bind(id, kind, pane.watchNamespace);
  }

  private paneRect(id: PaneId): Rect {
    const hit = this.paneLayout().find(([paneId]) => paneId === id);
    return hit ? hit[1] : { x: 0, y: 1, width: this.columns, height: Math.max(0, this.rows - 2) };
  }

  /** Splits `target` (activating its tab) and returns the new, still empty, pane id. */
  private splitBeside(target: PaneId, orientation: SplitOrientation): PaneId {
    const index = this.tabs.findTabOf(target);
    if (index >= 0 && index !== this.tabs.activeIndex) this.tabs.switchTab(index);
    this.tabs.active.fullscreenPane = null;
    return this.tabs.splitPane(target, orientation);
  }

  private splitFocused(orientation: SplitOrientation): void {
    const id = this.splitBeside(this.focusedId, orientation);
    this.replacePane(id, new EmptyPane());
    this.setFocus(id);
  }

  private closePane(id: PaneId): void {
    const index = this.tabs.findTabOf(id);
    if (index < 0) return;
    const tab = this.tabs.tabs[index];

    if (tab.paneTree.size === 1) {
      if (this.tabs.tabs.length > 1) {
        this.closeTab(index);
      } else {
        this.replacePane(id, new EmptyPane());
        tab.fullscreenPane = null;
        this.syncModeWithFocus();
      }
      return;
    }

    const previous = this.panes.get(id)?.viewType ?? null;
    const next = tab.paneTree.close(id);
    this.disposePane(id);
    if (tab.fullscreenPane === id) tab.fullscreenPane = null;
    if (tab.focusedPane === id) {
      tab.focusedPane = next ?? tab.paneTree.leafIds()[0];
      this.panes.get(tab.focusedPane)?.onFocusChange?.(previous);
      if (index === this.tabs.activeIndex) this.syncModeWithFocus();
    }
  }

  // ── Focus ──

  private setFocus(id: PaneId): void {
    const tab = this.tabs.active;
    if (tab.focusedPane === id || !tab.paneTree.contains(id)) return;
    const previous: ViewType | null = this.panes.get(tab.focusedPane)?.viewType ?? null;
    tab.focusedPane = id;
    this.panes.get(id)?.onFocusChange?.(previous);
    this.syncModeWithFocus();
  }

  private cycleFocus(delta: 1 | -1): void {
    const tab = this.tabs.active;
    if (tab.fullscreenPane !== null) return;
    const ids = tab.paneTree.leafIds();
    const index = ids.indexOf(tab.focusedPane);
    this.setFocus(ids[(index + delta + ids.length) % ids.length]);
  }

  private focusDirection(direction: Direction): void {
    if (this.tabs.active.fullscreenPane !== null) return;
    const layout = this.paneLayout();
    const current = layout.find(([id]) => id === this.focusedId);
    if (!current) return;
    const next = findPaneInDirection(current, layout, direction);
    if (next !== null) this.setFocus(next);
  }

  // ── Tabs ──

  private switchTab(index: number): void {
    if (index === this.tabs.activeIndex) return;
    if (this.tabs.switchTab(index)) this.syncModeWithFocus();
  }

  /** Closing the only tab leaves a fresh `Main` tab with the default list. */
  private closeTab(index: number): void {
    const tab = this.tabs.tabs[index];
    if (!tab) return;
    if (this.tabs.tabs.length === 1) {
      const old = tab.paneTree.leafIds();
      const root = this.tabs.newTab('Main');
      this.tabs.closeTab(0);
      for (const id of old) this.disposePane(id);
      this.showResourceList(root, this.defaultKind);
    } else {
      for (const id of this.tabs.closeTab(index) ?? []) this.disposePane(id);
    }
    this.syncModeWithFocus();
  }

  private togglePluginTab(name: PluginName): void {
    const index = this.tabs.tabs.findIndex((tab) =>
      tab.paneTree.leafIds().some((id) => {
        const view = this.panes.get(id)?.viewType;
        return view?.type === 'plugin' && view.name === name;
      }));
    if (index >= 0 && index === this.tabs.activeIndex) {
      this.closeTab(index);
      return;
    }
    if (index >= 0) {
      this.switchTab(index);
      return;
    }
    const view: ViewType = { type: 'plugin', name };
    const root = this.tabs.newTab(viewLabel(view));
    this.replacePane(root, name === 'AppLogs'
      ? new AppLogsPane(this.logRing)
      : new PortForwardsPane(() => this.forwards.list(), this.now));
    this.syncModeWithFocus();
  }

  private toggleHelp(): void {
    const tab = this.tabs.active;
    const help = tab.paneTree.leafIds().find((id) => this.panes.get(id) instanceof HelpPane);
    if (help !== undefined) {
      this.closePane(help);
      return;
    }
    const id = this.splitBeside(tab.focusedPane, 'vertical');
    this.replacePane(id, new HelpPane(this.dispatcher.allBindings()));
    this.setFocus(id);
  }

  // ── Selectors ──

  private namespaceItems(): string[] {
    return [ALL_NAMESPACES, ...this.namespaces];
  }

  private openNamespaceSelector(): void {
    const selector = new Selector('Namespace', this.namespaceItems(), (ns: string) => ns);
    const current = this.allNamespaces ? ALL_NAMESPACES : this.namespace;
    selector.selectWhere((ns) => ns === current);
    this.selector = { type: 'namespace', selector };
    this.setMode('namespace-selector');

    const client = this.client;
    if (!client) return;
    client.listNamespaces()
      .then((namespaces) => this.send({ type: 'namespaces', namespaces }))
      .catch((err: unknown) => this.send({ type: 'toast', level: 'warning', message: `Failed to list namespaces: ${errorMessage(err)}` }));
  }

  private openContextSelector(): void {
    const client = this.requireClient();
    if (!client) return;
    const selector = new Selector('Context', client.contexts(), (ctx: ContextInfo) => ctx.name);
    selector.selectWhere((ctx) => ctx.name === client.context);
    this.selector = { type: 'context', selector };
    this.setMode('context-selector');
  }

  private openResourceSwitcher(): void {
    const selector = new Selector('Resource', RESOURCE_KINDS, (kind: ResourceKind) => {
      const info = kindInfo(kind);
      return `${info.displayName} (${info.shortName})`;
    });
    this.selector = { type: 'resource', selector };
    this.setMode('resource-switcher');
  }

  private confirmSelector(): void {
    const state = this.selector;
    this.exitMode();
    if (!state) return;
    switch (state.type) {
      case 'namespace': {
        const choice = state.selector.current();
        if (choice !== null) this.applyNamespace(choice === ALL_NAMESPACES ? '' : choice);
        break;
      }
      case 'context': {
        const choice = state.selector.current();
        if (choice) this.switchContext(choice.name);
        break;
      }
      case 'resource': {
        const kind = state.selector.current();
        if (kind) this.switchResource(kind);
        break;
      }
    }
  }

  /** Empty `namespace` means all namespaces. Restarts the active tab's resource lists. */
  private applyNamespace(namespace: string): void {
    this.allNamespaces = namespace === '';
    if (namespace) this.namespace = namespace;
    for (const id of this.tabs.active.paneTree.leafIds()) {
      const pane = this.panes.get(id);
      if (!(pane instanceof ResourceListPane)) continue;
      pane.setScope(this.namespace, this.allNamespaces);
      this.watchers.bind(id, pane.kind, pane.watchNamespace);
    }
  }

  private switchResource(kind: ResourceKind): void {
    this.showResourceList(this.focusedId, kind);
    this.syncModeWithFocus();
  }

  private switchContext(name: string): void {
    const current = this.client;
    if (!current || name === current.context) return;
    let next: ClusterClient;
    try {
      next = current.withContext(name);
    } catch (err) {
      this.notify('error', `Failed to switch context ${name}: ${errorMessage(err)}`);
      return;
    }
    this.pendingContext = { name, client: next };
    next.listNamespaces()
      .then((namespaces) => this.send({ type: 'context-switched', context: name, namespace: next.namespace, namespaces }))
      .catch((err: unknown) => this.send({ type: 'context-switch-failed', context: name, message: errorMessage(err) }));
  }

  private applyContext(context: string, namespace: string, namespaces: string[]): void {
    const pending = this.pendingContext;
    if (!pending || pending.name !== context) return;
    this.pendingContext = null;
    this.client = pending.client;
    this.watchers.setSource(pending.client);
    this.forwards.stopAll();
    this.forwards.setSource(pending.client);
    this.namespace = namespace;
    this.allNamespaces = false;
    this.namespaces = namespaces;

    for (const [id, pane] of this.panes) {
      if (!(pane instanceof ResourceListPane)) continue;
      pane.setScope(namespace, false);
      this.watchers.bind(id, pane.kind, pane.watchNamespace);
    }
    log.info({ context, namespace }, 'context switched');
    this.notify('info', `Switched to context ${context}`);
  }

  // ── Confirmation ──

  private requestConfirmation(command: Command): void {
    switch (command.type) {
      case 'quit':
        this.confirm('Quit kubegrid?', { type: 'quit' });
        break;
      case 'delete-resource':
      case 'restart-rollout': {
        const action = this.actionFor(command.type);
        if (!action) break;
        if (action.type === 'delete' && !this.config.general.confirmDelete) {
          this.runAction(action);
        } else if (action.type === 'delete') {
          this.confirm(deleteMessage(action.resource), action);
        } else if (action.type === 'restart') {
          const { name, namespace } = action.resource;
          this.confirm(`Restart rollout of ${name}\nin namespace ${namespace}?`, action);
        }
        break;
      }
      default:
        this.handleCommand(command);
    }
  }

  private confirm(message: string, action: PendingAction): void {
    this.selector = null;
    this.portForward = null;
    this.pendingConfirm = { message, action };
    this.setMode('confirm-dialog');
  }

  /**
   * The action a mutating command would take on the focused selection, or
   * null when there is nothing to do. Deleting in the port-forwards view stops
   * the selected forward at once.
   */
  private actionFor(command: 'delete-resource' | 'restart-rollout'): PendingAction | null {
    const focused = this.focusedPane();
    if (command === 'delete-resource' && focused instanceof PortForwardsPane) {
      const forward = focused.selectedForward();
      if (forward) {
        this.forwards.stop(forward.id);
        this.notify('info', `Stopped port-forward for ${forward.pod}`);
      }
      return null;
    }
    const resource = focused?.selectedResource?.() ?? null;
    if (!resource) return null;
    if (command === 'delete-resource') return { type: 'delete', resource };
    if (resource.kind !== 'deployments') {
      this.notify('warning', 'Restart rollout is only available for Deployments');
      return null;
    }
    return { type: 'restart', resource };
  }

  private runAction(action: PendingAction): void {
    switch (action.type) {
      case 'quit':
        this.quit();
        break;
      case 'delete': {
        const client = this.requireClient();
        if (!client) return;
        const { kind, name, namespace } = action.resource;
        log.info({ kind, name, namespace }, 'delete');
        client.deleteResource(kind, name, namespace)
          .then(() => this.send({ type: 'toast', level: 'info', message: `Deleted ${kindInfo(kind).apiKind} ${name}` }))
          .catch((err: unknown) => this.send({ type: 'toast', level: 'error', message: `Delete failed: ${errorMessage(err)}` }));
        break;
      }
      case 'restart': {
        const client = this.requireClient();
        if (!client) return;
        const { kind, name, namespace } = action.resource;
        log.info({ kind, name, namespace }, 'restart rollout');
        client.restartRollout(kind, name, namespace)
          .then(() => this.send({ type: 'toast', level: 'info', message: `Restarted ${name}` }))
          .catch((err: unknown) => this.send({ type: 'toast', level: 'error', message: `Restart failed: ${errorMessage(err)}` }));
        break;
      }
      case 'save-logs': {
        const { path, content } = action;
        this.writeFile(path, content)
          .then(() => this.send({ type: 'toast', level: 'info', message: `Saved logs to ${path}` }))
          .catch((err: unknown) => this.send({ type: 'toast', level: 'error', message: `Save failed: ${errorMessage(err)}` }));
        break;
      }
    }
  }

  private quit(): void {
    if (!this._running) return;
    this._running = false;
    log.info('quit');
    this.shutdown();
  }

  // ── Resource actions ──

  private requireClient(): ClusterClient | null {
    if (!this.client) this.notify('error', 'No cluster connection');
    return this.client;
  }

  /** The focused selection if it is a pod, otherwise a warning toast. */
  private selectedPod(message: string): SelectedResource | null {
    const resource = this.focusedPane()?.selectedResource?.() ?? null;
    if (!resource) return null;
    if (resource.kind !== 'pods') {
      this.notify('warning', message);
      return null;
    }
    return resource;
  }

  private openDetail(list: ResourceListPane): void {
    const resource = list.selectedResource();
    if (!resource) return;
    const client = this.requireClient();
    if (!client) return;
    const { kind, name, namespace } = resource;
    const id = this.splitBeside(this.focusedId, 'horizontal');
    this.replacePane(id, new DetailPane(kind, name, namespace, this.now));
    const { paneId, seq } = this.target(id);
    client.getResource(kind, name, namespace)
      .then((object) => this.send({ type: 'resource-detail', paneId, seq, object }))
      .catch((err: unknown) => this.send({ type: 'resource-error', paneId, seq, message: errorMessage(err) }));
    this.setFocus(id);
  }

  private fetchDocument(mode: 'yaml' | 'describe'): void {
    const resource = this.focusedPane()?.selectedResource?.() ?? null;
    if (!resource) return;
    const client = this.requireClient();
    if (!client) return;
    const paneId = this.focusedId;
    const { kind, name, namespace } = resource;
    const request = mode === 'yaml'
      ? client.getResourceYaml(kind, name, namespace)
      : client.describeResource(kind, name, namespace);
    request
      .then((content) => this.send({ type: 'yaml-ready', paneId, kind, name, namespace, mode, content }))
      .catch((err: unknown) => this.send({
        type: 'toast',
        level: 'error',
        message: mode === 'yaml' ? `YAML fetch failed: ${errorMessage(err)}` : `Describe failed: ${errorMessage(err)}`,
      }));
  }

  private openDocument(event: Extract<AppEvent, { type: 'yaml-ready' }>): void {
    const beside = this.panes.has(event.paneId) ? event.paneId : this.focusedId;
    const id = this.splitBeside(beside, 'horizontal');
    this.replacePane(id, new YamlPane(event.kind, event.name, event.namespace, event.mode, event.content));
    this.setFocus(id);
  }

  private viewLogs(): void {
    const resource = this.selectedPod('Logs are only available for Pods');
    if (!resource) return;
    const client = this.requireClient();
    if (!client) return;

    const ids = this.tabs.active.paneTree.leafIds();
    const same = ids.find((id) => {
      const pane = this.panes.get(id);
      return pane instanceof LogsPane && pane.pod === resource.name && pane.namespace === resource.namespace;
    });
    if (same !== undefined) {
      this.setFocus(same);
      return;
    }

    const reuse = ids.find((id) => this.panes.get(id) instanceof LogsPane);
    const id = reuse ?? this.splitBeside(this.focusedId, 'horizontal');
    const pane = new LogsPane(resource.name, resource.namespace);
    this.replacePane(id, pane);
    const stream = new LogStream(
      client,
      { pod: resource.name, namespace: resource.namespace, follow: true, tailLines: this.config.general.logTailLines },
      this.target(id),
      this.logStreamOptions,
    );
    pane.attach(stream);
    stream.start();
    this.setFocus(id);
  }

  private saveLogs(): void {
    const pane = this.focusedPane();
    if (!(pane instanceof LogsPane)) {
      this.notify('warning', 'Save logs is only available in a Logs pane');
      return;
    }
    const lines = pane.exportLines();
    const now = new Date(this.now());
    const header = [
      `# context: ${this.client?.context ?? ''}`,
      `# namespace: ${pane.namespace}`,
      `# pod: ${pane.pod}`,
      `# exported_at: ${now.toISOString()}`,
    ];
    if (pane.filterText) header.push(`# filter: ${pane.filterText}`);
    const path = getLogExportPath(pane.pod, now);
    const content = `${header.join('\n')}\n\n${lines.join('\n')}\n`;
    this.confirm(`Save ${lines.length} lines to\n${path}?`, { type: 'save-logs', path, content });
  }

  private installTerminal(id: PaneId, view: ViewType, session: TerminalSession, size: { width: number; height: number }): void {
    this.replacePane(id, new ExecPane(view, session, {
      columns: size.width,
      rows: size.height,
      onParsed: () => this.send({ type: 'tick' }),
    }));
  }

  private execInto(): void {
    const resource = this.selectedPod('Exec is only available for Pods');
    if (!resource) return;
    const client = this.requireClient();
    if (!client) return;
    const { name, namespace } = resource;
    const id = this.splitBeside(this.focusedId, 'horizontal');
    const session = new ExecSession(client, { pod: name, namespace }, this.target(id));
    this.installTerminal(id, { type: 'exec', pod: name, namespace }, session, contentSize(this.paneRect(id)));
    session.start();
    this.setFocus(id);
    this.setMode('insert');
  }

  private openTerminal(): void {
    const id = this.splitBeside(this.focusedId, 'vertical');
    const size = contentSize(this.paneRect(id));
    const session = this.shellFactory(this.target(id), {
      shell: this.config.general.shell,
      columns: Math.max(2, size.width),
      rows: Math.max(1, size.height),
    });
    this.installTerminal(id, { type: 'terminal' }, session, size);
    this.setFocus(id);
    this.setMode('insert');
  }

  private openQuery(): void {
    const resource = this.selectedPod('Query is only available for Pods');
    if (!resource) return;
    const client = this.requireClient();
    if (!client) return;
    const { name, namespace } = resource;
    const id = this.splitBeside(this.focusedId, 'horizontal');
    const pane = new QueryPane(name, namespace);
    this.replacePane(id, pane);
    const target = this.target(id);
    client.podEnv(name, namespace)
      .then((env) => {
        if (this.panes.get(id) !== pane) return;
        const queryConfig = queryConfigFromEnv(name, namespace, env);
        const session = new QuerySession(client, queryConfig);
        const historyPath = getQueryHistoryPath(namespace, name, queryConfig.database, this.stateDir);
        pane.attach(session, QueryHistory.load(historyPath));
        session.connect(target);
      })
      .catch((err: unknown) => this.send({
        type: 'query-error',
        paneId: id,
        seq: target.seq,
        message: `Cannot read the pod environment: ${errorMessage(err)}`,
      }));
    this.setFocus(id);
  }

  private executeQuery(): void {
    const pane = this.focusedPane();
    if (!(pane instanceof QueryPane)) return;
    const sql = pane.beginExecute();
    if (sql === null) return;
    const session = pane.session;
    if (!session) {
      pane.fail('Not connected');
      return;
    }
    session.run(sql, this.target(this.focusedId));
    const history = pane.history;
    if (history) this.writeStore(() => history.append(sql, new Date(this.now())));
  }

  private copyQueryResult(all: boolean): void {
    const pane = this.focusedPane();
    if (!(pane instanceof QueryPane)) return;
    const csv = all ? pane.allRowsCsv() : pane.selectedRowCsv();
    if (csv === null) {
      this.notify('warning', all ? 'No result to copy' : 'No row selected');
      return;
    }
    const result = this.clipboard(csv);
    this.notify(result.success ? 'info' : 'error', result.message);
  }

  private exportQueryResult(pane: QueryPane, path: string): void {
    const csv = pane.allRowsCsv();
    if (csv === null) {
      this.notify('warning', 'No result to export');
      return;
    }
    const rows = pane.rowCount;
    this.writeFile(path, csv)
      .then(() => this.send({ type: 'toast', level: 'info', message: `Exported ${rows} rows to ${path}` }))
      .catch((err: unknown) => this.send({ type: 'toast', level: 'error', message: `Export failed: ${errorMessage(err)}` }));
  }

  // ── Query popups ──

  private focusedQuery(): QueryPane | null {
    const pane = this.focusedPane();
    return pane instanceof QueryPane ? pane : null;
  }

  private saved(): SavedQueries {
    this.savedQueries ??= SavedQueries.load(getSavedQueriesPath(this.stateDir));
    return this.savedQueries;
  }

  /** Runs a write to the history or saved-query file; a failure becomes an error toast. */
  private writeStore(write: () => void, done?: string): void {
    try {
      write();
      if (done) this.notify('info', done);
    } catch (err) {
      this.notify('error', `Could not save: ${errorMessage(err)}`);
    }
  }

  private openQueryHistory(): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    const history = pane.history;
    if (!history) {
      this.notify('warning', 'History is available once the pane is connected');
      return;
    }
    pane.showHistory(history.entries);
    this.setMode('query-history');
  }

  private promptSaveQuery(): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    if (!pane.editor.content.trim()) {
      this.notify('warning', 'Nothing to save');
      return;
    }
    pane.promptSaveName();
    this.setMode('save-query-name');
  }

  private openSavedQueries(): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    pane.showSaved(this.saved().entries);
    this.setMode('saved-queries');
  }

  private triggerCompletion(): void {
    const pane = this.focusedQuery();
    if (pane?.startCompletion()) this.setMode('completion');
  }

  private openExportDialog(): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    if (pane.allRowsCsv() === null) {
      this.notify('warning', 'No result to export');
      return;
    }
    pane.showExport(getQueryExportPath(pane.pod, new Date(this.now())));
    this.setMode('export-dialog');
  }

  /** Closes the popup and returns to where it was opened from. */
  private closeQueryPopup(pane: QueryPane): void {
    const back: InputMode = pane.popup?.type === 'export' ? 'query-browse' : 'query-editor';
    pane.closePopup();
    this.setMode(back);
  }

  private popupInput(char: string): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    const popup = pane.popup;
    if (popup?.type === 'saved' && popup.filter === null && popup.rename === null) {
      switch (char) {
        case 'j':
          pane.popupMove(1);
          break;
        case 'k':
          pane.popupMove(-1);
          break;
        case 'd':
          this.deletePopupEntry();
          break;
        case 'e':
          pane.startSavedRename();
          break;
        case '/':
          pane.startSavedFilter();
          break;
      }
      return;
    }
    pane.popupInput(char);
    // Completion closes itself once nothing matches.
    if (!pane.popup) this.setMode('query-editor');
  }

  private popupBackspace(): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    pane.popupBackspace();
    if (!pane.popup) this.setMode('query-editor');
  }

  private confirmPopup(): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    const popup = pane.popup;
    switch (popup?.type) {
      case 'history': {
        const selection = pane.historySelection();
        if (selection) pane.loadSql(selection[1].sql);
        this.closeQueryPopup(pane);
        break;
      }
      case 'save-name': {
        const name = popup.name.trim();
        if (!name) return;
        const sql = pane.editor.content.trim();
        this.writeStore(() => this.saved().add(name, sql, new Date(this.now())), `Saved query "${name}"`);
        this.closeQueryPopup(pane);
        break;
      }
      case 'saved': {
        const selection = pane.savedSelection();
        if (popup.rename !== null) {
          const name = popup.rename.trim();
          if (selection && name) this.writeStore(() => this.saved().rename(selection[0], name));
          pane.showSaved(this.saved().entries);
          return;
        }
        if (!selection) return;
        pane.loadSql(selection[1].sql);
        this.closeQueryPopup(pane);
        break;
      }
      case 'export': {
        const path = popup.path.trim();
        if (!path) return;
        this.exportQueryResult(pane, path);
        this.closeQueryPopup(pane);
        break;
      }
      case 'completion':
        pane.acceptCompletion();
        this.closeQueryPopup(pane);
        break;
      case undefined:
        break;
    }
  }

  private deletePopupEntry(): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    const history = pane.history;
    if (pane.popup?.type === 'history' && history) {
      const selection = pane.historySelection();
      if (!selection) return;
      this.writeStore(() => history.delete(selection[0]));
      pane.showHistory(history.entries);
    } else if (pane.popup?.type === 'saved') {
      const selection = pane.savedSelection();
      if (!selection) return;
      this.writeStore(() => this.saved().delete(selection[0]));
      pane.showSaved(this.saved().entries);
    }
  }

  /** Esc leaves a saved-query rename or filter first, then the popup. */
  private cancelPopup(): void {
    const pane = this.focusedQuery();
    if (!pane) return;
    if (pane.closeSavedSubMode()) return;
    this.closeQueryPopup(pane);
  }

  // ── Port forwarding ──

  private togglePortForward(): void {
    const resource = this.selectedPod('Port forward is only available for Pods');
    if (!resource) return;
    const client = this.requireClient();
    if (!client) return;
    const { name, namespace } = resource;

    const existing = this.forwards.find(name, namespace);
    if (existing) {
      this.forwards.stop(existing.id);
      this.notify('info', `Stopped port-forward for ${name}`);
      return;
    }

    this.selector = null;
    this.portForward = { pod: name, namespace, local: '0', remote: '', field: 'local', remoteEdited: false, error: null };
    this.setMode('port-forward-input');
    client.getResource('pods', name, namespace)
      .then((pod) => this.send({ type: 'remote-port', pod: name, namespace, port: suggestRemotePort(pod) }))
      .catch((err: unknown) => log.warn({ pod: name, namespace, err: errorMessage(err) }, 'no remote port suggestion'));
  }

  private editPort(edit: (value: string) => string): void {
    const dialog = this.portForward;
    if (!dialog) return;
    dialog[dialog.field] = edit(dialog[dialog.field]);
    if (dialog.field === 'remote') dialog.remoteEdited = true;
    dialog.error = null;
  }

  private confirmPortForward(): void {
    const dialog = this.portForward;
    if (!dialog) return;
    const parsed = parsePortInput(dialog.local, dialog.remote);
    if (!parsed.ok) {
      dialog.error = parsed.error;
      return;
    }
    this.exitMode();
    const { pod, namespace } = dialog;
    this.forwards.start(pod, namespace, parsed.local, parsed.remote)
      .then((info) => this.send({
        type: 'toast',
        level: 'info',
        message: `Forwarding ${info.pod}:${info.remotePort} -> 127.0.0.1:${info.localPort}`,
      }))
      .catch((err: unknown) => this.send({
        type: 'toast',
        level: 'error',
        message: `Port-forward failed for ${pod}: ${errorMessage(err)}`,
      }));
  }

  // ── Resource list controls ──

  private sortNextColumn(): void {
    const pane = this.focusedPane();
    if (!(pane instanceof ResourceListPane) || pane.columnCount === 0) return;
    const current = pane.sortColumn;
    const column = current === null ? 0 : (current + 1) % pane.columnCount;
    pane.handleCommand({ type: 'sort-by-column', column });
  }

  private toggleAllNamespaces(): void {
    const pane = this.focusedPane();
    if (!(pane instanceof ResourceListPane)) return;
    pane.setScope(pane.namespace, !pane.allNamespaces);
    this.watchers.bind(this.focusedId, pane.kind, pane.watchNamespace);
  }
}
