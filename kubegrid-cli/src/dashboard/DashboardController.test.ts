import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultConfig, keyEvent } from 'kubegrid-shared';
import type {
  AppConfig,
  AppEvent,
  ClusterClient,
  ContextInfo,
  ExecIo,
  LogOptions,
  MouseInput,
  ResourceKind,
  ResourceListing,
  Subscription,
  TerminalSession,
  WatchCallbacks,
} from 'kubegrid-shared';
import type { Readable, Writable } from 'stream';
import { DashboardController } from './DashboardController';
import type { ControllerDeps } from './DashboardController';
import type { Command } from './commands';
import { ExecPane } from './panes/ExecPane';
import { HelpPane } from './panes/HelpPane';
import { LogsPane } from './panes/LogsPane';
import { QueryPane } from './panes/QueryPane';
import { ResourceListPane } from './panes/ResourceListPane';

// ── Fakes ──

const never = <T>(): Promise<T> => new Promise<T>(() => {});

class FakeCluster implements ClusterClient {
  readonly context = 'test-ctx';
  readonly namespace = 'default';
  readonly deleted: string[] = [];
  readonly restarted: string[] = [];

  contexts(): ContextInfo[] {
    return [{ name: 'test-ctx', cluster: 'test', current: true }];
  }
  withContext(): ClusterClient {
    return this;
  }
  listResources(_kind: ResourceKind, _namespace: string): Promise<ResourceListing> {
    return never();
  }
  watchResources(_kind: ResourceKind, _ns: string, _rv: string | undefined, _cb: WatchCallbacks): Promise<Subscription> {
    return never();
  }
  podContainers(): Promise<string[]> {
    return never();
  }
  streamLogs(_pod: string, _ns: string, _c: string, _o: LogOptions, _sink: Writable): Promise<Subscription> {
    return never();
  }
  exec(
    _pod: string,
    _ns: string,
    _c: string,
    _cmd: string[],
    _io: ExecIo,
    _tty: boolean,
    _onExit: (code: number | null) => void,
  ): Promise<Subscription> {
    return never();
  }
  forwardSocket(_pod: string, _ns: string, _port: number, _socket: Readable & Writable): Promise<void> {
    return never();
  }
  getResource(): Promise<unknown> {
    return never();
  }
  getResourceYaml(): Promise<string> {
    return never();
  }
  describeResource(): Promise<string> {
    return never();
  }
  async deleteResource(kind: ResourceKind, name: string, namespace: string): Promise<void> {
    this.deleted.push(`${kind}/${namespace}/${name}`);
  }
  async restartRollout(kind: ResourceKind, name: string, namespace: string): Promise<void> {
    this.restarted.push(`${kind}/${namespace}/${name}`);
  }
  listNamespaces(): Promise<string[]> {
    return never();
  }
  podEnv(): Promise<Record<string, string>> {
    return never();
  }
}

/** Reads postgres settings from the pod env; statements never complete. */
class QueryCluster extends FakeCluster {
  podEnv(): Promise<Record<string, string>> {
    return Promise.resolve({ POSTGRES_DB: 'shop', POSTGRES_USER: 'app', POSTGRES_PASSWORD: 'test-secret' });
  }
}

class FakeShell implements TerminalSession {
  exited = false;
  readonly written: string[] = [];
  write(data: string): void {
    this.written.push(data);
  }
  resize(): void {}
  stop(): void {
    this.exited = true;
  }
}

// ── Helpers ──

const POD_HEADERS = ['NAME', 'NAMESPACE', 'STATUS'];
const POD_ROWS = [
  ['web-1', 'default', 'Running'],
  ['web-2', 'default', 'Running'],
  ['web-3', 'default', 'Pending'],
  ['web-4', 'default', 'Running'],
];

function config(general: Partial<AppConfig['general']> = {}): AppConfig {
  const base = defaultConfig();
  return { ...base, general: { ...base.general, ...general } };
}

function setup(overrides: Partial<ControllerDeps> = {}) {
  const sent: AppEvent[] = [];
  const controller = new DashboardController({
    config: config({ confirmQuit: false }),
    client: null,
    send: (event) => sent.push(event),
    columns: 80,
    rows: 26,
    ...overrides,
  });
  return { controller, sent };
}

function list(controller: DashboardController, id: number): ResourceListPane {
  const pane = controller.pane(id);
  if (!(pane instanceof ResourceListPane)) throw new Error(`pane ${id} is not a resource list`);
  return pane;
}

function feed(controller: DashboardController, id: number, rows: string[][] = POD_ROWS): void {
  const seq = controller.currentSeq(id) ?? 0;
  controller.handleEvent({ type: 'resource-update', paneId: id, seq, headers: POD_HEADERS, rows });
}

function press(controller: DashboardController, key: string, mods: { ctrl?: boolean; alt?: boolean } = {}): void {
  controller.handleEvent({ type: 'key', key: keyEvent(key, mods) });
}

function mouse(type: MouseInput['type'], button: MouseInput['button'], x: number, y: number): AppEvent {
  return { type: 'mouse', mouse: { type, button, x, y, shift: false, meta: false, ctrl: false } };
}

function sorted(ids: number[]): number[] {
  return [...ids].sort((a, b) => a - b);
}

// ── Tests ──

describe('DashboardController', () => {
  it('starts with one tab holding a bound resource list', () => {
    const { controller, sent } = setup();
    expect(controller.tabNames()).toEqual(['Main']);
    expect(controller.focusedPane()?.viewType).toEqual({ type: 'resource-list', kind: 'pods' });
    expect(controller.currentSeq(1)).toBe(1);
    expect(sent).toEqual([{ type: 'resource-error', paneId: 1, seq: 1, message: 'No cluster connection' }]);
    controller.assertPaneInvariants();
  });

  it('routes pane commands to the focused pane only', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'split-vertical' });
    controller.handleCommand({ type: 'enter-resource-switcher' });
    for (const c of 'deploy') controller.handleCommand({ type: 'selector-input', char: c });
    controller.handleCommand({ type: 'selector-confirm' });
    expect(controller.pane(2)?.viewType).toEqual({ type: 'resource-list', kind: 'deployments' });

    feed(controller, 1);
    feed(controller, 2);
    controller.handleCommand({ type: 'focus-prev' });
    expect(controller.focusedId).toBe(1);
    press(controller, 'j');
    press(controller, 'j');
    press(controller, 'j');

    expect(list(controller, 1).selectedIndex).toBe(3);
    expect(list(controller, 2).selectedIndex).toBe(0);
  });

  it('drops deliveries from a superseded subscription', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'toggle-all-namespaces' });
    expect(controller.currentSeq(1)).toBe(2);

    controller.handleEvent({ type: 'resource-update', paneId: 1, seq: 1, headers: POD_HEADERS, rows: POD_ROWS });
    expect(list(controller, 1).rowCount).toBe(0);
    expect(controller.staleDropped).toBe(1);

    controller.handleEvent({ type: 'resource-update', paneId: 1, seq: 2, headers: POD_HEADERS, rows: POD_ROWS });
    expect(list(controller, 1).rowCount).toBe(4);
  });

  it('numbers rebinds of a pane 1..N', () => {
    const { controller } = setup();
    const seen = [controller.currentSeq(1)];
    for (let i = 0; i < 4; i++) {
      controller.handleCommand({ type: 'toggle-all-namespaces' });
      seen.push(controller.currentSeq(1));
    }
    expect(seen).toEqual([1, 2, 3, 4, 5]);
  });

  it('advances the seq by one per resource kind switch', () => {
    const { controller } = setup();
    const seen = [controller.currentSeq(1)];
    for (const name of ['deployments', 'services', 'configmaps']) {
      controller.handleCommand({ type: 'enter-resource-switcher' });
      for (const char of name) controller.handleCommand({ type: 'selector-input', char });
      controller.handleCommand({ type: 'selector-confirm' });
      seen.push(controller.currentSeq(1));
    }
    expect(seen).toEqual([1, 2, 3, 4]);
    expect(list(controller, 1).kind).toBe('configmaps');
  });

  it('drops deliveries addressed to a closed pane', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'split-vertical' });
    controller.handleCommand({ type: 'close-pane' });
    controller.handleEvent({ type: 'log-lines', paneId: 2, seq: 1, lines: ['late'] });
    expect(controller.staleDropped).toBe(1);
    expect(controller.pane(2)).toBeUndefined();
  });

  it('keeps the pane map equal to the leaves through splits and closes', () => {
    const { controller } = setup();
    const steps: Command[] = [
      { type: 'split-vertical' },
      { type: 'split-horizontal' },
      { type: 'focus-next' },
      { type: 'split-vertical' },
      { type: 'close-pane' },
      { type: 'focus-direction', direction: 'left' },
      { type: 'split-horizontal' },
      { type: 'new-tab' },
      { type: 'split-vertical' },
      { type: 'prev-tab' },
      { type: 'close-pane' },
      { type: 'close-pane' },
      { type: 'toggle-fullscreen' },
      { type: 'split-horizontal' },
    ];
    for (const step of steps) {
      controller.handleCommand(step);
      expect(() => controller.assertPaneInvariants()).not.toThrow();
    }
    expect(controller.tabCount).toBe(2);
    expect(sorted(controller.activeTab.paneTree.leafIds())).toEqual(sorted(controller.paneIds().filter(
      (id) => controller.activeTab.paneTree.contains(id),
    )));
  });

  it('collapses a split when one side closes', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'split-vertical' });
    expect(controller.paneLayout().map(([id]) => id)).toEqual([1, 2]);
    controller.handleCommand({ type: 'close-pane' });
    expect(controller.focusedId).toBe(1);
    expect(controller.paneLayout()).toEqual([[1, { x: 0, y: 1, width: 80, height: 24 }]]);
  });

  it('empties the last pane of the last tab instead of removing it', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'close-pane' });
    expect(controller.paneIds()).toEqual([1]);
    expect(controller.focusedPane()?.viewType).toEqual({ type: 'empty' });
    expect(controller.currentSeq(1)).toBe(2);
  });

  it('closes a tab whose last pane closes while other tabs remain', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'new-tab' });
    expect(controller.tabNames()).toEqual(['Main', 'Tab 2']);
    controller.handleCommand({ type: 'close-pane' });
    expect(controller.tabNames()).toEqual(['Main']);
    expect(controller.paneIds()).toEqual([1]);
  });

  it('replaces the only tab with a fresh Main tab when it is closed', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'split-vertical' });
    controller.handleCommand({ type: 'close-tab' });
    expect(controller.tabCount).toBe(1);
    expect(controller.paneIds()).toEqual([3]);
    expect(controller.focusedPane()?.viewType).toEqual({ type: 'resource-list', kind: 'pods' });
  });

  it('moves focus by direction across a stacked column', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'split-vertical' });
    controller.handleCommand({ type: 'focus-prev' });
    controller.handleCommand({ type: 'split-horizontal' });
    expect(controller.paneLayout()).toEqual([
      [1, { x: 0, y: 1, width: 40, height: 12 }],
      [3, { x: 0, y: 13, width: 40, height: 12 }],
      [2, { x: 40, y: 1, width: 40, height: 24 }],
    ]);

    controller.handleCommand({ type: 'focus-direction', direction: 'right' });
    expect(controller.focusedId).toBe(2);
    controller.handleCommand({ type: 'focus-direction', direction: 'left' });
    expect(controller.focusedId).toBe(1);
    controller.handleCommand({ type: 'focus-direction', direction: 'down' });
    expect(controller.focusedId).toBe(3);
    controller.handleCommand({ type: 'focus-direction', direction: 'down' });
    expect(controller.focusedId).toBe(3);
  });

  it('ignores directional focus while a pane is fullscreen', () => {
    const { controller } = setup();
    controller.handleCommand({ type: 'split-vertical' });
    controller.handleCommand({ type: 'toggle-fullscreen' });
    controller.handleCommand({ type: 'focus-direction', direction: 'left' });
    expect(controller.focusedId).toBe(2);
    expect(controller.paneLayout()).toEqual([[2, { x: 0, y: 1, width: 80, height: 24 }]]);
  });

  describe('quit', () => {
    it('quits at once when confirmation is off', () => {
      const { controller } = setup();
      press(controller, 'q', { ctrl: true });
      expect(controller.running).toBe(false);
    });

    it('asks first when confirmation is on', () => {
      const { controller } = setup({ config: config({ confirmQuit: true }) });
      press(controller, 'q', { ctrl: true });
      expect(controller.mode).toBe('confirm-dialog');
      expect(controller.view().overlay).toEqual({ type: 'confirm', message: 'Quit kubegrid?' });

      press(controller, 'n');
      expect(controller.mode).toBe('normal');
      expect(controller.running).toBe(true);

      press(controller, 'q', { ctrl: true });
      press(controller, 'y');
      expect(controller.running).toBe(false);
    });

    it('resolves before pane bindings in result browsing', () => {
      const { controller } = setup({ client: new FakeCluster() });
      feed(controller, 1);
      controller.handleCommand({ type: 'open-query' });
      expect(controller.mode).toBe('query-editor');
      controller.handleCommand({ type: 'enter-mode', mode: 'query-browse' });
      press(controller, 'q', { ctrl: true });
      expect(controller.running).toBe(false);
    });
  });

  describe('mouse', () => {
    it('focuses the pane under a left click', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'split-vertical' });
      controller.handleEvent(mouse('click', 'left', 10, 5));
      expect(controller.focusedId).toBe(1);
    });

    it('closes the pane under a middle click', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'split-vertical' });
      controller.handleEvent(mouse('click', 'middle', 60, 5));
      expect(controller.paneIds()).toEqual([1]);
    });

    it('switches tabs from the tab bar', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'new-tab' });
      controller.handleEvent(mouse('click', 'left', 2, 0));
      expect(controller.activeTab.name).toBe('Main');
      controller.handleEvent(mouse('click', 'left', 9, 0));
      expect(controller.activeTab.name).toBe('Main');
      controller.handleEvent(mouse('click', 'left', 12, 0));
      expect(controller.activeTab.name).toBe('Tab 2');
    });

    it('scrolls the pane under the pointer', () => {
      const { controller } = setup();
      feed(controller, 1);
      controller.handleCommand({ type: 'split-vertical' });
      controller.handleEvent(mouse('scroll-down', 'none', 5, 5));
      expect(list(controller, 1).selectedIndex).toBe(1);
      expect(controller.focusedId).toBe(2);
    });

    it('is ignored while a dialog is open', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'split-vertical' });
      controller.handleCommand({ type: 'enter-mode', mode: 'namespace-selector' });
      controller.handleEvent(mouse('click', 'left', 10, 5));
      expect(controller.focusedId).toBe(2);
    });
  });

  describe('selectors and filter', () => {
    it('switches every list in the tab to all namespaces', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'enter-mode', mode: 'namespace-selector' });
      controller.handleEvent({ type: 'namespaces', namespaces: ['default', 'payments'] });
      expect(controller.view().overlay).toEqual({
        type: 'selector',
        title: 'Namespace',
        filter: '',
        items: ['All Namespaces', 'default', 'payments'],
        selected: 0,
      });
      controller.handleCommand({ type: 'selector-confirm' });
      expect(controller.mode).toBe('normal');
      expect(controller.currentNamespace).toBe('');
      expect(list(controller, 1).allNamespaces).toBe(true);
      expect(controller.currentSeq(1)).toBe(2);
    });

    it('narrows the namespace list while typing', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'enter-mode', mode: 'namespace-selector' });
      controller.handleEvent({ type: 'namespaces', namespaces: ['default', 'payments'] });
      for (const c of 'pay') controller.handleCommand({ type: 'selector-input', char: c });
      controller.handleCommand({ type: 'selector-confirm' });
      expect(controller.currentNamespace).toBe('payments');
      expect(list(controller, 1).namespace).toBe('payments');
    });

    it('edits the focused list filter and clears it on cancel', () => {
      const { controller } = setup();
      feed(controller, 1);
      press(controller, '/');
      expect(controller.mode).toBe('filter-input');
      press(controller, 'p');
      press(controller, 'e');
      expect(list(controller, 1).filterText).toBe('pe');
      expect(list(controller, 1).rowCount).toBe(1);
      press(controller, 'backspace');
      expect(list(controller, 1).filterText).toBe('p');
      press(controller, 'esc');
      expect(controller.mode).toBe('normal');
      expect(list(controller, 1).filterText).toBe('');
    });
  });

  describe('resource actions', () => {
    it('reports a missing cluster connection', () => {
      const { controller } = setup();
      feed(controller, 1);
      controller.handleCommand({ type: 'view-logs' });
      expect(controller.toasts.map((t) => [t.level, t.message])).toEqual([['error', 'No cluster connection']]);
    });

    it('asks before deleting and deletes the captured selection', async () => {
      const cluster = new FakeCluster();
      const { controller, sent } = setup({ client: cluster });
      feed(controller, 1);
      press(controller, 'j');
      press(controller, 'd', { ctrl: true });
      expect(controller.view().overlay).toEqual({ type: 'confirm', message: 'Delete Pod web-2\nin namespace default?' });
      press(controller, 'y');
      expect(controller.mode).toBe('normal');
      await vi.waitFor(() => expect(sent).toContainEqual({ type: 'toast', level: 'info', message: 'Deleted Pod web-2' }));
      expect(cluster.deleted).toEqual(['pods/default/web-2']);
    });

    it('refuses to restart anything but a deployment', () => {
      const { controller } = setup({ client: new FakeCluster() });
      feed(controller, 1);
      press(controller, 'r', { ctrl: true });
      expect(controller.mode).toBe('normal');
      expect(controller.toasts[0].message).toBe('Restart rollout is only available for Deployments');
    });

    it('opens logs beside the list and focuses an existing logs pane for the same pod', () => {
      const { controller } = setup({ client: new FakeCluster() });
      feed(controller, 1);
      controller.handleCommand({ type: 'view-logs' });
      expect(controller.focusedId).toBe(2);
      expect(controller.focusedPane()).toBeInstanceOf(LogsPane);
      expect(controller.paneLayout().map(([, r]) => r.height)).toEqual([12, 12]);

      controller.handleCommand({ type: 'focus-prev' });
      controller.handleCommand({ type: 'view-logs' });
      expect(controller.focusedId).toBe(2);
      expect(controller.paneIds()).toEqual([1, 2]);
    });

    it('reuses the logs pane of the tab for another pod', () => {
      const { controller } = setup({ client: new FakeCluster() });
      feed(controller, 1);
      controller.handleCommand({ type: 'view-logs' });
      const firstSeq = controller.currentSeq(2) ?? 0;
      controller.handleCommand({ type: 'focus-prev' });
      press(controller, 'j');
      controller.handleCommand({ type: 'view-logs' });
      expect(controller.paneIds()).toEqual([1, 2]);
      expect(controller.focusedPane()?.viewType).toEqual({ type: 'logs', pod: 'web-2', namespace: 'default', container: undefined });
      expect(controller.currentSeq(2)).toBeGreaterThan(firstSeq);
    });

    it('keeps log export for logs panes only', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'save-logs' });
      expect(controller.toasts[0].message).toBe('Save logs is only available in a Logs pane');
    });

    it('writes saved logs with a header after confirmation', async () => {
      const written: Array<[string, string]> = [];
      const { controller } = setup({
        client: new FakeCluster(),
        now: () => Date.parse('2024-05-01T10:22:03.000Z'),
        writeFile: async (path, content) => {
          written.push([path, content]);
        },
      });
      feed(controller, 1);
      controller.handleCommand({ type: 'view-logs' });
      controller.handleEvent({ type: 'log-lines', paneId: 2, seq: controller.currentSeq(2) ?? 0, lines: ['a', 'b'] });
      controller.handleCommand({ type: 'save-logs' });
      expect(controller.mode).toBe('confirm-dialog');
      controller.handleCommand({ type: 'confirm-action' });
      await vi.waitFor(() => expect(written).toHaveLength(1));
      expect(written[0][0]).toMatch(/web-1-2024-05-01T10-22-03\.log$/);
      expect(written[0][1]).toBe(
        '# context: test-ctx\n# namespace: default\n# pod: web-1\n# exported_at: 2024-05-01T10:22:03.000Z\n\na\nb\n',
      );
    });
  });

  describe('sessions', () => {
    it('enters insert mode in a new exec pane and closes it on a clean exit', () => {
      const { controller } = setup({ client: new FakeCluster() });
      feed(controller, 1);
      press(controller, 'e');
      expect(controller.focusedPane()).toBeInstanceOf(ExecPane);
      expect(controller.mode).toBe('insert');

      controller.handleEvent({ type: 'session-exited', paneId: 2, seq: controller.currentSeq(2) ?? 0, code: 0 });
      expect(controller.paneIds()).toEqual([1]);
      expect(controller.mode).toBe('normal');
    });

    it('keeps a failed session open and leaves insert mode', () => {
      const { controller } = setup({ client: new FakeCluster() });
      feed(controller, 1);
      controller.handleCommand({ type: 'exec-into' });
      controller.handleEvent({ type: 'session-exited', paneId: 2, seq: controller.currentSeq(2) ?? 0, code: 137 });
      expect(controller.paneIds()).toEqual([1, 2]);
      expect(controller.mode).toBe('normal');
    });

    it('forwards typed keys to the terminal in insert mode', () => {
      const shell = new FakeShell();
      const { controller } = setup({ shellFactory: () => shell });
      controller.handleCommand({ type: 'open-terminal' });
      expect(controller.mode).toBe('insert');
      press(controller, 'l');
      press(controller, 's');
      press(controller, 'enter');
      expect(shell.written).toEqual(['l', 's', '\r']);
      press(controller, 'esc');
      expect(controller.mode).toBe('normal');
    });

    it('walks the port-forward dialog', () => {
      const { controller } = setup({ client: new FakeCluster() });
      feed(controller, 1);
      press(controller, 'p');
      expect(controller.mode).toBe('port-forward-input');
      controller.handleEvent({ type: 'remote-port', pod: 'web-1', namespace: 'default', port: 8080 });
      press(controller, '9');
      expect(controller.view().overlay).toEqual({
        type: 'port-forward',
        pod: 'web-1',
        local: '9',
        remote: '8080',
        field: 'local',
        error: null,
      });

      press(controller, 'tab');
      for (let i = 0; i < 4; i++) press(controller, 'backspace');
      press(controller, 'enter');
      expect(controller.mode).toBe('port-forward-input');
      expect(controller.view().overlay).toMatchObject({ remote: '', error: 'Remote port must be 1-65535' });

      press(controller, 'esc');
      expect(controller.mode).toBe('normal');
      expect(controller.view().overlay).toBeNull();
    });
  });

  describe('views and tabs', () => {
    it('toggles the help pane beside the focused pane', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'show-help' });
      expect(controller.focusedPane()).toBeInstanceOf(HelpPane);
      controller.handleCommand({ type: 'show-help' });
      expect(controller.paneIds()).toEqual([1]);
    });

    it('toggles the app logs tab', () => {
      const { controller } = setup();
      controller.handleCommand({ type: 'toggle-app-logs' });
      expect(controller.tabNames()).toEqual(['Main', 'App Logs']);
      expect(controller.activeTab.name).toBe('App Logs');
      controller.handleCommand({ type: 'goto-tab', index: 0 });
      controller.handleCommand({ type: 'toggle-app-logs' });
      expect(controller.activeTab.name).toBe('App Logs');
      controller.handleCommand({ type: 'toggle-app-logs' });
      expect(controller.tabNames()).toEqual(['Main']);
    });

    it('cycles the sort column of the focused list', () => {
      const { controller } = setup();
      feed(controller, 1);
      const pane = list(controller, 1);
      controller.handleCommand({ type: 'sort-column' });
      expect(pane.sortColumn).toBe(0);
      controller.handleCommand({ type: 'sort-column' });
      controller.handleCommand({ type: 'sort-column' });
      controller.handleCommand({ type: 'sort-column' });
      expect(pane.sortColumn).toBe(0);
    });

    it('expires toasts on tick', () => {
      let now = 1_000;
      const { controller } = setup({ now: () => now });
      controller.handleEvent({ type: 'toast', level: 'info', message: 'hello' });
      controller.handleEvent({ type: 'tick' });
      expect(controller.toasts).toHaveLength(1);
      now += 3_000;
      controller.handleEvent({ type: 'tick' });
      expect(controller.toasts).toHaveLength(0);
    });

    it('reports a too-small terminal without rendering panes', () => {
      const { controller } = setup();
      controller.handleEvent({ type: 'resize', columns: 39, rows: 20 });
      const view = controller.view();
      expect(view.tooSmall).toBe(true);
      expect(view.panes).toEqual([]);
    });
  });
});

describe('query pane popups', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kubegrid-state-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function queryPane(controller: DashboardController, id: number): QueryPane {
    const pane = controller.pane(id);
    if (!(pane instanceof QueryPane)) throw new Error(`pane ${id} is not a query pane`);
    return pane;
  }

  function typeKeys(controller: DashboardController, text: string): void {
    for (const c of text) press(controller, c);
  }

  function readJson(file: string): unknown {
    return JSON.parse(fs.readFileSync(path.join(dir, file), 'utf-8'));
  }

  /** Opens a query pane on web-1 and answers the connection check. */
  async function connected(overrides: Partial<ControllerDeps> = {}) {
    const harness = setup({ client: new QueryCluster(), stateDir: dir, ...overrides });
    const { controller } = harness;
    feed(controller, 1);
    controller.handleCommand({ type: 'open-query' });
    const query = queryPane(controller, 2);
    await vi.waitFor(() => expect(query.history).not.toBeNull());
    controller.handleEvent({
      type: 'query-result',
      paneId: 2,
      seq: controller.currentSeq(2) ?? 0,
      result: { columns: ['version'], rows: [['PostgreSQL 16.2']] },
    });
    return { ...harness, query };
  }

  it('records run statements and loads one back from the history popup', async () => {
    const { controller, query } = await connected();
    typeKeys(controller, 'select 1');
    press(controller, 'enter', { ctrl: true });
    expect(readJson('query_history/default__web-1__shop.json')).toEqual([
      { sql: 'select 1', ts: expect.any(String) },
    ]);

    press(controller, 'x');
    press(controller, 'r', { ctrl: true });
    expect(controller.mode).toBe('query-history');
    expect(query.popup?.type).toBe('history');

    press(controller, 'enter');
    expect(controller.mode).toBe('query-editor');
    expect(query.popup).toBeNull();
    expect(query.editor.content).toBe('select 1');
  });

  it('deletes history entries from the popup', async () => {
    const { controller, query } = await connected();
    typeKeys(controller, 'select 1');
    press(controller, 'enter', { ctrl: true });
    press(controller, 'r', { ctrl: true });
    press(controller, 'd');
    expect(query.history?.entries).toEqual([]);
    expect(readJson('query_history/default__web-1__shop.json')).toEqual([]);
    press(controller, 'esc');
    expect(controller.mode).toBe('query-editor');
  });

  it('saves, renames, filters and deletes saved queries', () => {
    const { controller } = setup({ client: new FakeCluster(), stateDir: dir });
    feed(controller, 1);
    controller.handleCommand({ type: 'open-query' });
    const query = queryPane(controller, 2);

    typeKeys(controller, 'select 2');
    press(controller, 's', { ctrl: true });
    expect(controller.mode).toBe('save-query-name');
    typeKeys(controller, 'two');
    press(controller, 'enter');
    expect(controller.mode).toBe('query-editor');
    expect(readJson('saved_queries.json')).toEqual([{ name: 'two', sql: 'select 2', ts: expect.any(String) }]);
    expect(controller.toasts.map((t) => t.message)).toEqual(['Saved query "two"']);

    press(controller, 'o', { ctrl: true });
    expect(controller.mode).toBe('saved-queries');
    press(controller, 'e');
    for (let i = 0; i < 3; i++) press(controller, 'backspace');
    typeKeys(controller, 'pair');
    press(controller, 'enter');
    expect(readJson('saved_queries.json')).toEqual([{ name: 'pair', sql: 'select 2', ts: expect.any(String) }]);

    press(controller, '/');
    press(controller, 'z');
    expect(query.savedSelection()).toBeNull();
    press(controller, 'esc');
    expect(controller.mode).toBe('saved-queries');
    expect(query.savedSelection()?.[1].name).toBe('pair');

    press(controller, 'd');
    expect(readJson('saved_queries.json')).toEqual([]);
    press(controller, 'esc');
    expect(controller.mode).toBe('query-editor');
  });

  it('loads a saved query into the editor', () => {
    fs.writeFileSync(path.join(dir, 'saved_queries.json'), JSON.stringify([
      { name: 'active', sql: 'select * from users where active', ts: '2026-03-01T10:00:00.000Z' },
      { name: 'orders', sql: 'select * from orders', ts: '2026-03-01T10:00:00.000Z' },
    ]));
    const { controller } = setup({ client: new FakeCluster(), stateDir: dir });
    feed(controller, 1);
    controller.handleCommand({ type: 'open-query' });

    press(controller, 'o', { ctrl: true });
    press(controller, 'j');
    press(controller, 'enter');
    expect(controller.mode).toBe('query-editor');
    expect(queryPane(controller, 2).editor.content).toBe('select * from orders');
  });

  it('completes table names from the loaded schema', async () => {
    const { controller, query } = await connected();
    controller.handleEvent({
      type: 'query-schema',
      paneId: 2,
      seq: controller.currentSeq(2) ?? 0,
      schema: { tables: ['users', 'orders'], columns: { users: ['id'], orders: ['id'] } },
    });
    typeKeys(controller, 'select * from us');
    press(controller, ' ', { ctrl: true });
    expect(controller.mode).toBe('completion');
    expect(query.popup).toEqual({ type: 'completion', items: ['users'], selected: 0, prefix: 'us' });

    press(controller, 'tab');
    expect(controller.mode).toBe('query-editor');
    expect(query.editor.content).toBe('select * from users');
  });

  it('closes the completion list once typing leaves no match', async () => {
    const { controller, query } = await connected();
    controller.handleEvent({
      type: 'query-schema',
      paneId: 2,
      seq: controller.currentSeq(2) ?? 0,
      schema: { tables: ['orders'], columns: {} },
    });
    typeKeys(controller, 'select * from o');
    press(controller, ' ', { ctrl: true });
    press(controller, 'x');
    expect(controller.mode).toBe('query-editor');
    expect(query.popup).toBeNull();
    expect(query.editor.content).toBe('select * from ox');
  });

  it('exports the result to the path typed in the dialog', async () => {
    const writes: Array<[string, string]> = [];
    const { controller, query } = await connected({
      writeFile: async (file, content) => {
        writes.push([file, content]);
      },
    });
    typeKeys(controller, 'select 1 as n');
    press(controller, 'enter', { ctrl: true });
    controller.handleEvent({
      type: 'query-result',
      paneId: 2,
      seq: controller.currentSeq(2) ?? 0,
      result: { columns: ['n'], rows: [['1']] },
    });
    press(controller, 'down', { ctrl: true });
    press(controller, 'E');
    expect(controller.mode).toBe('export-dialog');

    while (query.popup?.type === 'export' && query.popup.path) press(controller, 'backspace');
    typeKeys(controller, '/tmp/out.csv');
    press(controller, 'enter');
    expect(controller.mode).toBe('query-browse');
    await vi.waitFor(() => expect(writes).toEqual([['/tmp/out.csv', 'n\n1\n']]));
  });
});
