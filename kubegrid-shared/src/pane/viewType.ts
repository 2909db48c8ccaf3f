/**
 * What a pane shows. The tree only knows ids; the view lives with the pane instance.
 */

import { kindInfo } from '../cluster/resourceKinds';
import type { ResourceKind } from '../cluster/resourceKinds';

export type PluginName = 'AppLogs' | 'PortForwards';

export type ViewType =
  | { type: 'resource-list'; kind: ResourceKind }
  | { type: 'detail'; kind: ResourceKind; name: string; namespace: string }
  | { type: 'yaml'; kind: ResourceKind; name: string; namespace: string; mode: 'yaml' | 'describe' }
  | { type: 'terminal' }
  | { type: 'exec'; pod: string; namespace: string; container?: string }
  | { type: 'logs'; pod: string; namespace: string; container?: string }
  | { type: 'query'; pod: string; namespace: string }
  | { type: 'help' }
  | { type: 'empty' }
  | { type: 'plugin'; name: PluginName };

/** Short label used in pane borders and tab names. */
export function viewLabel(view: ViewType): string {
  switch (view.type) {
    case 'resource-list': return kindInfo(view.kind).displayName;
    case 'detail': return `${kindInfo(view.kind).apiKind}: ${view.name}`;
    case 'yaml': return `${view.mode === 'yaml' ? 'YAML' : 'Describe'}: ${view.name}`;
    case 'terminal': return 'Terminal';
    case 'exec': return `Exec: ${view.pod}`;
    case 'logs': return `Logs: ${view.pod}`;
    case 'query': return `Query: ${view.pod}`;
    case 'help': return 'Help';
    case 'empty': return 'Empty';
    case 'plugin': return view.name === 'AppLogs' ? 'App Logs' : 'Port Forwards';
  }
}

/** True for views whose pane consumes raw keystrokes in insert mode. */
export function isInteractiveView(view: ViewType): boolean {
  return view.type === 'terminal' || view.type === 'exec';
}
