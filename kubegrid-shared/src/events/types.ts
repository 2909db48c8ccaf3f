/**
 * Events consumed by the dashboard's control loop.
 *
 * Every delivery produced by a background task on behalf of a pane carries
 * the pane id and the sequence number of the subscription that produced it,
 * so the consumer can discard deliveries from superseded subscriptions.
 */

import type { ResourceKind } from '../cluster/resourceKinds';
import type { PaneId } from '../pane/types';

export interface KeyEvent {
  /** Named key (`enter`, `esc`, `up`, `f2`, ...) or a single character. */
  key: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

export interface MouseInput {
  type: 'click' | 'release' | 'drag' | 'scroll-up' | 'scroll-down';
  button: 'left' | 'middle' | 'right' | 'none';
  /** 0-based column */
  x: number;
  /** 0-based row */
  y: number;
  shift: boolean;
  meta: boolean;
  ctrl: boolean;
}

export type ToastLevel = 'info' | 'warning' | 'error';

export interface QueryResult {
  columns: string[];
  rows: string[][];
  /** Command tag or notice printed instead of rows (e.g. `UPDATE 3`). */
  notice?: string;
}

/** Tables and their columns, in ordinal order, for SQL completion. */
export interface QuerySchema {
  tables: string[];
  columns: Record<string, string[]>;
}

export interface PortForwardInfo {
  id: number;
  pod: string;
  namespace: string;
  localPort: number;
  remotePort: number;
  startedAt: number;
}

export type AppEvent =
  | { type: 'key'; key: KeyEvent }
  | { type: 'mouse'; mouse: MouseInput }
  | { type: 'tick' }
  | { type: 'resize'; columns: number; rows: number }
  | { type: 'resource-update'; paneId: PaneId; seq: number; headers: string[]; rows: string[][] }
  | { type: 'resource-error'; paneId: PaneId; seq: number; message: string }
  | { type: 'resource-detail'; paneId: PaneId; seq: number; object: unknown }
  | { type: 'session-output'; paneId: PaneId; seq: number; data: string }
  | { type: 'session-exited'; paneId: PaneId; seq: number; code: number | null }
  | { type: 'log-lines'; paneId: PaneId; seq: number; lines: string[] }
  | { type: 'log-error'; paneId: PaneId; seq: number; message: string }
  | { type: 'query-result'; paneId: PaneId; seq: number; result: QueryResult }
  | { type: 'query-error'; paneId: PaneId; seq: number; message: string }
  | { type: 'query-schema'; paneId: PaneId; seq: number; schema: QuerySchema }
  | {
    type: 'yaml-ready';
    /** Pane the request came from; the document opens beside it. */
    paneId: PaneId;
    kind: ResourceKind;
    name: string;
    namespace: string;
    mode: 'yaml' | 'describe';
    content: string;
  }
  | { type: 'namespaces'; namespaces: string[] }
  | { type: 'context-switched'; context: string; namespace: string; namespaces: string[] }
  | { type: 'context-switch-failed'; context: string; message: string }
  /** Port suggested for the port-forward dialog once the pod spec has been read. */
  | { type: 'remote-port'; pod: string; namespace: string; port: number }
  | { type: 'port-forward-started'; forward: PortForwardInfo }
  | { type: 'port-forward-stopped'; id: number; reason?: string }
  | { type: 'toast'; level: ToastLevel; message: string };

/** Deliveries addressed to a pane by a sequenced producer. */
export type PaneDelivery = Extract<AppEvent, { seq: number }>;

export function isPaneDelivery(event: AppEvent): event is PaneDelivery {
  return 'seq' in event;
}
