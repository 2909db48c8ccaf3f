/**
 * Owns the resource subscription of every pane and the per-pane sequence
 * numbers that tag background deliveries.
 *
 * Rebinding a pane bumps its sequence, so anything still in flight from the
 * previous subscription no longer passes `isCurrent` and is dropped by the
 * consumer. Session producers (logs, exec, query) draw from the same counter
 * through `nextSeq`.
 */

import { isNamespaced } from '../cluster/resourceKinds';
import type { ResourceKind } from '../cluster/resourceKinds';
import type { ResourceSource } from '../cluster/types';
import type { AppEvent, PaneDelivery } from '../events/types';
import { getLogger } from '../logging/logger';
import type { PaneId } from '../pane/types';
import { ResourceInformer } from './ResourceInformer';
import type { InformerOptions } from './ResourceInformer';

const log = getLogger('watcher');

export interface WatcherHandle {
  seq: number;
  kind: ResourceKind;
  namespace: string;
  stop(): void;
}

export interface WatcherManagerOptions {
  source: ResourceSource | null;
  send: (event: AppEvent) => void;
  informer?: InformerOptions;
}

export class WatcherManager {
  private readonly handles = new Map<PaneId, WatcherHandle>();
  private readonly seqs = new Map<PaneId, number>();
  private source: ResourceSource | null;
  private readonly send: (event: AppEvent) => void;
  private readonly informerOptions: InformerOptions;
  private dropped = 0;

  constructor(options: WatcherManagerOptions) {
    this.source = options.source;
    this.send = options.send;
    this.informerOptions = options.informer ?? {};
  }

  /** Stale deliveries discarded so far. */
  get staleDropped(): number {
    return this.dropped;
  }

  /** Swap the cluster connection. Existing bindings are left to the caller to rebind. */
  setSource(source: ResourceSource | null): void {
    this.source = source;
  }

  handle(paneId: PaneId): WatcherHandle | undefined {
    return this.handles.get(paneId);
  }

  currentSeq(paneId: PaneId): number | undefined {
    return this.seqs.get(paneId);
  }

  /** Advance and return the pane's sequence number. */
  nextSeq(paneId: PaneId): number {
    const seq = (this.seqs.get(paneId) ?? 0) + 1;
    this.seqs.set(paneId, seq);
    return seq;
  }

  bind(paneId: PaneId, kind: ResourceKind, namespace: string): number {
    this.stopHandle(paneId);
    const seq = this.nextSeq(paneId);
    const ns = isNamespaced(kind) ? namespace : '';
    const source = this.source;

    if (!source) {
      this.send({ type: 'resource-error', paneId, seq, message: 'No cluster connection' });
      return seq;
    }

    const informer = new ResourceInformer(
      source,
      kind,
      ns,
      {
        onSnapshot: (headers, rows) => {
          this.send({ type: 'resource-update', paneId, seq, headers, rows: rows.map((row) => row.cells) });
        },
        onError: (message) => {
          this.send({ type: 'resource-error', paneId, seq, message });
        },
        onGiveUp: (error) => {
          log.error({ paneId, seq, kind, namespace: ns, attempts: error.attempts, err: error.cause }, error.message);
          this.send({ type: 'resource-error', paneId, seq, message: error.message });
        },
      },
      this.informerOptions,
    );

    this.handles.set(paneId, { seq, kind, namespace: ns, stop: () => informer.stop() });
    log.debug({ paneId, seq, kind, namespace: ns }, 'bind');
    informer.start();
    return seq;
  }

  /** Stop the pane's subscription but keep it addressable; in-flight deliveries go stale. */
  release(paneId: PaneId): void {
    this.stopHandle(paneId);
    if (this.seqs.has(paneId)) this.nextSeq(paneId);
  }

  /** Forget the pane entirely (it is being closed). */
  unbind(paneId: PaneId): void {
    this.stopHandle(paneId);
    this.seqs.delete(paneId);
  }

  isCurrent(paneId: PaneId, seq: number): boolean {
    return this.seqs.get(paneId) === seq;
  }

  /** Delivery filter: true if the event should reach its pane. */
  accept(event: PaneDelivery): boolean {
    if (this.isCurrent(event.paneId, event.seq)) return true;
    this.dropped++;
    log.debug({ paneId: event.paneId, seq: event.seq, type: event.type }, 'stale delivery dropped');
    return false;
  }

  boundPanes(): PaneId[] {
    return [...this.handles.keys()];
  }

  stopAll(): void {
    for (const handle of this.handles.values()) handle.stop();
    this.handles.clear();
  }

  private stopHandle(paneId: PaneId): void {
    const handle = this.handles.get(paneId);
    if (!handle) return;
    handle.stop();
    this.handles.delete(paneId);
  }
}
