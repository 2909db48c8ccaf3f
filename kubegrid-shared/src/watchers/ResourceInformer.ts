/**
 * List-then-watch cache of one resource collection.
 *
 * Keeps a map keyed by `namespace/name` and emits the full, sorted table
 * after every change. A failed list or watch resubscribes with exponential
 * backoff; after too many consecutive failures the informer gives up and
 * reports a terminal error.
 */

import { SubscriptionFailedError, errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import { dig, objectKey, str } from '../cluster/objects';
import { headersFor, summarizeAll } from '../cluster/summarize';
import type { ResourceRow } from '../cluster/summarize';
import type { ResourceKind } from '../cluster/resourceKinds';
import type { ResourceSource, Subscription, WatchEventType } from '../cluster/types';

const log = getLogger('informer');

export interface InformerCallbacks {
  onSnapshot: (headers: string[], rows: ResourceRow[]) => void;
  /** A failure that will be retried. */
  onError: (message: string) => void;
  /** The informer stopped and will not retry. */
  onGiveUp: (error: SubscriptionFailedError) => void;
}

export interface InformerOptions {
  /** Trailing throttle for snapshots after the first; 0 emits synchronously. */
  throttleMs?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  /** Consecutive failures tolerated before giving up. */
  maxFailures?: number;
  now?: () => number;
}

const DEFAULTS = {
  throttleMs: 100,
  initialBackoffMs: 500,
  maxBackoffMs: 10_000,
  maxFailures: 5,
};

export class ResourceInformer {
  private readonly cache = new Map<string, unknown>();
  private readonly opts: Required<InformerOptions>;
  private subscription: Subscription | null = null;
  private emitTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;
  private failures = 0;
  private stopped = false;
  private started = false;

  constructor(
    private readonly source: ResourceSource,
    readonly kind: ResourceKind,
    readonly namespace: string,
    private readonly callbacks: InformerCallbacks,
    options: InformerOptions = {},
  ) {
    this.opts = { ...DEFAULTS, now: Date.now, ...options };
  }

  get isActive(): boolean {
    return this.started && !this.stopped;
  }

  get size(): number {
    return this.cache.size;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.run().catch((err: unknown) => {
      log.error({ err, kind: this.kind }, 'informer loop crashed');
      this.stopped = true;
      this.callbacks.onGiveUp(new SubscriptionFailedError(errorMessage(err), this.failures, { cause: err }));
    });
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.subscription?.stop();
    this.subscription = null;
    if (this.emitTimer) clearTimeout(this.emitTimer);
    this.emitTimer = null;
    this.wake?.();
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      try {
        const listing = await this.source.listResources(this.kind, this.namespace);
        if (this.stopped) return;
        this.cache.clear();
        for (const item of listing.items) this.cache.set(objectKey(item), item);
        this.failures = 0;
        this.emitNow();

        await this.watchUntilClosed(listing.resourceVersion);
        log.debug({ kind: this.kind, namespace: this.namespace }, 'watch closed, resubscribing');
      } catch (err) {
        if (this.stopped) return;
        this.failures++;
        const message = errorMessage(err);
        log.warn({ kind: this.kind, namespace: this.namespace, failures: this.failures, err: message }, 'watch failed');
        if (this.failures >= this.opts.maxFailures) {
          this.stopped = true;
          this.callbacks.onGiveUp(
            new SubscriptionFailedError(`${message} (gave up after ${this.failures} attempts)`, this.failures, {
              cause: err,
            }),
          );
          return;
        }
        this.callbacks.onError(message);
        await this.sleep(this.backoffMs());
      }
    }
  }

  private backoffMs(): number {
    return Math.min(this.opts.maxBackoffMs, this.opts.initialBackoffMs * 2 ** (this.failures - 1));
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private watchUntilClosed(resourceVersion: string | undefined): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const finish = (err: unknown): void => {
        if (settled) return;
        settled = true;
        this.subscription?.stop();
        this.subscription = null;
        if (err) reject(err instanceof Error ? err : new Error(errorMessage(err)));
        else resolve();
      };

      this.source
        .watchResources(this.kind, this.namespace, resourceVersion, {
          onEvent: (type, object) => {
            if (settled || this.stopped) return;
            if (type === 'ERROR') {
              finish(new Error(str(dig(object, 'message'), 'watch error')));
              return;
            }
            this.apply(type, object);
          },
          onDone: (err) => finish(err),
        })
        .then((subscription) => {
          if (settled || this.stopped) subscription.stop();
          else this.subscription = subscription;
        }, finish);
    });
  }

  private apply(type: Exclude<WatchEventType, 'ERROR'>, object: unknown): void {
    this.failures = 0;
    if (type === 'BOOKMARK') return;
    const key = objectKey(object);
    if (type === 'DELETED') this.cache.delete(key);
    else this.cache.set(key, object);
    this.scheduleEmit();
  }

  private scheduleEmit(): void {
    if (this.opts.throttleMs <= 0) {
      this.emitNow();
      return;
    }
    if (this.emitTimer) return;
    this.emitTimer = setTimeout(() => {
      this.emitTimer = null;
      if (!this.stopped) this.emitNow();
    }, this.opts.throttleMs);
  }

  private emitNow(): void {
    const rows = summarizeAll(this.kind, this.cache.values(), this.opts.now());
    this.callbacks.onSnapshot(headersFor(this.kind), rows);
  }
}
