/**
 * Error taxonomy shared by the core and the application shell.
 *
 * Data-plane failures (a watch that dies, an exec that cannot attach) are
 * reported as pane-local state or toasts; only structural misuse and
 * invariant breaches are raised as exceptions.
 */

import type { PaneId } from './pane/types';

/** An operation referenced a pane id that is not a leaf of the tree. */
export class PaneNotFoundError extends Error {
  readonly paneId: PaneId;

  constructor(paneId: PaneId) {
    super(`Pane ${paneId} not found`);
    this.name = 'PaneNotFoundError';
    this.paneId = paneId;
  }
}

/** The pane tree and the pane instance map disagree, or an id was reused. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/** A resource subscription exhausted its retries. */
export class SubscriptionFailedError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SubscriptionFailedError';
    this.attempts = attempts;
  }
}

/** No kubeconfig could be loaded, or the requested context does not exist. */
export class ClusterUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClusterUnavailableError';
  }
}

/** Best-effort message extraction for values thrown by libraries. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
