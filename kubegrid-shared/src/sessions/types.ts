/**
 * Shared shapes for background session producers.
 */

import type { AppEvent } from '../events/types';
import type { PaneId } from '../pane/types';

/** Where a producer posts its deliveries, and the sequence number it tags them with. */
export interface DeliveryTarget {
  paneId: PaneId;
  seq: number;
  send: (event: AppEvent) => void;
}

/** An interactive byte stream shown in a terminal pane. */
export interface TerminalSession {
  write(data: string): void;
  resize(columns: number, rows: number): void;
  stop(): void;
  readonly exited: boolean;
}
