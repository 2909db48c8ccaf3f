/**
 * Pane capability shared by every view the grid can host.
 *
 * A pane renders into the rectangle the layout assigns it and reacts only to
 * the pane commands routed to it while focused, plus the background
 * deliveries addressed to its id.
 */

import type { PaneDelivery, Rect, ResourceKind, ThemeConfig, ViewType } from 'kubegrid-shared';
import type { PaneCommand } from '../commands';

export interface PaneFrame {
  title: string;
  /** Body lines in tag markup, already windowed to the content height. */
  lines: string[];
  /** Right-aligned hint drawn on the bottom border. */
  footer?: string;
  borderColor: string;
}

export interface SelectedResource {
  kind: ResourceKind;
  name: string;
  /** Empty for cluster-scoped kinds. */
  namespace: string;
}

export interface Pane {
  readonly viewType: ViewType;
  render(rect: Rect, focused: boolean, theme: ThemeConfig): PaneFrame;
  handleCommand(command: PaneCommand): void;
  handleDelivery?(event: PaneDelivery): void;
  selectedResource?(): SelectedResource | null;
  onFocusChange?(previous: ViewType | null): void;
  /** Stops whatever session the pane owns. */
  dispose?(): void;
}

/** Border takes one cell on every side. */
export function contentSize(rect: Rect): { width: number; height: number } {
  return { width: Math.max(0, rect.width - 2), height: Math.max(0, rect.height - 2) };
}

export function borderColor(focused: boolean, theme: ThemeConfig): string {
  return focused ? theme.focusedBorder : theme.border;
}
