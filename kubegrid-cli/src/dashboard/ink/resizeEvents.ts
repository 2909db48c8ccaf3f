/**
 * Terminal size as `resize` events, posted once on mount and again on every
 * stdout resize.
 */

import { useEffect } from 'react';
import type { AppEvent } from 'kubegrid-shared';

export interface SizedStream {
  columns?: number;
  rows?: number;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

/** Non-TTY streams report no size; fall back to 80x24. */
export function resizeEvent(stream: Pick<SizedStream, 'columns' | 'rows'>): AppEvent {
  return { type: 'resize', columns: stream.columns || 80, rows: stream.rows || 24 };
}

/** Posts the current size now and after each resize. Returns the unsubscribe. */
export function watchResize(stream: SizedStream, send: (event: AppEvent) => void): () => void {
  const onResize = (): void => send(resizeEvent(stream));
  onResize();
  stream.on('resize', onResize);
  return () => {
    stream.off('resize', onResize);
  };
}

export function useResizeEvents(send: (event: AppEvent) => void, stream: SizedStream = process.stdout): void {
  useEffect(() => watchResize(stream, send), [stream, send]);
}
