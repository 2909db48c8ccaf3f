/**
 * Turns terminal mouse tracking on and off with the input mode and posts
 * parsed mouse reports as `mouse` events. Reads stdin alongside Ink's own
 * input handling, which must be active so the escape sequences are consumed.
 */

import React, { useEffect, useRef } from 'react';
import type { AppEvent } from 'kubegrid-shared';
import type { InputMode } from '../../commands';
import { MouseTracking } from './mouseTracking';
import { parseMouseEvent } from './parseMouseEvent';

interface MouseProviderProps {
  mode: InputMode;
  send: (event: AppEvent) => void;
  children: React.ReactNode;
}

export function MouseProvider({ mode, send, children }: MouseProviderProps): React.ReactElement {
  const tracking = useRef<MouseTracking | null>(null);

  useEffect(() => {
    const tracker = new MouseTracking();
    tracking.current = tracker;

    const handler = (data: Buffer): void => {
      if (!tracker.enabled) return;
      const mouse = parseMouseEvent(data);
      if (mouse) send({ type: 'mouse', mouse });
    };
    process.stdin.on('data', handler);

    return () => {
      process.stdin.removeListener('data', handler);
      tracker.set(false);
      tracking.current = null;
    };
  }, [send]);

  useEffect(() => {
    tracking.current?.follow(mode);
  }, [mode, send]);

  return <>{children}</>;
}
