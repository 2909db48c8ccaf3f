/**
 * Root Ink component. Draws a DashboardView built by the controller and
 * posts raw input back as key, mouse and resize events; it keeps no
 * dashboard state of its own.
 */

import React from 'react';
import { Box, useInput } from 'ink';
import type { AppEvent } from 'kubegrid-shared';
import type { DashboardView, Overlay } from '../DashboardController';
import { useResizeEvents } from './resizeEvents';
import { inkInputToKeys } from './inputKeys';
import { TabBar } from './TabBar';
import { PaneView } from './PaneView';
import { StatusBar } from './StatusBar';
import { SelectorOverlay } from './SelectorOverlay';
import { ConfirmOverlay } from './ConfirmOverlay';
import { PortForwardOverlay } from './PortForwardOverlay';
import { FilterOverlay } from './FilterOverlay';
import { TooSmallOverlay } from './TooSmallOverlay';
import { ToastNotification, TOAST_HEIGHT } from './ToastNotification';
import { MouseProvider } from './mouse';

export interface DashboardProps {
  view: DashboardView;
  version: string;
  send: (event: AppEvent) => void;
}

function OverlayView({ overlay, view }: { overlay: Overlay; view: DashboardView }): React.ReactElement {
  const { columns, rows, theme } = view;
  switch (overlay.type) {
    case 'selector':
      return (
        <SelectorOverlay
          title={overlay.title}
          filter={overlay.filter}
          items={overlay.items}
          selected={overlay.selected}
          columns={columns}
          rows={rows}
          accent={theme.accent}
        />
      );
    case 'confirm':
      return <ConfirmOverlay message={overlay.message} columns={columns} rows={rows} color={theme.warning} />;
    case 'port-forward':
      return (
        <PortForwardOverlay
          pod={overlay.pod}
          local={overlay.local}
          remote={overlay.remote}
          field={overlay.field}
          error={overlay.error}
          columns={columns}
          rows={rows}
          accent={theme.accent}
        />
      );
  }
}

export function Dashboard({ view, version, send }: DashboardProps): React.ReactElement {
  useResizeEvents(send);

  useInput((input, key) => {
    for (const event of inkInputToKeys(input, key)) send({ type: 'key', key: event });
  });

  if (view.tooSmall) {
    return (
      <MouseProvider mode={view.mode} send={send}>
        <TooSmallOverlay columns={view.columns} rows={view.rows} />
      </MouseProvider>
    );
  }

  return (
    <MouseProvider mode={view.mode} send={send}>
      <Box flexDirection="column" width={view.columns} height={view.rows}>
        <TabBar tabs={view.tabs} activeIndex={view.activeTab} offset={view.tabOffset} width={view.columns} />
        <Box flexGrow={1} />
        <StatusBar status={view.status} mode={view.mode} version={version} width={view.columns} />

        {view.panes.map((pane) => <PaneView key={pane.id} pane={pane} />)}

        {view.overlay && <OverlayView overlay={view.overlay} view={view} />}

        {view.filter !== null && <FilterOverlay filter={view.filter} rows={view.rows} columns={view.columns} />}

        {view.toasts.map((toast, i) => (
          <ToastNotification key={toast.id} toast={toast} columns={view.columns} top={1 + i * TOAST_HEIGHT} />
        ))}
      </Box>
    </MouseProvider>
  );
}
