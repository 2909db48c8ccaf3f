/**
 * Toast notification stacked at the top-right of the screen.
 * Expired by the controller on tick.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ToastLevel } from 'kubegrid-shared';
import type { Toast } from '../DashboardController';

const SEVERITY_COLOR: Record<ToastLevel, string> = {
  error: 'red',
  warning: 'yellow',
  info: 'cyan',
};

const SEVERITY_ICON: Record<ToastLevel, string> = {
  error: '\u2718',   // ✘
  warning: '\u26A0', // ⚠
  info: '\u25CF',    // ●
};

/** Rows one toast occupies, borders included. */
export const TOAST_HEIGHT = 3;

interface ToastNotificationProps {
  toast: Toast;
  columns: number;
  /** Row of the toast's top border. */
  top: number;
}

export function ToastNotification({ toast, columns, top }: ToastNotificationProps): React.ReactElement {
  const color = SEVERITY_COLOR[toast.level];
  const firstLine = toast.message.split('\n')[0];
  const truncMsg = firstLine.length > 56 ? firstLine.substring(0, 53) + '...' : firstLine;

  return (
    <Box
      position="absolute"
      marginLeft={Math.max(0, columns - truncMsg.length - 8)}
      marginTop={top}
      borderStyle="single"
      borderColor={color}
      paddingX={1}
    >
      <Text color={color}>{SEVERITY_ICON[toast.level]} {truncMsg}</Text>
    </Box>
  );
}
