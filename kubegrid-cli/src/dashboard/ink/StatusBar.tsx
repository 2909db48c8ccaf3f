/**
 * Status bar (bottom row) with segmented zones:
 * Left: brand + version | Center: context, namespace, mode | Right: keybinding hints
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { StatusInfo } from '../DashboardController';
import type { InputMode } from '../commands';

interface StatusBarProps {
  status: StatusInfo;
  mode: InputMode;
  version: string;
  width: number;
}

const MODE_COLORS: Partial<Record<InputMode, string>> = {
  insert: 'green',
  'query-editor': 'yellow',
  'query-browse': 'yellow',
  'query-history': 'cyan',
  'saved-queries': 'cyan',
  'save-query-name': 'cyan',
  'export-dialog': 'cyan',
  completion: 'cyan',
  'filter-input': 'magenta',
};

export function StatusBar({ status, mode, version, width }: StatusBarProps): React.ReactElement {
  return (
    <Box height={1} width={width}>
      <Box flexShrink={0}>
        <Text bold color="magenta">{'⎈'} KUBEGRID</Text>
        <Text dimColor> v{version}</Text>
      </Box>

      <Box flexGrow={1} justifyContent="center" overflow="hidden">
        <Text dimColor> {'│'} </Text>
        <Text color="cyan">{status.context}</Text>
        <Text dimColor> {'│'} </Text>
        <Text>ns: {status.namespace}</Text>
        {mode !== 'normal' && (
          <><Text dimColor> {'│'} </Text><Text bold color={MODE_COLORS[mode] ?? 'white'}>{mode.toUpperCase()}</Text></>
        )}
      </Box>

      <Box flexShrink={0}>
        <Text dimColor>{'│'} </Text>
        <Text>
          {status.hints.map(([key, label]) => (
            <React.Fragment key={`${key}-${label}`}>
              <Text bold>{key}</Text><Text dimColor> {label} </Text>
            </React.Fragment>
          ))}
        </Text>
      </Box>
    </Box>
  );
}
