/**
 * Tab bar on the first row: [1] Main   [2] App Logs ...
 * Active tab highlighted with magenta.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { TAB_GAP, tabSlots } from '../tabStrip';

interface TabBarProps {
  tabs: string[];
  activeIndex: number;
  offset: number;
  width: number;
}

export function TabBar({ tabs, activeIndex, offset, width }: TabBarProps): React.ReactElement {
  return (
    <Box height={1} width={width} overflow="hidden">
      {tabSlots(tabs, offset).map((slot) => (
        <Box key={slot.index} marginRight={TAB_GAP} flexShrink={0}>
          {slot.index === activeIndex ? (
            <Text bold color="magenta">{slot.label}</Text>
          ) : (
            <Text color="gray">{slot.label}</Text>
          )}
        </Box>
      ))}
    </Box>
  );
}
