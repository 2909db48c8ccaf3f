/**
 * Filter prompt shown on the bottom row while typing a table filter.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface FilterOverlayProps {
  filter: string;
  rows: number;
  columns: number;
}

export function FilterOverlay({ filter, rows, columns }: FilterOverlayProps): React.ReactElement {
  return (
    <Box
      position="absolute"
      marginTop={Math.max(0, rows - 1)}
      width={columns}
      height={1}
    >
      <Text bold color="magenta">/</Text>
      <Text wrap="truncate-start">{filter}</Text>
      <Text color="gray">{'█'}</Text>
      <Text color="gray">  enter apply  esc clear</Text>
    </Box>
  );
}
