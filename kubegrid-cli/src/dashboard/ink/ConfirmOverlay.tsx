/**
 * Yes/no prompt for quit, delete, restart and overwrite confirmations.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface ConfirmOverlayProps {
  message: string;
  columns: number;
  rows: number;
  color: string;
}

export function ConfirmOverlay({ message, columns, rows, color }: ConfirmOverlayProps): React.ReactElement {
  const lines = message.split('\n');
  const width = Math.min(Math.max(...lines.map(l => l.length), 24) + 4, Math.max(10, columns - 2));

  return (
    <Box
      flexDirection="column"
      borderStyle="double"
      borderColor={color}
      width={width}
      paddingX={1}
      position="absolute"
      marginLeft={Math.max(0, Math.floor((columns - width) / 2))}
      marginTop={Math.max(0, Math.floor((rows - lines.length - 4) / 2))}
    >
      {lines.map((line, i) => <Text key={i} wrap="truncate-end">{line}</Text>)}
      <Text>
        <Text bold color="green">[y]</Text><Text> confirm  </Text>
        <Text bold color="red">[n]</Text><Text> cancel</Text>
      </Text>
    </Box>
  );
}
