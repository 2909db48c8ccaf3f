/**
 * Centered list overlay for the namespace, context and resource selectors.
 */

import React from 'react';
import { Box, Text } from 'ink';

const MAX_VISIBLE = 12;

interface SelectorOverlayProps {
  title: string;
  filter: string;
  items: string[];
  selected: number;
  columns: number;
  rows: number;
  accent: string;
}

export function SelectorOverlay({ title, filter, items, selected, columns, rows, accent }: SelectorOverlayProps): React.ReactElement {
  const visible = Math.max(1, Math.min(MAX_VISIBLE, rows - 6));
  const start = Math.max(0, Math.min(selected - visible + 1, items.length - visible));
  const windowed = items.slice(start, start + visible);
  const maxLen = Math.max(title.length + 2, filter.length + 4, ...items.map(i => i.length + 2), 20);
  const width = Math.min(maxLen + 4, Math.max(10, columns - 4));
  const height = windowed.length + 4;

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={accent}
      width={width}
      position="absolute"
      marginLeft={Math.max(0, Math.floor((columns - width) / 2))}
      marginTop={Math.max(0, Math.floor((rows - height) / 2))}
    >
      <Text color={accent} bold> {title} </Text>
      <Text wrap="truncate-end"><Text color={accent}>{'> '}</Text>{filter}<Text color="gray">{'█'}</Text></Text>
      {windowed.length === 0 && <Text color="gray"> no matches</Text>}
      {windowed.map((item, i) => (
        <Box key={`${start + i}-${item}`}>
          {start + i === selected ? (
            <Text inverse wrap="truncate-end"> {item} </Text>
          ) : (
            <Text wrap="truncate-end"> {item} </Text>
          )}
        </Box>
      ))}
    </Box>
  );
}
