/**
 * One pane at its layout rectangle: text border with title and footer
 * around the pane's markup lines.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { RenderedPane } from '../DashboardController';
import { bottomBorder, topBorder } from './frame';
import { renderMarkup } from './markup';

interface PaneViewProps {
  pane: RenderedPane;
}

export function PaneView({ pane }: PaneViewProps): React.ReactElement | null {
  const { rect, frame, focused } = pane;
  if (rect.width < 2 || rect.height < 2) return null;
  const inner = rect.width - 2;
  const body = frame.lines.slice(0, rect.height - 2);

  return (
    <Box
      position="absolute"
      marginLeft={rect.x}
      marginTop={rect.y}
      width={rect.width}
      height={rect.height}
      flexDirection="column"
    >
      <Text color={frame.borderColor} bold={focused}>{topBorder(rect.width, frame.title)}</Text>
      <Box
        height={rect.height - 2}
        borderStyle="single"
        borderTop={false}
        borderBottom={false}
        borderColor={frame.borderColor}
        flexDirection="column"
      >
        {body.map((line, i) => (
          <Box key={i} width={inner} height={1}>
            <Text wrap="truncate-end">{renderMarkup(line)}</Text>
          </Box>
        ))}
      </Box>
      <Text color={frame.borderColor}>{bottomBorder(rect.width, frame.footer)}</Text>
    </Box>
  );
}
