/**
 * Two-field dialog for starting a port forward to the selected pod.
 */

import React from 'react';
import { Box, Text } from 'ink';

const WIDTH = 44;

interface PortForwardOverlayProps {
  pod: string;
  local: string;
  remote: string;
  field: 'local' | 'remote';
  error: string | null;
  columns: number;
  rows: number;
  accent: string;
}

function Field({ label, value, active }: { label: string; value: string; active: boolean }): React.ReactElement {
  return (
    <Text>
      <Text color={active ? 'magenta' : 'gray'} bold={active}>{label.padEnd(13)}</Text>
      <Text inverse={active}> {value.padEnd(6)}</Text>
      {active && <Text color="gray">{'█'}</Text>}
    </Text>
  );
}

export function PortForwardOverlay(props: PortForwardOverlayProps): React.ReactElement {
  const { pod, local, remote, field, error, columns, rows, accent } = props;
  const width = Math.min(WIDTH, Math.max(10, columns - 2));

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={accent}
      width={width}
      paddingX={1}
      position="absolute"
      marginLeft={Math.max(0, Math.floor((columns - width) / 2))}
      marginTop={Math.max(0, Math.floor((rows - 7) / 2))}
    >
      <Text bold color={accent} wrap="truncate-end">Port forward {pod}</Text>
      <Field label="Local port" value={local} active={field === 'local'} />
      <Field label="Remote port" value={remote} active={field === 'remote'} />
      {error ? <Text color="red" wrap="truncate-end">{error}</Text> : <Text color="gray">tab switch  enter start  esc cancel</Text>}
    </Box>
  );
}
