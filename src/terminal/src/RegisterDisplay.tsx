/**
 * Register Display Component
 * Shows PC, ACC and machine status
 */

import React from 'react';
import { Box, Text } from 'ink';
import { formatHex, formatValue, type MachineSnapshot } from '../../core/src';

interface RegisterDisplayProps {
  snapshot: MachineSnapshot;
}

const STATUS_COLORS = {
  ready: 'yellow',
  running: 'green',
  halted: 'red',
} as const;

export const RegisterDisplay: React.FC<RegisterDisplayProps> = ({ snapshot }) => {
  return (
    <Box flexDirection="column">
      <Text>
        PC:  {formatHex(snapshot.pc)} ({snapshot.pc.toString().padStart(4, ' ')})
      </Text>
      <Text>ACC: {formatValue(snapshot.acc)}</Text>
      <Text>
        Status: <Text color={STATUS_COLORS[snapshot.status]}>{snapshot.status}</Text>  Steps: {snapshot.steps}
      </Text>
    </Box>
  );
};
