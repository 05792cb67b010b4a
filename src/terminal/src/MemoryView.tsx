/**
 * Memory View Component
 * Lists the cells a program has written, highlighting the ones the
 * current instruction reads or writes
 */

import React from 'react';
import { Box, Text } from 'ink';
import { formatMemoryDump, type Instruction, type MachineSnapshot } from '../../core/src';

interface MemoryViewProps {
  snapshot: MachineSnapshot;
  current?: Instruction;
  showAll: boolean;
}

const MAX_ROWS = 16;

export const MemoryView: React.FC<MemoryViewProps> = ({ snapshot, current, showAll }) => {
  const lines = formatMemoryDump(snapshot, { showAll });
  const highlighted = current && 'address' in current ? current.address : undefined;
  const addresses = showAll
    ? Array.from(snapshot.memory.keys()).filter((address) => snapshot.memory[address] !== 0)
    : snapshot.touched;

  if (lines.length === 0) {
    return <Text dimColor>  (no memory cells in use)</Text>;
  }

  return (
    <Box flexDirection="column">
      {lines.slice(0, MAX_ROWS).map((line, row) => {
        const isCurrent = addresses[row] === highlighted;
        return (
          <Text key={row} color={isCurrent ? 'cyan' : undefined} bold={isCurrent}>
            {line}
          </Text>
        );
      })}
      {lines.length > MAX_ROWS && <Text dimColor>  ... {lines.length - MAX_ROWS} more</Text>}
    </Box>
  );
};
