/**
 * Program Listing Component
 * Shows the assembled instructions around the program counter
 */

import React from 'react';
import { Box, Text } from 'ink';
import { formatHex, formatInstruction, type Program } from '../../core/src';

interface ProgramListingProps {
  program: Program;
  pc: number;
}

const WINDOW = 12;

export const ProgramListing: React.FC<ProgramListingProps> = ({ program, pc }) => {
  const first = Math.max(0, Math.min(pc - WINDOW / 2, program.length - WINDOW));
  const visible = program.slice(first, first + WINDOW);

  return (
    <Box flexDirection="column">
      {visible.map((instruction, offset) => {
        const index = first + offset;
        const isPC = index === pc;
        return (
          <Text key={index} color={isPC ? 'cyan' : undefined} bold={isPC}>
            {isPC ? '> ' : '  '}
            {formatHex(index)}  {formatInstruction(instruction).padEnd(10, ' ')}
            <Text dimColor>{instruction.comment ? ` ; ${instruction.comment}` : ''}</Text>
          </Text>
        );
      })}
      {pc >= program.length && <Text color="red">{'> '}{formatHex(pc)}  (outside the program)</Text>}
    </Box>
  );
};
