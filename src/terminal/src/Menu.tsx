/**
 * Menu Component
 * Lists the bundled samples with what each assembles to
 */

import React, { useMemo, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import type { SampleProgram } from '../../core/src';
import { describeSummary, moveSelection, summarize } from './catalog';

interface MenuProps {
  programs: SampleProgram[];
  onSelect: (index: number) => void;
  onExit: () => void;
}

export const Menu: React.FC<MenuProps> = ({ programs, onSelect, onExit }) => {
  const summaries = useMemo(() => programs.map(summarize), [programs]);
  const [selected, setSelected] = useState(() => {
    const first = summaries.findIndex((summary) => summary.loaded);
    return first < 0 ? 0 : first;
  });
  const nameWidth = Math.max(...summaries.map((summary) => summary.name.length));

  useInput((input, key) => {
    if (key.escape || input === 'q') {
      onExit();
    } else if (key.upArrow) {
      setSelected((current) => moveSelection(summaries, current, -1));
    } else if (key.downArrow) {
      setSelected((current) => moveSelection(summaries, current, 1));
    } else if (key.return && summaries[selected]?.loaded) {
      onSelect(selected);
    }
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>MU0 Sample Programs</Text>
      <Text dimColor>Up/Down to choose, Enter to load into the stepper, q or Esc to quit</Text>
      <Text> </Text>
      {summaries.map((summary, index) => (
        <Box key={summary.name}>
          <Text color={index === selected ? 'green' : undefined}>
            {index === selected ? '> ' : '  '}
            {summary.name.padEnd(nameWidth)}
          </Text>
          <Text color={summary.loaded ? 'gray' : 'red'}>  {describeSummary(summary)}</Text>
        </Box>
      ))}
    </Box>
  );
};
