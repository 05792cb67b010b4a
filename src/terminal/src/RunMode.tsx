/**
 * Run Mode Component
 * Steps a program one instruction at a time and displays machine state
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import {
  Machine,
  Mu0Error,
  describeHalt,
  formatStepReport,
  type SampleProgram,
} from '../../core/src';
import { runWithLimit } from './batch';
import { MemoryView } from './MemoryView';
import { ProgramListing } from './ProgramListing';
import { RegisterDisplay } from './RegisterDisplay';

interface RunModeProps {
  program: SampleProgram;
  maxSteps: number;
  showAllMemory: boolean;
  onExit: () => void;
}

type Loaded = { machine: Machine } | { error: string };

function load(source: string): Loaded {
  try {
    return { machine: Machine.fromSource(source) };
  } catch (error) {
    if (error instanceof Mu0Error) {
      return { error: error.message };
    }
    throw error;
  }
}

export const RunMode: React.FC<RunModeProps> = ({ program, maxSteps, showAllMemory, onExit }) => {
  const [loaded] = useState(() => load(program.source));
  const machine = 'machine' in loaded ? loaded.machine : undefined;
  const [snapshot, setSnapshot] = useState(() => machine?.state());
  const [report, setReport] = useState<string[]>([]);

  useInput((input, key) => {
    if (key.escape) {
      onExit();
      return;
    }

    if (!machine || machine.isHalted()) {
      // If error or finished, any key returns to menu
      onExit();
      return;
    }

    if (input === ' ' || key.return) {
      // Step the machine
      const index = machine.state().pc;
      const instruction = machine.currentInstruction();
      const next = machine.step();
      setSnapshot(next);
      setReport(instruction ? formatStepReport(index, instruction, next) : []);
    } else if (input === 'r') {
      const { state, limitReached } = runWithLimit(machine, maxSteps);
      setSnapshot(state);
      setReport(limitReached ? [`Step limit of ${maxSteps} reached.`] : []);
    }
  });

  if (!machine || !snapshot) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text bold>Running: {program.name}</Text>
        <Text dimColor>Press any key to return</Text>
        <Text> </Text>
        <Text color="red" bold>
          Error: {'error' in loaded ? loaded.error : 'program not loaded'}
        </Text>
      </Box>
    );
  }

  const halt = describeHalt(snapshot);

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>Running: {program.name}</Text>
      <Text dimColor>
        {snapshot.halted
          ? 'Program finished - Press any key to return'
          : 'Press Space or Enter to step, r to run to the end, Esc to return'}
      </Text>
      <Text> </Text>
      <ProgramListing program={machine.getProgram()} pc={snapshot.pc} />
      <Text> </Text>
      <RegisterDisplay snapshot={snapshot} />
      <Text> </Text>
      {report.map((line, i) => (
        <Text key={i}>{line}</Text>
      ))}
      {halt && (
        <Text color={snapshot.haltReason?.kind === 'stop' ? 'green' : 'red'} bold>
          {halt}
        </Text>
      )}
      <Text> </Text>
      <Text bold>Memory:</Text>
      <MemoryView snapshot={snapshot} current={machine.currentInstruction()} showAll={showAllMemory} />
    </Box>
  );
};
