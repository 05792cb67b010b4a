/**
 * Non-interactive runner: assemble, run to completion under a step cap,
 * and print memory before and after.
 */

import {
  Machine,
  describeHalt,
  formatMemoryDump,
  type MachineSnapshot,
} from '../../core/src';

export interface BatchOptions {
  maxSteps: number;
  showAllMemory: boolean;
}

export type BatchOutcome = 'stop' | 'fault' | 'limit';

export interface BatchResult {
  outcome: BatchOutcome;
  state: MachineSnapshot;
}

/**
 * Advance until the machine halts or maxSteps transitions have run
 */
export function runWithLimit(machine: Machine, maxSteps: number): { state: MachineSnapshot; limitReached: boolean } {
  let steps = 0;
  while (!machine.isHalted() && steps < maxSteps) {
    machine.advance();
    steps++;
  }
  return { state: machine.state(), limitReached: !machine.isHalted() };
}

/**
 * @throws AssemblyError if the source does not assemble
 */
export function runBatch(
  sourceText: string,
  options: BatchOptions,
  log: (line: string) => void = console.log
): BatchResult {
  const dumpOptions = { showAll: options.showAllMemory };

  log('### Parsing source file ...');
  const machine = Machine.fromSource(sourceText);
  log(`Assembled ${machine.getProgram().length} instructions.`);

  log('');
  log('### Memory dump before program execution:');
  formatMemoryDump(machine.state(), dumpOptions).forEach((line) => log(line));

  log('');
  log('### Running the program ...');
  const { state, limitReached } = runWithLimit(machine, options.maxSteps);
  const outcome: BatchOutcome = limitReached ? 'limit' : state.haltReason?.kind ?? 'limit';
  log(limitReached ? `Step limit of ${options.maxSteps} reached.` : describeHalt(state) ?? '');

  log('');
  log('### Memory dump after program end:');
  formatMemoryDump(state, dumpOptions).forEach((line) => log(line));

  return { outcome, state };
}
