/**
 * Text rendering of instructions, values and memory
 * Shared by the terminal front-end and the batch runner
 */

import { toUnsigned12 } from './encoder';
import { formatHex } from './hex';
import type { MachineSnapshot } from './machine';
import type { Instruction, Value } from './types';

export { formatHex };

/** 12-bit pattern plus the signed reading: 0xfff (dec: -1) */
export function formatValue(value: Value): string {
  return `${formatHex(toUnsigned12(value))} (dec: ${value})`;
}

/**
 * Render an instruction back to source form, e.g. LOAD 0x100
 */
export function formatInstruction(instruction: Instruction): string {
  switch (instruction.opcode) {
    case 'LOAD':
    case 'STORE':
    case 'ADD':
    case 'SUB':
      return `${instruction.opcode} ${formatHex(instruction.address)}`;
    case 'JUMP':
    case 'JGE':
    case 'JNE':
      return `${instruction.opcode} ${formatHex(instruction.target)}`;
    case 'STOP':
      return 'STOP';
  }
}

export interface DumpOptions {
  /** List every non-zero cell instead of the cells written so far */
  showAll?: boolean;
}

/**
 * One line per cell: "  @0x100: 0xfa3 (dec: -93)"
 */
export function formatMemoryDump(snapshot: Pick<MachineSnapshot, 'memory' | 'touched'>, options: DumpOptions = {}): string[] {
  const addresses: number[] = [];
  if (options.showAll) {
    snapshot.memory.forEach((value, address) => {
      if (value !== 0) {
        addresses.push(address);
      }
    });
  } else {
    addresses.push(...snapshot.touched);
  }

  return addresses.map((address) => `  @${formatHex(address)}: ${formatValue(snapshot.memory[address])}`);
}

/**
 * Report printed after each step:
 *   Executed line 12, instr. 0x000: LOAD 0x100
 *   Comment: load dividend
 *     Current PC value:  0x001
 *     Current ACC value: 0x7d3 (dec: 2003)
 */
export function formatStepReport(index: number, instruction: Instruction, snapshot: MachineSnapshot): string[] {
  return [
    `Executed line ${instruction.line}, instr. ${formatHex(index)}: ${formatInstruction(instruction)}`,
    `Comment: ${instruction.comment ?? '(none)'}`,
    `  Current PC value:  ${formatHex(snapshot.pc)}`,
    `  Current ACC value: ${formatValue(snapshot.acc)}`,
  ];
}

/**
 * How a halted machine stopped, in one sentence
 */
export function describeHalt(snapshot: MachineSnapshot): string | undefined {
  const reason = snapshot.haltReason;
  if (!reason) {
    return undefined;
  }
  return reason.kind === 'stop'
    ? `Reached STOP instruction at line ${reason.line}.`
    : `${reason.error.message}.`;
}
