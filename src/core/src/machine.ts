/**
 * MU0 Machine
 *
 * A 12-bit accumulator machine:
 * - Accumulator (ACC), signed 12-bit
 * - Program counter (PC), an index into the assembled instruction list
 * - 4096 cells of data memory
 *
 * States: ready -> running -> halted. A machine halts on STOP, or when
 * the PC is found outside the instruction list at fetch time.
 */

import { assemble, type AssembledProgram } from './assembler';
import { toInstructionIndex, wrap12 } from './encoder';
import { InvalidProgramCounterError, MachineHaltedError } from './errors';
import { Memory } from './memory';
import type { Address, Instruction, InstructionIndex, Program, Value } from './types';

export type MachineStatus = 'ready' | 'running' | 'halted';

export type HaltReason =
  | { kind: 'stop'; line: number }
  | { kind: 'fault'; error: InvalidProgramCounterError };

export interface MachineSnapshot {
  pc: InstructionIndex;
  acc: Value;
  status: MachineStatus;
  halted: boolean;
  haltReason?: HaltReason;
  /** Transitions executed since the last reset */
  steps: number;
  memory: Int16Array;
  touched: Address[];
}

export class Machine {
  private readonly program: Program;
  private readonly initialMemory: Memory;
  private memory: Memory;

  private pc: InstructionIndex = toInstructionIndex(0);
  private acc: Value = 0;
  private status: MachineStatus = 'ready';
  private haltReason: HaltReason | undefined;
  private steps: number = 0;

  constructor({ program, memory }: AssembledProgram) {
    this.program = program;
    this.initialMemory = memory.clone();
    this.memory = memory.clone();
  }

  /**
   * Assemble source text and load it into a fresh machine
   */
  static fromSource(sourceText: string): Machine {
    return new Machine(assemble(sourceText));
  }

  /**
   * Back to pc=0, acc=0 and the memory image produced by assembly
   */
  reset(): void {
    this.memory = this.initialMemory.clone();
    this.pc = toInstructionIndex(0);
    this.acc = 0;
    this.status = 'ready';
    this.haltReason = undefined;
    this.steps = 0;
  }

  getProgram(): Program {
    return this.program;
  }

  isHalted(): boolean {
    return this.status === 'halted';
  }

  /**
   * The instruction the next step will execute, if the PC is valid
   */
  currentInstruction(): Instruction | undefined {
    return this.fetch();
  }

  private fetch(): Instruction | undefined {
    return this.pc < this.program.length ? this.program[this.pc] : undefined;
  }

  private next(): InstructionIndex {
    return toInstructionIndex(this.pc + 1);
  }

  private halt(reason: HaltReason): void {
    this.status = 'halted';
    this.haltReason = reason;
  }

  /**
   * Execute one fetch-decode-execute transition
   *
   * @returns snapshot of the resulting state
   * @throws MachineHaltedError if the machine has already halted
   */
  step(): MachineSnapshot {
    this.advance();
    return this.state();
  }

  /**
   * Execute one transition without building a snapshot
   *
   * @returns false once the machine has halted
   */
  advance(): boolean {
    if (this.status === 'halted') {
      throw new MachineHaltedError();
    }

    this.steps++;
    const instruction = this.fetch();
    if (!instruction) {
      this.halt({ kind: 'fault', error: new InvalidProgramCounterError(this.pc, this.program.length) });
      return false;
    }

    this.status = 'running';
    this.execute(instruction);
    return !this.isHalted();
  }

  private execute(instruction: Instruction): void {
    switch (instruction.opcode) {
      case 'LOAD':
        this.acc = this.memory.read(instruction.address);
        this.pc = this.next();
        break;
      case 'STORE':
        this.memory.write(instruction.address, this.acc);
        this.pc = this.next();
        break;
      case 'ADD':
        this.acc = wrap12(this.acc + this.memory.read(instruction.address));
        this.pc = this.next();
        break;
      case 'SUB':
        this.acc = wrap12(this.acc - this.memory.read(instruction.address));
        this.pc = this.next();
        break;
      case 'JUMP':
        this.pc = instruction.target;
        break;
      case 'JGE':
        this.pc = this.acc >= 0 ? instruction.target : this.next();
        break;
      case 'JNE':
        this.pc = this.acc !== 0 ? instruction.target : this.next();
        break;
      case 'STOP':
        this.halt({ kind: 'stop', line: instruction.line });
        break;
      default: {
        const unhandled: never = instruction;
        throw new Error(`Unhandled instruction: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /**
   * Step until halted. Does not return if the program never halts;
   * callers wanting a bound should drive advance() themselves.
   */
  run(): MachineSnapshot {
    while (this.status !== 'halted') {
      this.advance();
    }
    return this.state();
  }

  /**
   * Read-only copy of the machine state
   */
  state(): MachineSnapshot {
    const snapshot: MachineSnapshot = {
      pc: this.pc,
      acc: this.acc,
      status: this.status,
      halted: this.status === 'halted',
      steps: this.steps,
      memory: this.memory.snapshot(),
      touched: this.memory.touched(),
    };
    if (this.haltReason) {
      snapshot.haltReason = this.haltReason;
    }
    return snapshot;
  }
}
