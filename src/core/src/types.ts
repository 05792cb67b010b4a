/**
 * Core types for the MU0 assembler and machine
 *
 * Two integer spaces coexist and must not be mixed up:
 * - Address: a cell in the 4096-cell data memory (0x000 - 0xFFF)
 * - InstructionIndex: a position in the assembled program, counting
 *   instruction lines only
 * Both are branded numbers so the compiler keeps them apart.
 */

export const ADDRESS_BITS = 12;
export const MEMORY_SIZE = 1 << ADDRESS_BITS; // 4096 cells
export const MAX_ADDRESS = MEMORY_SIZE - 1;
export const MIN_VALUE = -(MEMORY_SIZE >> 1); // -2048
export const MAX_VALUE = (MEMORY_SIZE >> 1) - 1; // 2047

export type Address = number & { readonly __brand: 'Address' };
export type InstructionIndex = number & { readonly __brand: 'InstructionIndex' };

/** Signed 12-bit two's-complement value, -2048..2047 */
export type Value = number;

export type MemoryOpcode = 'LOAD' | 'STORE' | 'ADD' | 'SUB';
export type JumpOpcode = 'JUMP' | 'JGE' | 'JNE';
export type OperandOpcode = MemoryOpcode | JumpOpcode;
export type Opcode = OperandOpcode | 'STOP';

/** Where an instruction came from, for step reports */
export interface SourceInfo {
  line: number;
  comment?: string;
}

export interface MemoryInstruction extends SourceInfo {
  opcode: MemoryOpcode;
  address: Address;
}

export interface JumpInstruction extends SourceInfo {
  opcode: JumpOpcode;
  target: InstructionIndex;
}

export interface StopInstruction extends SourceInfo {
  opcode: 'STOP';
}

export type Instruction = MemoryInstruction | JumpInstruction | StopInstruction;

/** Result of classifying one line of source */
export type ClassifiedLine =
  | { kind: 'blank'; line: number }
  | { kind: 'comment'; line: number; text: string }
  | { kind: 'data'; line: number; address: Address; value: Value }
  | { kind: 'instruction'; line: number; instruction: Instruction };

/** Decoded instructions, indexed by InstructionIndex. Frozen once assembled. */
export type Program = readonly Instruction[];
