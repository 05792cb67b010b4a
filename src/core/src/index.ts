export * from './types';
export * from './errors';
export * from './encoder';
export { classifyLine, splitComment } from './lexer';
export { assemble, assembleLines, sourceLines, type AssembledProgram } from './assembler';
export { Memory } from './memory';
export { Machine, type HaltReason, type MachineSnapshot, type MachineStatus } from './machine';
export * from './format';
export { programs, type SampleProgram } from './programs';
