/**
 * Assembler for the MU0 machine
 *
 * A single pass over the classified lines. Instruction lines are numbered
 * from 0 in source order (blank, comment and INI lines take no slot);
 * INI directives are applied straight to the memory image. Instructions are
 * never written into memory.
 */

import { classifyLine } from './lexer';
import { Memory } from './memory';
import type { ClassifiedLine, Instruction, Program } from './types';

export interface AssembledProgram {
  program: Program;
  memory: Memory;
}

/**
 * Split source text into lines, dropping a trailing newline
 */
export function sourceLines(sourceText: string): string[] {
  const lines = sourceText.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Build the program and memory image from already classified lines
 */
export function assembleLines(lines: readonly ClassifiedLine[]): AssembledProgram {
  const program: Instruction[] = [];
  const memory = new Memory();

  for (const line of lines) {
    switch (line.kind) {
      case 'blank':
      case 'comment':
        break;
      case 'data':
        // Last write wins when an address is initialized twice
        memory.write(line.address, line.value);
        break;
      case 'instruction':
        program.push(Object.freeze(line.instruction));
        break;
    }
  }

  return { program: Object.freeze(program), memory };
}

/**
 * Assemble MU0 source text.
 * All or nothing: the first bad line aborts with its error.
 *
 * @throws AssemblyError carrying the line number and raw text
 */
export function assemble(sourceText: string): AssembledProgram {
  const classified = sourceLines(sourceText).map((text, i) => classifyLine(text, i + 1));
  return assembleLines(classified);
}
