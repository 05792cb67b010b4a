/**
 * Line classifier
 *
 * Turns one line of MU0 source into a ClassifiedLine. Pure: nothing is
 * carried from one line to the next.
 */

import { AssemblyError, SourceSyntaxError } from './errors';
import { parseAddress, parseJumpTarget, parseValue } from './encoder';
import type { ClassifiedLine, Instruction, Opcode } from './types';

// Mnemonics accepted in source, with their aliases
const MNEMONICS: Record<string, Opcode> = {
  'LOAD': 'LOAD',
  'LDA': 'LOAD',
  'STORE': 'STORE',
  'STO': 'STORE',
  'ADD': 'ADD',
  'SUB': 'SUB',
  'JUMP': 'JUMP',
  'JMP': 'JUMP',
  'JGE': 'JGE',
  'JNE': 'JNE',
  'STOP': 'STOP',
};

const DATA_DIRECTIVE = 'INI';

/**
 * Split a line into its code part and its comment text.
 * Everything from the first ';' is comment.
 */
export function splitComment(text: string): { code: string; comment?: string } {
  const commentIndex = text.indexOf(';');
  if (commentIndex < 0) {
    return { code: text.trim() };
  }
  return {
    code: text.substring(0, commentIndex).trim(),
    comment: text.substring(commentIndex).replace(/^;+/, '').trim(),
  };
}

function decodeInstruction(
  mnemonic: Opcode,
  operands: string[],
  line: number,
  comment: string | undefined
): Instruction {
  const source = comment ? { line, comment } : { line };

  if (mnemonic === 'STOP') {
    if (operands.length !== 0) {
      throw new SourceSyntaxError('STOP takes no operand');
    }
    return { opcode: 'STOP', ...source };
  }

  if (operands.length !== 1) {
    throw new SourceSyntaxError(`${mnemonic} expects exactly one operand`);
  }

  switch (mnemonic) {
    case 'LOAD':
    case 'STORE':
    case 'ADD':
    case 'SUB':
      return { opcode: mnemonic, address: parseAddress(operands[0]), ...source };
    case 'JUMP':
    case 'JGE':
    case 'JNE':
      return { opcode: mnemonic, target: parseJumpTarget(operands[0]), ...source };
  }
}

function classify(text: string, line: number): ClassifiedLine {
  const { code, comment } = splitComment(text);

  if (code === '') {
    return comment === undefined
      ? { kind: 'blank', line }
      : { kind: 'comment', line, text: comment };
  }

  const [head, ...operands] = code.split(/\s+/);
  const keyword = head.toUpperCase();

  if (keyword === DATA_DIRECTIVE) {
    if (operands.length !== 2) {
      throw new SourceSyntaxError('INI expects an address and a value');
    }
    return {
      kind: 'data',
      line,
      address: parseAddress(operands[0]),
      value: parseValue(operands[1]),
    };
  }

  const mnemonic = MNEMONICS[keyword];
  if (mnemonic === undefined) {
    throw new SourceSyntaxError('Unrecognized instruction');
  }

  return {
    kind: 'instruction',
    line,
    instruction: decodeInstruction(mnemonic, operands, line, comment),
  };
}

/**
 * Classify a single source line.
 * @param lineNumber - 1-based line number, used in diagnostics
 * @throws AssemblyError pinned to the line and its raw text
 */
export function classifyLine(text: string, lineNumber: number): ClassifiedLine {
  try {
    return classify(text, lineNumber);
  } catch (error) {
    if (error instanceof AssemblyError) {
      throw error.at({ line: lineNumber, source: text });
    }
    throw error;
  }
}
