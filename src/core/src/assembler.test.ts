/**
 * Assembler Test Suite
 *
 * Covers:
 * - Instruction numbering that skips blank, comment and INI lines
 * - Memory image built from INI directives
 * - All-or-nothing failure with line diagnostics
 */

import { describe, it, expect } from 'vitest';
import { assemble, assembleLines, sourceLines } from './assembler';
import { AddressOutOfRangeError, SourceSyntaxError, ValueOutOfRangeError } from './errors';
import { toAddress } from './encoder';
import { euclideanDivisionAsm } from './programs';

describe('Assembler', () => {
  describe('sourceLines', () => {
    it('should split on LF and CRLF', () => {
      expect(sourceLines('LOAD 0x1\r\nSTOP\n')).toEqual(['LOAD 0x1', 'STOP']);
    });

    it('should keep a single empty line for empty input', () => {
      expect(sourceLines('')).toEqual(['']);
    });
  });

  describe('Instruction numbering', () => {
    it('should number instructions only, starting at 0', () => {
      const { program } = assemble(['INI 0x10 0x1', '', 'LOAD 0x10', 'JUMP 0x0'].join('\n'));

      expect(program).toHaveLength(2);
      expect(program[0]).toEqual({ opcode: 'LOAD', address: 0x10, line: 3 });
      expect(program[1]).toEqual({ opcode: 'JUMP', target: 0, line: 4 });
    });

    it('should ignore interleaved comments and directives', () => {
      const source = [
        '; header',
        'LOAD 0x1',
        'INI 0x1 0x5',
        '   ',
        '; middle',
        'ADD 0x1',
        'INI 0x2 0x6',
        'STOP',
      ].join('\n');
      const { program } = assemble(source);

      expect(program.map((instruction) => instruction.opcode)).toEqual(['LOAD', 'ADD', 'STOP']);
      expect(program.map((instruction) => instruction.line)).toEqual([2, 6, 8]);
    });

    it('should produce 11 instructions for the Euclidean division sample', () => {
      const { program } = assemble(euclideanDivisionAsm);

      expect(program).toHaveLength(11);
      expect(program[4]).toEqual({
        opcode: 'JGE',
        target: 6,
        line: 18,
        comment: 'if result is >= 0, the algorithm has not finished yet',
      });
      expect(program[5]).toEqual({ opcode: 'STOP', line: 19 });
    });
  });

  describe('Memory image', () => {
    it('should apply INI directives and nothing else', () => {
      const { memory } = assemble(euclideanDivisionAsm);

      expect(memory.read(toAddress(0x100))).toBe(2003);
      expect(memory.read(toAddress(0x101))).toBe(82);
      expect(memory.read(toAddress(0x102))).toBe(1);
      expect(memory.read(toAddress(0x000))).toBe(0);
      expect(memory.touched()).toEqual([0x100, 0x101, 0x102, 0x103, 0x104]);
    });

    it('should not write instructions into memory', () => {
      const { memory } = assemble('LOAD 0x5\nSTOP');

      expect(memory.snapshot().every((cell) => cell === 0)).toBe(true);
      expect(memory.touched()).toEqual([]);
    });

    it('should let the last write win', () => {
      const { memory } = assemble('INI 0x20 0x1\nINI 0x20 0xfff');

      expect(memory.read(toAddress(0x20))).toBe(-1);
      expect(memory.touched()).toEqual([0x20]);
    });
  });

  describe('Program immutability', () => {
    it('should freeze the program and its instructions', () => {
      const { program } = assemble('LOAD 0x1\nSTOP');

      expect(Object.isFrozen(program)).toBe(true);
      expect(Object.isFrozen(program[0])).toBe(true);
    });
  });

  describe('Errors', () => {
    it('should abort on the first bad line', () => {
      const source = 'LOAD 0x1\nHALT\nSTORE 0x1000';

      expect(() => assemble(source)).toThrow(SourceSyntaxError);
      expect(() => assemble(source)).toThrow('Line 2: Unrecognized instruction\n   HALT');
    });

    it('should report out-of-range addresses with their line', () => {
      try {
        assemble('; comment\n\nSTORE 0x1000');
        expect.fail('expected an error');
      } catch (error) {
        expect(error).toBeInstanceOf(AddressOutOfRangeError);
        if (error instanceof AddressOutOfRangeError) {
          expect(error.line).toBe(3);
          expect(error.source).toBe('STORE 0x1000');
        }
      }
    });

    it('should report out-of-range values', () => {
      expect(() => assemble('INI 0x1 0x1234')).toThrow(ValueOutOfRangeError);
    });
  });

  describe('assembleLines', () => {
    it('should accept pre-classified lines', () => {
      const { program, memory } = assembleLines([
        { kind: 'blank', line: 1 },
        { kind: 'comment', line: 2, text: 'x' },
        { kind: 'instruction', line: 3, instruction: { opcode: 'STOP', line: 3 } },
      ]);

      expect(program).toEqual([{ opcode: 'STOP', line: 3 }]);
      expect(memory.touched()).toEqual([]);
    });
  });
});
