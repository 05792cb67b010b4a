/**
 * Formatter tests
 */

import { describe, it, expect } from 'vitest';
import {
  describeHalt,
  formatHex,
  formatInstruction,
  formatMemoryDump,
  formatStepReport,
  formatValue,
} from './format';
import { Machine } from './machine';
import { euclideanDivisionAsm, runawayJumpAsm } from './programs';

describe('Formatting', () => {
  it('should pad hex to three digits', () => {
    expect(formatHex(0)).toBe('0x000');
    expect(formatHex(0x52)).toBe('0x052');
    expect(formatHex(0xfa3)).toBe('0xfa3');
  });

  it('should show values as pattern and decimal', () => {
    expect(formatValue(-93)).toBe('0xfa3 (dec: -93)');
    expect(formatValue(82)).toBe('0x052 (dec: 82)');
  });

  it('should render instructions in source form', () => {
    const [load, , , , jge, stop] = Machine.fromSource(euclideanDivisionAsm).getProgram();

    expect(formatInstruction(load)).toBe('LOAD 0x100');
    expect(formatInstruction(jge)).toBe('JGE 0x006');
    expect(formatInstruction(stop)).toBe('STOP');
  });

  describe('formatMemoryDump', () => {
    it('should list touched cells', () => {
      const state = Machine.fromSource('INI 0x101 0x52\nINI 0x100 0xfa3\nINI 0x5 0x0').state();

      expect(formatMemoryDump(state)).toEqual([
        '  @0x005: 0x000 (dec: 0)',
        '  @0x100: 0xfa3 (dec: -93)',
        '  @0x101: 0x052 (dec: 82)',
      ]);
    });

    it('should list every non-zero cell when asked', () => {
      const state = Machine.fromSource('INI 0x101 0x52\nINI 0x5 0x0').state();

      expect(formatMemoryDump(state, { showAll: true })).toEqual(['  @0x101: 0x052 (dec: 82)']);
    });
  });

  it('should build the report for a step', () => {
    const machine = Machine.fromSource(euclideanDivisionAsm);
    const instruction = machine.currentInstruction();
    const state = machine.step();

    expect(instruction).toBeDefined();
    if (instruction) {
      expect(formatStepReport(0, instruction, state)).toEqual([
        'Executed line 14, instr. 0x000: LOAD 0x100',
        'Comment: load dividend',
        '  Current PC value:  0x001',
        '  Current ACC value: 0x7d3 (dec: 2003)',
      ]);
    }
  });

  describe('describeHalt', () => {
    it('should describe a STOP', () => {
      expect(describeHalt(Machine.fromSource(euclideanDivisionAsm).run())).toBe('Reached STOP instruction at line 19.');
    });

    it('should describe a program counter fault', () => {
      expect(describeHalt(Machine.fromSource(runawayJumpAsm).run())).toBe(
        'Program counter 0x003 is outside the program (3 instructions).'
      );
    });

    it('should say nothing while running', () => {
      expect(describeHalt(Machine.fromSource('STOP').state())).toBeUndefined();
    });
  });
});
