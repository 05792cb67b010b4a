import { describe, it, expect } from 'vitest';
import { Memory } from './memory';
import { AddressOutOfRangeError, ValueOutOfRangeError } from './errors';
import { toAddress } from './encoder';

describe('Memory', () => {
  it('should start with 4096 zero cells and nothing touched', () => {
    const memory = new Memory();

    expect(memory.snapshot()).toHaveLength(4096);
    expect(memory.read(toAddress(0xfff))).toBe(0);
    expect(memory.touched()).toEqual([]);
  });

  it('should track written addresses in ascending order', () => {
    const memory = new Memory();
    memory.write(toAddress(0x300), 1);
    memory.write(toAddress(0x002), 0);
    memory.write(toAddress(0x300), 2);

    expect(memory.touched()).toEqual([0x002, 0x300]);
    expect(memory.read(toAddress(0x300))).toBe(2);
  });

  it('should only be addressed through validated addresses', () => {
    expect(() => toAddress(0x1000)).toThrow(AddressOutOfRangeError);
    expect(() => toAddress(-1)).toThrow(AddressOutOfRangeError);
  });

  it('should reject values outside the signed 12-bit range', () => {
    expect(() => new Memory().write(toAddress(0x1), 2048)).toThrow(ValueOutOfRangeError);
  });

  it('should clone independently', () => {
    const memory = new Memory();
    memory.write(toAddress(0x10), 5);
    const copy = memory.clone();
    copy.write(toAddress(0x10), 6);
    copy.write(toAddress(0x11), 7);

    expect(memory.read(toAddress(0x10))).toBe(5);
    expect(memory.touched()).toEqual([0x10]);
    expect(copy.touched()).toEqual([0x10, 0x11]);
  });

  it('should reject images of the wrong size', () => {
    expect(() => new Memory(new Int16Array(16))).toThrow(RangeError);
  });
});
