/**
 * Encoder / validator for hexadecimal literals
 *
 * Every numeric literal in MU0 source is hexadecimal with a 0x prefix.
 * Addresses are unsigned 12-bit; data values are 12-bit two's-complement
 * patterns stored as signed numbers.
 */

import {
  AddressOutOfRangeError,
  MalformedLiteralError,
  ValueOutOfRangeError,
} from './errors';
import {
  MAX_ADDRESS,
  MAX_VALUE,
  MEMORY_SIZE,
  MIN_VALUE,
  type Address,
  type InstructionIndex,
  type Value,
} from './types';

const HEX_LITERAL = /^0x([0-9a-fA-F]+)$/;

/**
 * Decode a 0x-prefixed hexadecimal literal.
 * The prefix must be a lowercase 0x; the digits may be of either case.
 */
export function parseHexLiteral(token: string): number {
  const match = HEX_LITERAL.exec(token);
  if (!match) {
    throw new MalformedLiteralError(`Malformed hexadecimal literal: ${token}`);
  }
  return parseInt(match[1], 16);
}

export function isAddress(n: number): n is Address {
  return Number.isInteger(n) && n >= 0 && n <= MAX_ADDRESS;
}

export function toAddress(n: number): Address {
  if (!isAddress(n)) {
    throw new AddressOutOfRangeError(`Address out of range: ${n} (must be 0x000-0xfff)`);
  }
  return n;
}

export function parseAddress(token: string): Address {
  const n = parseHexLiteral(token);
  if (!isAddress(n)) {
    throw new AddressOutOfRangeError(`Address ${token} needs more than 3 hexadecimal digits`);
  }
  return n;
}

function isInstructionIndex(n: number): n is InstructionIndex {
  return Number.isInteger(n) && n >= 0;
}

/**
 * Jump targets are written like addresses and share their 12-bit range,
 * but they count instructions rather than memory cells.
 */
export function parseJumpTarget(token: string): InstructionIndex {
  return toInstructionIndex(parseAddress(token));
}

export function toInstructionIndex(n: number): InstructionIndex {
  if (!isInstructionIndex(n)) {
    throw new RangeError(`Invalid instruction index: ${n}`);
  }
  return n;
}

/**
 * Reinterpret the low 12 bits of n as a signed two's-complement value
 */
export function wrap12(n: number): Value {
  const low = ((n % MEMORY_SIZE) + MEMORY_SIZE) % MEMORY_SIZE;
  return low > MAX_VALUE ? low - MEMORY_SIZE : low;
}

/** Unsigned 12-bit pattern of a signed value, e.g. -1 -> 0xfff */
export function toUnsigned12(value: Value): number {
  return value < 0 ? value + MEMORY_SIZE : value;
}

export function toValue(n: number): Value {
  if (!Number.isInteger(n) || n < MIN_VALUE || n > MAX_VALUE) {
    throw new ValueOutOfRangeError(`Value out of range: ${n} (must be ${MIN_VALUE}..${MAX_VALUE})`);
  }
  return n;
}

/**
 * Decode a data literal: the digits are a 12-bit pattern, read back as signed
 */
export function parseValue(token: string): Value {
  const pattern = parseHexLiteral(token);
  if (pattern > MAX_ADDRESS) {
    throw new ValueOutOfRangeError(`Value ${token} does not fit in 12 bits`);
  }
  return wrap12(pattern);
}

/** Encode a signed value as the literal a data directive would carry */
export function encodeValue(value: Value): string {
  return `0x${toUnsigned12(toValue(value)).toString(16)}`;
}
