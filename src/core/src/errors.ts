/**
 * Error taxonomy for assembly and execution
 */

import { formatHex } from './hex';

export type Mu0ErrorKind =
  | 'SyntaxError'
  | 'MalformedLiteral'
  | 'AddressOutOfRange'
  | 'ValueOutOfRange'
  | 'InvalidProgramCounter'
  | 'MachineHalted';

/** Position of the offending text in the source being assembled */
export interface SourceLocation {
  line: number;
  source: string;
}

export abstract class Mu0Error extends Error {
  abstract readonly kind: Mu0ErrorKind;
}

/**
 * Errors raised while turning source text into a program.
 * The message is prefixed with the line number when a location is known.
 */
export abstract class AssemblyError extends Mu0Error {
  readonly detail: string;
  readonly line?: number;
  readonly source?: string;

  constructor(detail: string, location?: SourceLocation) {
    super(location ? `Line ${location.line}: ${detail}\n   ${location.source}` : detail);
    this.detail = detail;
    this.line = location?.line;
    this.source = location?.source;
  }

  /** Same error, pinned to a source line */
  abstract at(location: SourceLocation): AssemblyError;
}

export class SourceSyntaxError extends AssemblyError {
  readonly kind = 'SyntaxError';
  override readonly name = 'SourceSyntaxError';

  at(location: SourceLocation): SourceSyntaxError {
    return new SourceSyntaxError(this.detail, location);
  }
}

export class MalformedLiteralError extends AssemblyError {
  readonly kind = 'MalformedLiteral';
  override readonly name = 'MalformedLiteralError';

  at(location: SourceLocation): MalformedLiteralError {
    return new MalformedLiteralError(this.detail, location);
  }
}

export class AddressOutOfRangeError extends AssemblyError {
  readonly kind = 'AddressOutOfRange';
  override readonly name = 'AddressOutOfRangeError';

  at(location: SourceLocation): AddressOutOfRangeError {
    return new AddressOutOfRangeError(this.detail, location);
  }
}

export class ValueOutOfRangeError extends AssemblyError {
  readonly kind = 'ValueOutOfRange';
  override readonly name = 'ValueOutOfRangeError';

  at(location: SourceLocation): ValueOutOfRangeError {
    return new ValueOutOfRangeError(this.detail, location);
  }
}

/**
 * The program counter left the instruction list. Recorded as the halt
 * reason of the machine rather than thrown.
 */
export class InvalidProgramCounterError extends Mu0Error {
  readonly kind = 'InvalidProgramCounter';
  override readonly name = 'InvalidProgramCounterError';
  readonly pc: number;
  readonly programLength: number;

  constructor(pc: number, programLength: number) {
    super(`Program counter ${formatHex(pc)} is outside the program (${programLength} instructions)`);
    this.pc = pc;
    this.programLength = programLength;
  }
}

export class MachineHaltedError extends Mu0Error {
  readonly kind = 'MachineHalted';
  override readonly name = 'MachineHaltedError';

  constructor() {
    super('Machine is halted; reset it before stepping again');
  }
}
