/**
 * Data memory for the MU0 machine
 *
 * 4096 cells of signed 12-bit values, zero-initialized. Besides the cell
 * contents the memory remembers which addresses have ever been written,
 * so dumps can show just the cells a program uses.
 */

import { toValue } from './encoder';
import { MEMORY_SIZE, type Address, type Value } from './types';

export class Memory {
  private readonly cells: Int16Array;
  private readonly written: Set<Address>;

  constructor(cells?: Int16Array, written?: Iterable<Address>) {
    if (cells && cells.length !== MEMORY_SIZE) {
      throw new RangeError(`Memory image must hold ${MEMORY_SIZE} cells, got ${cells.length}`);
    }
    this.cells = cells ? new Int16Array(cells) : new Int16Array(MEMORY_SIZE);
    this.written = new Set(written);
  }

  /**
   * Read a cell
   */
  read(address: Address): Value {
    return this.cells[address];
  }

  /**
   * Write a cell. The value must already be in the signed 12-bit range.
   */
  write(address: Address, value: Value): void {
    this.cells[address] = toValue(value);
    this.written.add(address);
  }

  /**
   * Addresses written so far, ascending
   */
  touched(): Address[] {
    return [...this.written].sort((a, b) => a - b);
  }

  /**
   * Copy of every cell
   */
  snapshot(): Int16Array {
    return new Int16Array(this.cells);
  }

  clone(): Memory {
    return new Memory(this.cells, this.written);
  }
}
