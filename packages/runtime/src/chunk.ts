import { invariant } from '@loxcell/heap';
import type { Value } from './value.js';

/** Bytecode, per-byte source lines and the constant pool of one function. */
export class Chunk {
  private readonly bytes: number[] = [];
  private readonly lineTable: number[] = [];
  private readonly pool: Value[] = [];

  get code(): readonly number[] {
    return this.bytes;
  }

  get lines(): readonly number[] {
    return this.lineTable;
  }

  get constants(): readonly Value[] {
    return this.pool;
  }

  get length(): number {
    return this.bytes.length;
  }

  write(byte: number, line: number): void {
    invariant(Number.isInteger(byte) && byte >= 0 && byte <= 0xff, `not a byte: ${byte}`);
    this.bytes.push(byte);
    this.lineTable.push(line);
  }

  addConstant(value: Value): number {
    this.pool.push(value);
    return this.pool.length - 1;
  }

  constant(index: number): Value | undefined {
    return this.pool[index];
  }

  lineAt(offset: number): number | undefined {
    return this.lineTable[offset];
  }
}
