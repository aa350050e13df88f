import type { Chunk } from './chunk.js';
import type { InternedString } from './interner.js';

/** A compiled function. Produced once by the compiler and never mutated. */
export interface CompiledFunction {
  readonly name: InternedString;
  readonly arity: number;
  readonly chunk: Chunk;
}

/**
 * One captured variable of a function, as resolved by the compiler.
 *
 * `isLocal` means `index` is a local slot of the immediately enclosing frame;
 * otherwise it is an index into the enclosing closure's own captured list.
 */
export interface UpvalueDescriptor {
  readonly index: number;
  readonly isLocal: boolean;
}

export function stringifyFunction(fn: CompiledFunction): string {
  return `<fn ${fn.name.toOwned()}>`;
}
