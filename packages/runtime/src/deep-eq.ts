import { P, match } from 'ts-pattern';
import type { Chunk } from './chunk.js';
import type { CompiledFunction } from './function.js';
import { valueEquals } from './ops.js';
import type { Value } from './value.js';

// Structural comparison for compiler output in tests. Program code compares
// with `valueEquals`.

export function functionDeepEq(a: CompiledFunction, b: CompiledFunction): boolean {
  return (
    a.name.toOwned() === b.name.toOwned() && a.arity === b.arity && chunkDeepEq(a.chunk, b.chunk)
  );
}

export function chunkDeepEq(a: Chunk, b: Chunk): boolean {
  return (
    sameNumbers(a.code, b.code) &&
    sameNumbers(a.lines, b.lines) &&
    a.constants.length === b.constants.length &&
    a.constants.every((constant, i) => {
      const other = b.constants[i];
      return other !== undefined && constantDeepEq(constant, other);
    })
  );
}

function sameNumbers(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((n, i) => n === b[i]);
}

function constantDeepEq(a: Value, b: Value): boolean {
  return match<[Value, Value], boolean>([a, b])
    .with(
      [{ tag: 'Number' }, P._],
      [{ tag: 'Bool' }, P._],
      [{ tag: 'Nil' }, P._],
      [{ tag: 'String' }, P._],
      () => valueEquals(a, b),
    )
    .with(
      [{ tag: 'Closure' }, { tag: 'Closure' }],
      ([x, y]) =>
        x.upvalues.length === y.upvalues.length &&
        functionDeepEq(x.fn.unwrapUpgrade().get(), y.fn.unwrapUpgrade().get()),
    )
    .with([{ tag: 'UpvaluePtr' }, { tag: 'UpvaluePtr' }], ([x, y]) =>
      constantDeepEq(x.target.unwrapUpgrade().get(), y.target.unwrapUpgrade().get()),
    )
    .with([{ tag: 'OpenUpvalue' }, { tag: 'OpenUpvalue' }], ([x, y]) =>
      constantDeepEq(x.cell.get(), y.cell.get()),
    )
    .otherwise(() => false);
}
