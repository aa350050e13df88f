import { match } from 'ts-pattern';
import type { GcWeak, GcWeakMut, SharedCell } from '@loxcell/heap';
import type { CompiledFunction } from './function.js';
import type { Value } from './value.js';

/**
 * References a value holds, split by ownership, for a collector to trace.
 * Interned strings are handles into the intern table and are not listed.
 */
export interface ValueEdges {
  owned: SharedCell<Value>[];
  values: GcWeakMut<Value>[];
  functions: GcWeak<CompiledFunction>[];
}

export function valueEdges(value: Value): ValueEdges {
  return match<Value, ValueEdges>(value)
    .with({ tag: 'Number' }, { tag: 'Bool' }, { tag: 'Nil' }, { tag: 'String' }, () => ({
      owned: [],
      values: [],
      functions: [],
    }))
    .with({ tag: 'Closure' }, (c) => ({ owned: [], values: [...c.upvalues], functions: [c.fn] }))
    .with({ tag: 'UpvaluePtr' }, (p) => ({ owned: [], values: [p.target], functions: [] }))
    .with({ tag: 'OpenUpvalue' }, (o) => ({ owned: [o.cell], values: [], functions: [] }))
    .exhaustive();
}
