import { match } from 'ts-pattern';
import { invariant, type GcWeak, type GcWeakMut, type SharedCell } from '@loxcell/heap';
import type { CompiledFunction } from './function.js';
import type { InternedString } from './interner.js';

export type Value =
  | { readonly tag: 'Number'; readonly value: number }
  | { readonly tag: 'Bool'; readonly value: boolean }
  | { readonly tag: 'Nil' }
  | { readonly tag: 'String'; readonly handle: InternedString }
  | {
      readonly tag: 'Closure';
      readonly fn: GcWeak<CompiledFunction>;
      /** Index-aligned with the function's upvalue descriptors. */
      readonly upvalues: readonly GcWeakMut<Value>[];
    }
  /** Closed variable: weak ref to the heap slot that is its storage. */
  | { readonly tag: 'UpvaluePtr'; readonly target: GcWeakMut<Value> }
  /** Variable still owned by its frame, shared with the closures that captured it. */
  | { readonly tag: 'OpenUpvalue'; readonly cell: SharedCell<Value> };

/**
 * Builds a `UpvaluePtr`. The referent must not itself be a `UpvaluePtr`, so
 * any pointer resolves to real storage after one upgrade.
 */
export function upvaluePtr(target: GcWeakMut<Value>): Value {
  const nested = match<Value, boolean>(target.unwrapUpgrade().get())
    .with({ tag: 'UpvaluePtr' }, () => true)
    .with(
      { tag: 'Number' },
      { tag: 'Bool' },
      { tag: 'Nil' },
      { tag: 'String' },
      { tag: 'Closure' },
      { tag: 'OpenUpvalue' },
      () => false,
    )
    .exhaustive();
  invariant(!nested, `UpvaluePtr to slot ${target.index} would point at another UpvaluePtr`);
  return { tag: 'UpvaluePtr', target };
}

// Construct values through this object; `UpvaluePtr` is checked.
export const Value = {
  Number: (value: number): Value => ({ tag: 'Number', value }),
  Bool: (value: boolean): Value => ({ tag: 'Bool', value }),
  Nil: (): Value => ({ tag: 'Nil' }),
  String: (handle: InternedString): Value => ({ tag: 'String', handle }),
  Closure: (fn: GcWeak<CompiledFunction>, upvalues: readonly GcWeakMut<Value>[]): Value => ({
    tag: 'Closure',
    fn,
    upvalues,
  }),
  UpvaluePtr: upvaluePtr,
  OpenUpvalue: (cell: SharedCell<Value>): Value => ({ tag: 'OpenUpvalue', cell }),
};
