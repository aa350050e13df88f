import { match } from 'ts-pattern';
import { invariant, type RefMut } from '@loxcell/heap';
import type { InternedString } from './interner.js';
import { inspect, type ValueKind } from './ops.js';
import { err, isErr, isOk, ok, type Err, type Result } from './result.js';
import { Value } from './value.js';

export interface CoercionError {
  expected: ValueKind;
  /** `inspect` rendering of the value that did not match. */
  found: string;
  message: string;
}

export type Coerced<T> = Result<T, CoercionError>;

function mismatch(expected: ValueKind, value: Value): Err<CoercionError> {
  const found = inspect(value);
  return err({ expected, found, message: `Expected ${expected}, but found ${found}` });
}

/** Narrows to a number, following a `UpvaluePtr` to its storage. */
export function toNumber(value: Value): Coerced<number> {
  return match<Value, Coerced<number>>(value)
    .with({ tag: 'Number' }, (n) => ok(n.value))
    .with({ tag: 'UpvaluePtr' }, (p) => toNumber(p.target.unwrapUpgrade().get()))
    .with(
      { tag: 'Bool' },
      { tag: 'Nil' },
      { tag: 'String' },
      { tag: 'Closure' },
      { tag: 'OpenUpvalue' },
      () => mismatch('Number', value),
    )
    .exhaustive();
}

// Booleans and strings only match their exact variant; a pointer to one is a
// mismatch. Kept as-is for compatibility, see DESIGN.md.

export function toBool(value: Value): Coerced<boolean> {
  return match<Value, Coerced<boolean>>(value)
    .with({ tag: 'Bool' }, (b) => ok(b.value))
    .with(
      { tag: 'Number' },
      { tag: 'Nil' },
      { tag: 'String' },
      { tag: 'Closure' },
      { tag: 'UpvaluePtr' },
      { tag: 'OpenUpvalue' },
      () => mismatch('Bool', value),
    )
    .exhaustive();
}

/**
 * Mutable boolean view of a location holding a `Bool`. Writes store a fresh
 * `Bool` in the location.
 */
export function toBoolMut(location: RefMut<Value>): Coerced<RefMut<boolean>> {
  const checked = toBool(location.get());
  if (isErr(checked)) return checked;

  const view: RefMut<boolean> = {
    get: () => {
      const current = toBool(location.get());
      invariant(isOk(current), 'boolean view used after its location stopped holding a Bool');
      return current.value;
    },
    set: (b) => location.set(Value.Bool(b)),
  };
  return ok(view);
}

export function toInternedString(value: Value): Coerced<InternedString> {
  return match<Value, Coerced<InternedString>>(value)
    .with({ tag: 'String' }, (s) => ok(s.handle))
    .with(
      { tag: 'Number' },
      { tag: 'Bool' },
      { tag: 'Nil' },
      { tag: 'Closure' },
      { tag: 'UpvaluePtr' },
      { tag: 'OpenUpvalue' },
      () => mismatch('String', value),
    )
    .exhaustive();
}
