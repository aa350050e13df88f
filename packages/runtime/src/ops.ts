import { match } from 'ts-pattern';
import type { GcWeak, RefMut } from '@loxcell/heap';
import { stringifyFunction, type CompiledFunction } from './function.js';
import { Value } from './value.js';

export type ValueKind = Value['tag'];

export function kindOf(value: Value): ValueKind {
  return value.tag;
}

export function isString(value: Value): boolean {
  return value.tag === 'String';
}

export function isFunction(value: Value): boolean {
  return value.tag === 'Closure';
}

export function isUpvaluePtr(value: Value): boolean {
  return value.tag === 'UpvaluePtr';
}

export function isFalsey(value: Value): boolean {
  return match<Value, boolean>(value)
    .with({ tag: 'Nil' }, () => true)
    .with({ tag: 'Bool' }, (b) => !b.value)
    .with(
      { tag: 'Number' },
      { tag: 'String' },
      { tag: 'Closure' },
      { tag: 'UpvaluePtr' },
      { tag: 'OpenUpvalue' },
      () => false,
    )
    .exhaustive();
}

export function isTruthy(value: Value): boolean {
  return !isFalsey(value);
}

/** Display text of a value, looking through upvalue indirection. */
export function stringify(value: Value): string {
  return match<Value, string>(value)
    .with({ tag: 'Number' }, (n) => String(n.value))
    .with({ tag: 'Bool' }, (b) => String(b.value))
    .with({ tag: 'Nil' }, () => 'nil')
    .with({ tag: 'String' }, (s) => s.handle.toOwned())
    .with({ tag: 'Closure' }, (c) => stringifyFunction(c.fn.unwrapUpgrade().get()))
    .with({ tag: 'UpvaluePtr' }, (p) => stringify(p.target.unwrapUpgrade().get()))
    .with({ tag: 'OpenUpvalue' }, (o) => stringify(o.cell.get()))
    .exhaustive();
}

/**
 * Runtime `==`. Only scalars and strings can compare equal; closures and
 * both upvalue shapes are never equal to anything, themselves included.
 */
export function valueEquals(a: Value, b: Value): boolean {
  return match<[Value, Value], boolean>([a, b])
    .with([{ tag: 'Number' }, { tag: 'Number' }], ([x, y]) => x.value === y.value)
    .with([{ tag: 'Bool' }, { tag: 'Bool' }], ([x, y]) => x.value === y.value)
    .with([{ tag: 'Nil' }, { tag: 'Nil' }], () => true)
    .with([{ tag: 'String' }, { tag: 'String' }], ([x, y]) => x.handle.equals(y.handle))
    .otherwise(() => false);
}

/**
 * Overwrites the number stored at `location`, returning whether it did.
 *
 * Writes tunnel through `UpvaluePtr` to the storage it addresses. They do not
 * tunnel through `OpenUpvalue`: open variables are written through their
 * shared cell instead.
 */
export function updateNumber(location: RefMut<Value>, n: number): boolean {
  return match<Value, boolean>(location.get())
    .with({ tag: 'Number' }, () => {
      location.set(Value.Number(n));
      return true;
    })
    .with({ tag: 'UpvaluePtr' }, (p) => updateNumber(p.target.unwrapUpgrade(), n))
    .with(
      { tag: 'Bool' },
      { tag: 'Nil' },
      { tag: 'String' },
      { tag: 'Closure' },
      { tag: 'OpenUpvalue' },
      () => false,
    )
    .exhaustive();
}

/** Debug rendering used in diagnostics. Never upgrades a pointer. */
export function inspect(value: Value): string {
  return match<Value, string>(value)
    .with({ tag: 'Number' }, (n) => `Number(${String(n.value)})`)
    .with({ tag: 'Bool' }, (b) => `Bool(${String(b.value)})`)
    .with({ tag: 'Nil' }, () => 'Nil')
    .with({ tag: 'String' }, (s) => `String(${JSON.stringify(s.handle.toOwned())})`)
    .with({ tag: 'Closure' }, (c) => {
      const count = c.upvalues.length;
      return `Closure(${describeFunction(c.fn)}, ${count} ${count === 1 ? 'upvalue' : 'upvalues'})`;
    })
    .with({ tag: 'UpvaluePtr' }, (p) => `UpvaluePtr(slot ${p.target.index}, gen ${p.target.generation})`)
    .with({ tag: 'OpenUpvalue' }, (o) =>
      o.cell.strongCount > 0 ? `OpenUpvalue(${inspect(o.cell.get())})` : 'OpenUpvalue(<released>)',
    )
    .exhaustive();
}

function describeFunction(fn: GcWeak<CompiledFunction>): string {
  const access = fn.upgrade();
  return access === undefined ? '<reclaimed>' : stringifyFunction(access.get());
}
