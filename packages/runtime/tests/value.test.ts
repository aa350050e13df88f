import { describe, expect, it } from 'vitest';
import { InvariantViolation, SharedCell } from '@loxcell/heap';
import {
  Chunk,
  Interner,
  Value,
  inspect,
  instantiateClosure,
  isFalsey,
  isFunction,
  isString,
  isTruthy,
  isUpvaluePtr,
  kindOf,
  stringify,
  valueEquals,
} from '../src/index.js';
import { testRuntime } from './helpers.js';

function sampleValues() {
  const runtime = testRuntime();
  const fn = runtime.defineFunction('f', 0, new Chunk());
  const closure = instantiateClosure(fn, [], runtime.frame([]));
  const storage = runtime.values.alloc(Value.Bool(false));
  return {
    runtime,
    closure,
    storage,
    number: Value.Number(0),
    empty: runtime.string(''),
    pointer: Value.UpvaluePtr(storage),
    open: Value.OpenUpvalue(new SharedCell(Value.Nil())),
  };
}

describe('truthiness', () => {
  it('treats only nil and false as falsey', () => {
    expect(isFalsey(Value.Nil())).toBe(true);
    expect(isFalsey(Value.Bool(false))).toBe(true);
    expect(isFalsey(Value.Bool(true))).toBe(false);
  });

  it('treats zero, empty strings and reference shapes as truthy', () => {
    const { number, empty, closure, pointer, open } = sampleValues();

    for (const value of [number, empty, closure, pointer, open]) {
      expect(isTruthy(value)).toBe(true);
    }
  });

  it('keeps isTruthy the negation of isFalsey', () => {
    const { number, empty, closure, pointer, open } = sampleValues();
    const all = [Value.Nil(), Value.Bool(false), Value.Bool(true), number, empty, closure, pointer, open];

    for (const value of all) {
      expect(isTruthy(value)).toBe(!isFalsey(value));
    }
  });
});

describe('stringify', () => {
  it('formats scalars', () => {
    expect(stringify(Value.Number(3))).toBe('3');
    expect(stringify(Value.Number(2.5))).toBe('2.5');
    expect(stringify(Value.Bool(true))).toBe('true');
    expect(stringify(Value.Bool(false))).toBe('false');
    expect(stringify(Value.Nil())).toBe('nil');
  });

  it('formats strings and closures', () => {
    const runtime = testRuntime();
    const fn = runtime.defineFunction('greet', 1, new Chunk());

    expect(stringify(runtime.string('hello'))).toBe('hello');
    expect(stringify(instantiateClosure(fn, [], runtime.frame([])))).toBe('<fn greet>');
  });

  it('looks through upvalue indirection', () => {
    const runtime = testRuntime();
    const storage = runtime.values.alloc(Value.Number(7));

    expect(stringify(Value.UpvaluePtr(storage))).toBe('7');
    expect(stringify(Value.OpenUpvalue(new SharedCell(runtime.string('hi'))))).toBe('hi');
  });
});

describe('valueEquals', () => {
  it('compares scalars by value', () => {
    expect(valueEquals(Value.Number(1), Value.Number(1))).toBe(true);
    expect(valueEquals(Value.Number(1), Value.Number(2))).toBe(false);
    expect(valueEquals(Value.Number(NaN), Value.Number(NaN))).toBe(false);
    expect(valueEquals(Value.Bool(true), Value.Bool(true))).toBe(true);
    expect(valueEquals(Value.Nil(), Value.Nil())).toBe(true);
  });

  it('compares strings by interned content', () => {
    const strings = new Interner();
    const elsewhere = new Interner();

    expect(valueEquals(Value.String(strings.intern('a')), Value.String(strings.intern('a')))).toBe(
      true,
    );
    expect(
      valueEquals(Value.String(strings.intern('a')), Value.String(elsewhere.intern('a'))),
    ).toBe(true);
    expect(valueEquals(Value.String(strings.intern('a')), Value.String(strings.intern('b')))).toBe(
      false,
    );
  });

  it('never equates different variants', () => {
    const runtime = testRuntime();

    expect(valueEquals(Value.Number(1), Value.Bool(true))).toBe(false);
    expect(valueEquals(Value.Nil(), Value.Bool(false))).toBe(false);
    expect(valueEquals(runtime.string('1'), Value.Number(1))).toBe(false);
  });

  it('never equates reference shapes, even with themselves', () => {
    const { closure, pointer, open, storage } = sampleValues();

    expect(valueEquals(closure, closure)).toBe(false);
    expect(valueEquals(pointer, pointer)).toBe(false);
    expect(valueEquals(pointer, Value.UpvaluePtr(storage))).toBe(false);
    expect(valueEquals(open, open)).toBe(false);
    expect(valueEquals(pointer, Value.Bool(false))).toBe(false);
  });
});

describe('predicates', () => {
  it('reports tags', () => {
    const { closure, pointer, empty, open } = sampleValues();

    expect(isString(empty)).toBe(true);
    expect(isString(Value.Nil())).toBe(false);
    expect(isFunction(closure)).toBe(true);
    expect(isFunction(pointer)).toBe(false);
    expect(isUpvaluePtr(pointer)).toBe(true);
    expect(isUpvaluePtr(open)).toBe(false);
    expect(kindOf(open)).toBe('OpenUpvalue');
  });
});

describe('inspect', () => {
  it('renders every variant', () => {
    const runtime = testRuntime();
    const storage = runtime.values.alloc(Value.Number(1));
    const fn = runtime.defineFunction('f', 0, new Chunk());
    const closure = instantiateClosure(fn, [{ index: 0, isLocal: true }], runtime.frame([Value.Nil()]));

    expect(inspect(Value.Number(3))).toBe('Number(3)');
    expect(inspect(Value.Bool(false))).toBe('Bool(false)');
    expect(inspect(Value.Nil())).toBe('Nil');
    expect(inspect(runtime.string('hi'))).toBe('String("hi")');
    expect(inspect(closure)).toBe('Closure(<fn f>, 1 upvalue)');
    expect(inspect(Value.UpvaluePtr(storage))).toBe('UpvaluePtr(slot 0, gen 0)');
    expect(inspect(Value.OpenUpvalue(new SharedCell(Value.Number(1))))).toBe(
      'OpenUpvalue(Number(1))',
    );
  });

  it('does not fail on reclaimed or released referents', () => {
    const runtime = testRuntime();
    const fn = runtime.defineFunction('gone', 0, new Chunk());
    const closure = instantiateClosure(fn, [], runtime.frame([]));
    const cell = new SharedCell(Value.Nil());
    runtime.functions.free(fn);
    cell.release();

    expect(inspect(closure)).toBe('Closure(<reclaimed>, 0 upvalues)');
    expect(inspect(Value.OpenUpvalue(cell))).toBe('OpenUpvalue(<released>)');
  });
});

describe('UpvaluePtr construction', () => {
  it('accepts storage holding a value or an open upvalue', () => {
    const runtime = testRuntime();
    const closed = runtime.values.alloc(Value.Number(1));
    const open = runtime.values.alloc(Value.OpenUpvalue(new SharedCell(Value.Number(2))));

    expect(isUpvaluePtr(Value.UpvaluePtr(closed))).toBe(true);
    expect(isUpvaluePtr(Value.UpvaluePtr(open))).toBe(true);
  });

  it('rejects a pointer to a pointer', () => {
    const runtime = testRuntime();
    const inner = runtime.values.alloc(Value.Number(1));
    const outer = runtime.values.alloc(Value.UpvaluePtr(inner));

    expect(() => Value.UpvaluePtr(outer)).toThrow(InvariantViolation);
    expect(() => Value.UpvaluePtr(outer)).toThrow(
      'Invariant violated: UpvaluePtr to slot 1 would point at another UpvaluePtr',
    );
  });

  it('rejects a pointer to reclaimed storage', () => {
    const runtime = testRuntime();
    const storage = runtime.values.alloc(Value.Number(1));
    runtime.values.free(storage);

    expect(() => Value.UpvaluePtr(storage)).toThrow(InvariantViolation);
  });
});
