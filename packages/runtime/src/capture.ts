import {
  SharedCell,
  invariant,
  type GcWeak,
  type GcWeakMut,
  type Heap,
  type RefMut,
} from '@loxcell/heap';
import type { CompiledFunction, UpvalueDescriptor } from './function.js';
import { isUpvaluePtr } from './ops.js';
import { Value } from './value.js';

function openCell(value: Value): SharedCell<Value> | undefined {
  return value.tag === 'OpenUpvalue' ? value.cell : undefined;
}

/**
 * Local slots of one call frame.
 *
 * A captured local lives in a `SharedCell` held by both the frame slot and a
 * heap slot, each as `OpenUpvalue`. Closures only keep weak refs to the heap
 * slot, which `close` later overwrites with the plain value.
 */
export class Frame {
  private readonly captured = new Map<number, GcWeakMut<Value>>();

  constructor(
    private readonly heap: Heap<Value>,
    private readonly slots: Value[],
  ) {}

  get length(): number {
    return this.slots.length;
  }

  /** Raw slot access; a captured local reads as its `OpenUpvalue`. */
  slot(index: number): RefMut<Value> {
    this.raw(index);
    return {
      get: () => this.raw(index),
      set: (value) => {
        invariant(!this.captured.has(index), `captured local ${index} is written through setLocal`);
        this.slots[index] = value;
      },
    };
  }

  local(index: number): Value {
    const value = this.raw(index);
    return openCell(value)?.get() ?? value;
  }

  setLocal(index: number, value: Value): void {
    const cell = openCell(this.raw(index));
    if (cell === undefined) {
      this.slots[index] = value;
    } else {
      invariant(!isUpvaluePtr(value), `captured local ${index} cannot hold an UpvaluePtr`);
      cell.set(value);
    }
  }

  isCaptured(index: number): boolean {
    return this.captured.has(index);
  }

  /** Weak ref to the heap storage of local `index`, opened on first capture. */
  capture(index: number): GcWeakMut<Value> {
    const existing = this.captured.get(index);
    if (existing !== undefined) return existing;

    const current = this.raw(index);
    invariant(openCell(current) === undefined, `local ${index} is open but was never captured`);
    invariant(!isUpvaluePtr(current), `local ${index} holds an UpvaluePtr and cannot be captured`);

    const cell = new SharedCell(current);
    this.slots[index] = Value.OpenUpvalue(cell);
    const storage = this.heap.alloc(Value.OpenUpvalue(cell.share()));
    this.captured.set(index, storage);
    return storage;
  }

  /**
   * Promotes every captured local at or above `from` to its heap slot. Weak
   * refs already handed out keep addressing that slot and now see the value.
   */
  close(from = 0): void {
    for (const [index, storage] of this.captured) {
      if (index < from) continue;

      const slot = storage.unwrapUpgrade();
      const cell = openCell(slot.get());
      invariant(cell, `captured local ${index} is no longer open`);

      const value = cell.get();
      invariant(!isUpvaluePtr(value), `captured local ${index} cannot be promoted to an UpvaluePtr`);
      slot.set(value);
      cell.release();
      this.slots[index] = value;
      cell.release();
      this.captured.delete(index);
    }
  }

  private raw(index: number): Value {
    const value = this.slots[index];
    invariant(value !== undefined, `frame has no local ${index}`);
    return value;
  }
}

/**
 * Creates the closure value for `fn`, resolving one captured reference per
 * descriptor, in descriptor order.
 */
export function instantiateClosure(
  fn: GcWeak<CompiledFunction>,
  descriptors: readonly UpvalueDescriptor[],
  frame: Frame,
  enclosing: readonly GcWeakMut<Value>[] = [],
): Value {
  const upvalues = descriptors.map((descriptor) => {
    if (descriptor.isLocal) return frame.capture(descriptor.index);

    const inherited = enclosing[descriptor.index];
    invariant(inherited, `enclosing closure has no upvalue ${descriptor.index}`);
    return inherited;
  });
  return Value.Closure(fn, upvalues);
}

/** Current value of a captured variable, read through its cell while open. */
export function readCaptured(ref: GcWeakMut<Value>): Value {
  const value = ref.unwrapUpgrade().get();
  return openCell(value)?.get() ?? value;
}

/** Writes a captured variable: into its cell while open, else into the heap slot. */
export function writeCaptured(ref: GcWeakMut<Value>, value: Value): void {
  invariant(!isUpvaluePtr(value), 'captured storage cannot hold an UpvaluePtr');

  const slot = ref.unwrapUpgrade();
  const cell = openCell(slot.get());
  if (cell === undefined) {
    slot.set(value);
  } else {
    cell.set(value);
  }
}
