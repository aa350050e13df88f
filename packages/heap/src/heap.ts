import { invariant } from './error.js';
import type { HeapLogger } from './log.js';
import type { Ref, RefMut } from './ref.js';

/**
 * Non-owning handle to a heap slot. `upgrade` yields temporary access and
 * fails once the slot has been reclaimed.
 */
export interface GcWeak<T> {
  readonly index: number;
  readonly generation: number;
  isAlive(): boolean;
  upgrade(): Ref<T> | undefined;
  /** Like `upgrade`, but a reclaimed referent is an invariant violation. */
  unwrapUpgrade(): Ref<T>;
}

export interface GcWeakMut<T> extends GcWeak<T> {
  upgrade(): RefMut<T> | undefined;
  unwrapUpgrade(): RefMut<T>;
}

export interface HeapOptions {
  log?: HeapLogger;
}

interface LiveSlot<T> {
  state: 'live';
  generation: number;
  value: T;
}

interface FreeSlot {
  state: 'free';
  generation: number;
  nextFree: number | null;
}

type Slot<T> = LiveSlot<T> | FreeSlot;

/**
 * Arena of generation-tagged slots. The heap owns every value stored in it;
 * everything handed out is a weak `(index, generation)` pair.
 */
export class Heap<T> {
  private readonly slots: Slot<T>[] = [];
  private freeHead: number | null = null;
  private live = 0;

  constructor(private readonly options: HeapOptions = {}) {}

  get size(): number {
    return this.live;
  }

  alloc(value: T): GcWeakMut<T> {
    let index: number;
    let generation: number;

    if (this.freeHead === null) {
      index = this.slots.length;
      generation = 0;
    } else {
      const slot = this.slots[this.freeHead];
      invariant(slot !== undefined && slot.state === 'free', 'free list points at a live slot');
      index = this.freeHead;
      generation = slot.generation;
      this.freeHead = slot.nextFree;
    }

    this.slots[index] = { state: 'live', generation, value };
    this.live++;
    this.options.log?.({ kind: 'alloc', index, generation });
    return this.weak(index, generation);
  }

  free(ref: GcWeak<T>): void {
    const slot = this.lookup(ref.index, ref.generation);
    invariant(slot, `slot ${ref.index} (gen ${ref.generation}) freed twice`);

    this.slots[ref.index] = {
      state: 'free',
      generation: slot.generation + 1,
      nextFree: this.freeHead,
    };
    this.freeHead = ref.index;
    this.live--;
    this.options.log?.({ kind: 'free', index: ref.index, generation: ref.generation });
  }

  isLive(ref: GcWeak<T>): boolean {
    return this.lookup(ref.index, ref.generation) !== undefined;
  }

  private lookup(index: number, generation: number): LiveSlot<T> | undefined {
    const slot = this.slots[index];
    if (slot === undefined || slot.state !== 'live' || slot.generation !== generation) {
      return undefined;
    }
    return slot;
  }

  private resolve(index: number, generation: number): LiveSlot<T> {
    const slot = this.lookup(index, generation);
    invariant(slot, `upgrade of reclaimed slot ${index} (gen ${generation})`);
    return slot;
  }

  private weak(index: number, generation: number): GcWeakMut<T> {
    // Access re-validates the generation, so a ref outliving its slot fails
    // instead of reading whatever reuses it.
    const access: RefMut<T> = {
      get: () => this.resolve(index, generation).value,
      set: (value) => {
        this.resolve(index, generation).value = value;
      },
    };

    return {
      index,
      generation,
      isAlive: () => this.lookup(index, generation) !== undefined,
      upgrade: () => (this.lookup(index, generation) === undefined ? undefined : access),
      unwrapUpgrade: () => {
        this.resolve(index, generation);
        return access;
      },
    };
  }
}
