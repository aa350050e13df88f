import { invariant } from './error.js';
import type { RefMut } from './ref.js';

/**
 * Owning, reference-counted, interior-mutable cell.
 *
 * Every holder sees the same storage, so a `set` through one holder is
 * observed by all others. The cell stays usable until its last holder calls
 * `release`.
 */
export class SharedCell<T> implements RefMut<T> {
  private holders = 1;

  constructor(private value: T) {}

  get strongCount(): number {
    return this.holders;
  }

  get(): T {
    this.assertAlive();
    return this.value;
  }

  set(value: T): void {
    this.assertAlive();
    this.value = value;
  }

  replace(value: T): T {
    const previous = this.get();
    this.value = value;
    return previous;
  }

  update(fn: (value: T) => T): void {
    this.set(fn(this.get()));
  }

  /** Registers one more holder and returns the same cell. */
  share(): this {
    this.assertAlive();
    this.holders++;
    return this;
  }

  release(): void {
    this.assertAlive();
    this.holders--;
  }

  private assertAlive(): void {
    invariant(this.holders > 0, 'shared cell used after its last holder released it');
  }
}
