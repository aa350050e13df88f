/** Read access to a storage location. */
export interface Ref<T> {
  get(): T;
}

/** Read/write access to a storage location: a heap slot, a frame slot or a shared cell. */
export interface RefMut<T> extends Ref<T> {
  set(value: T): void;
}
