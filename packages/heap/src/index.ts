export { InvariantViolation, invariant } from './error.js';
export type { Ref, RefMut } from './ref.js';
export { SharedCell } from './shared-cell.js';
export { Heap, type GcWeak, type GcWeakMut, type HeapOptions } from './heap.js';
export { type HeapEvent, type HeapLogger, consoleHeapLogger, formatHeapEvent } from './log.js';
