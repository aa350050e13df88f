import type { GcWeakMut } from '@loxcell/heap';
import { Runtime, valueEdges, type Value } from '../src/index.js';

export function testRuntime(): Runtime {
  return new Runtime({ traceHeap: false });
}

export function capturedAt(closure: Value, index: number): GcWeakMut<Value> {
  const ref = valueEdges(closure).values[index];
  if (ref === undefined) throw new Error(`closure has no upvalue ${index}`);
  return ref;
}
