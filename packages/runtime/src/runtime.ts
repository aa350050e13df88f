import { Heap, consoleHeapLogger, invariant, type GcWeak } from '@loxcell/heap';
import { Frame } from './capture.js';
import type { Chunk } from './chunk.js';
import { loadRuntimeConfig, type RuntimeConfig } from './config.js';
import type { CompiledFunction } from './function.js';
import { Interner } from './interner.js';
import { Value } from './value.js';

/** The heaps and intern table a VM instance runs against. */
export class Runtime {
  readonly strings = new Interner();
  readonly values: Heap<Value>;
  readonly functions: Heap<CompiledFunction>;

  constructor(readonly config: RuntimeConfig = loadRuntimeConfig()) {
    this.values = new Heap<Value>({
      log: config.traceHeap ? consoleHeapLogger('values') : undefined,
    });
    this.functions = new Heap<CompiledFunction>({
      log: config.traceHeap ? consoleHeapLogger('functions') : undefined,
    });
  }

  defineFunction(name: string, arity: number, chunk: Chunk): GcWeak<CompiledFunction> {
    invariant(Number.isInteger(arity) && arity >= 0, `invalid arity ${arity} for ${name}`);
    return this.functions.alloc({ name: this.strings.intern(name), arity, chunk });
  }

  string(text: string): Value {
    return Value.String(this.strings.intern(text));
  }

  frame(locals: Value[]): Frame {
    return new Frame(this.values, locals);
  }
}
