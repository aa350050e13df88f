export { Value, upvaluePtr } from './value.js';
export { InternedString, Interner } from './interner.js';
export { Chunk } from './chunk.js';
export { type CompiledFunction, type UpvalueDescriptor, stringifyFunction } from './function.js';
export {
  type ValueKind,
  kindOf,
  isString,
  isFunction,
  isUpvaluePtr,
  isTruthy,
  isFalsey,
  stringify,
  valueEquals,
  updateNumber,
  inspect,
} from './ops.js';
export { type Ok, type Err, type Result, ok, err, isOk, isErr } from './result.js';
export {
  type CoercionError,
  type Coerced,
  toNumber,
  toBool,
  toBoolMut,
  toInternedString,
} from './coerce.js';
export { Frame, instantiateClosure, readCaptured, writeCaptured } from './capture.js';
export { type ValueEdges, valueEdges } from './edges.js';
export { functionDeepEq, chunkDeepEq } from './deep-eq.js';
export { type RuntimeConfig, loadRuntimeConfig } from './config.js';
export { Runtime } from './runtime.js';
