export interface RuntimeConfig {
  /** Print heap allocations and frees through `console.debug`. */
  traceHeap: boolean;
}

export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  const flag = env.LOXCELL_TRACE_HEAP?.trim().toLowerCase();
  return { traceHeap: flag === '1' || flag === 'true' };
}
