export type HeapEvent =
  | { kind: 'alloc'; index: number; generation: number }
  | { kind: 'free'; index: number; generation: number };

export type HeapLogger = (event: HeapEvent) => void;

export function formatHeapEvent(name: string, event: HeapEvent): string {
  return `[heap:${name}] ${event.kind} slot ${event.index} (gen ${event.generation})`;
}

export function consoleHeapLogger(name: string): HeapLogger {
  return (event) => {
    console.debug(formatHeapEvent(name, event));
  };
}
