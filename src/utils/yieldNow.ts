// Let pending I/O callbacks run before continuing a long handler.
export const yieldNow = () => new Promise<void>((r) => setImmediate(r));
