export { type MemoryAdapterOptions, memoryAdapter } from "./adapter.js";
export { LockNotAvailableError } from "./row-locks.js";
