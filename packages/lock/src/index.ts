export { MemoryReadWriteLock } from "./adapters/memory/memory-read-write-lock"
export type { LockError, LockErrorCode } from "./core/errors"
export { tryWithWriteLock, withWriteLock } from "./core/with-lock"
export type { AcquireWriteOptions, Milliseconds } from "./ports/options"
export type { ReadWriteLock } from "./ports/read-write-lock"
export type { WriteLease } from "./ports/write-lease"
