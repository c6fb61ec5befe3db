import type { AcquireWriteOptions } from "../ports/options"
import type { ReadWriteLock } from "../ports/read-write-lock"
import type { WriteLease } from "../ports/write-lease"

/**
 * Run `fn` holding the write lease if it is free right now.
 *
 * @returns `null` without calling `fn` when another writer holds or waits for the lease.
 */
export async function tryWithWriteLock<T, R>(
  lock: ReadWriteLock<T>,
  fn: (lease: WriteLease<T>) => Promise<R> | R,
): Promise<R | null> {
  const lease = lock.tryAcquireWrite()

  if (!lease) {
    return null
  }

  try {
    return await fn(lease)
  } finally {
    lease.release()
  }
}

export async function withWriteLock<T, R>(
  lock: ReadWriteLock<T>,
  fn: (lease: WriteLease<T>) => Promise<R> | R,
  opts: AcquireWriteOptions = {},
): Promise<R> {
  if (opts.signal?.aborted) {
    throw new Error("Write lock acquisition aborted")
  }

  const lease = await lock.acquireWrite(opts)
  if (!lease) {
    throw new Error("Failed to acquire write lock")
  }

  try {
    return await fn(lease)
  } finally {
    lease.release()
  }
}
