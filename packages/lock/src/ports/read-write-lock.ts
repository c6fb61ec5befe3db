import type { AcquireWriteOptions } from "./options"
import type { WriteLease } from "./write-lease"

/**
 * Many-reader / single-writer guard around one value.
 *
 * Reads are synchronous and shared: they never wait for each other or for a
 * writer, and always see a whole value. Writers are exclusive and served in
 * arrival order.
 */
export interface ReadWriteLock<T> {
  /**
   * Run `fn` against the current value inside a read section.
   *
   * The value must not be retained past `fn`.
   */
  read<R>(fn: (value: T) => R): R

  /**
   * Wait for the write lease.
   *
   * @returns The lease, or `null` if the timeout elapsed or the signal was
   *          aborted first.
   */
  acquireWrite(opts?: AcquireWriteOptions): Promise<WriteLease<T> | null>

  /**
   * Take the write lease only if no writer holds it or is waiting for it.
   */
  tryAcquireWrite(): WriteLease<T> | null

  readonly activeReaders: number
  readonly isWriteLocked: boolean
  readonly pendingWriters: number
}
