/**
 * Exclusive right to replace the value held by a {@link ReadWriteLock}.
 */
export interface WriteLease<T> {
  readonly released: boolean

  /** The value readers currently see. */
  current(): T

  /**
   * Swap in `value`. Readers observe either the previous value or this one,
   * never anything in between. Throws once the lease is released.
   */
  commit(value: T): void

  /** Give up the lease and hand it to the next waiting writer. Idempotent. */
  release(): void
}
