export type Milliseconds = number

export type AcquireWriteOptions = {
  /**
   * Max time to wait behind other writers. `0` means "only if free right now".
   * Waits indefinitely when omitted.
   */
  timeoutMs?: Milliseconds

  /** Gives up the wait early. Has no effect once the lease is granted. */
  signal?: AbortSignal
}
