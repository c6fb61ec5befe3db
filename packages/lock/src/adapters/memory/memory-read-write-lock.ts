import { commitDuringReadError } from "../../core/errors"
import { assertValidTimeMs } from "../../core/validation/validation"
import type { AcquireWriteOptions } from "../../ports/options"
import type { ReadWriteLock } from "../../ports/read-write-lock"
import type { WriteLease } from "../../ports/write-lease"
import { MemoryWriteLease } from "./memory-write-lease"

type Waiter<T> = {
  grant: (lease: MemoryWriteLease<T>) => void
}

export class MemoryReadWriteLock<T> implements ReadWriteLock<T> {
  private value: T
  private readers = 0
  private writer: MemoryWriteLease<T> | null = null
  private readonly waiters: Waiter<T>[] = []

  public constructor(initial: T) {
    this.value = initial
  }

  public get activeReaders(): number {
    return this.readers
  }

  public get isWriteLocked(): boolean {
    return this.writer !== null
  }

  public get pendingWriters(): number {
    return this.waiters.length
  }

  public read<R>(fn: (value: T) => R): R {
    this.readers++

    try {
      return fn(this.value)
    } finally {
      this.readers--
    }
  }

  public tryAcquireWrite(): WriteLease<T> | null {
    if (this.writer || this.waiters.length > 0) return null

    return this.grant()
  }

  public async acquireWrite(opts: AcquireWriteOptions = {}): Promise<WriteLease<T> | null> {
    if (opts.signal?.aborted) return null

    if (opts.timeoutMs !== undefined) {
      assertValidTimeMs(opts.timeoutMs, "acquireWrite timeoutMs")
    }

    const immediate = this.tryAcquireWrite()
    if (immediate) return immediate
    if (opts.timeoutMs === 0) return null

    return await this.enqueue(opts)
  }

  private enqueue(opts: AcquireWriteOptions): Promise<WriteLease<T> | null> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | null = null

      const settle = (lease: MemoryWriteLease<T> | null) => {
        if (timer) clearTimeout(timer)
        opts.signal?.removeEventListener("abort", abandon)
        resolve(lease)
      }

      const waiter: Waiter<T> = { grant: settle }

      const abandon = () => {
        const index = this.waiters.indexOf(waiter)
        if (index !== -1) this.waiters.splice(index, 1)
        settle(null)
      }

      this.waiters.push(waiter)

      if (opts.timeoutMs !== undefined) {
        timer = setTimeout(abandon, opts.timeoutMs)
        timer.unref?.()
      }

      opts.signal?.addEventListener("abort", abandon, { once: true })
    })
  }

  private grant(): MemoryWriteLease<T> {
    const lease = new MemoryWriteLease<T>({
      current: () => this.value,
      commit: (value) => {
        if (this.readers > 0) throw commitDuringReadError(this.readers)

        this.value = value
      },
      onRelease: () => {
        if (this.writer !== lease) return

        this.writer = null
        this.handOff()
      },
    })

    this.writer = lease
    return lease
  }

  private handOff(): void {
    const next = this.waiters.shift()
    if (!next) return

    next.grant(this.grant())
  }
}
