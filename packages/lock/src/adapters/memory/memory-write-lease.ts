import { leaseReleasedError } from "../../core/errors"
import type { WriteLease } from "../../ports/write-lease"

export type MemoryWriteLeaseDeps<T> = {
  current: () => T
  commit: (value: T) => void
  onRelease: () => void
}

export class MemoryWriteLease<T> implements WriteLease<T> {
  private isReleased = false

  public constructor(private readonly deps: MemoryWriteLeaseDeps<T>) {}

  public get released(): boolean {
    return this.isReleased
  }

  public current(): T {
    return this.deps.current()
  }

  public commit(value: T): void {
    if (this.isReleased) throw leaseReleasedError()

    this.deps.commit(value)
  }

  public release(): void {
    if (this.isReleased) return

    this.isReleased = true
    this.deps.onRelease()
  }
}
