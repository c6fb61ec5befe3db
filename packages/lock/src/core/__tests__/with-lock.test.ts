import { mock } from "vitest-mock-extended"
import type { ReadWriteLock } from "../../ports/read-write-lock"
import type { WriteLease } from "../../ports/write-lease"
import { tryWithWriteLock, withWriteLock } from "../with-lock"

function makeLease(): WriteLease<number> {
  return mock<WriteLease<number>>()
}

describe("tryWithWriteLock", () => {
  it("runs fn with the lease and releases it", async () => {
    const lease = makeLease()
    const lock = mock<ReadWriteLock<number>>()
    lock.tryAcquireWrite.mockReturnValue(lease)

    const res = await tryWithWriteLock(lock, async (l) => {
      expect(l).toBe(lease)
      return "ok"
    })

    expect(res).toBe("ok")
    expect(lease.release).toHaveBeenCalledTimes(1)
  })

  it("returns null without running fn when the lease is taken", async () => {
    const lock = mock<ReadWriteLock<number>>()
    lock.tryAcquireWrite.mockReturnValue(null)
    const fn = vi.fn(async () => "should-not-run")

    await expect(tryWithWriteLock(lock, fn)).resolves.toBeNull()
    expect(fn).not.toHaveBeenCalled()
  })

  it("releases when fn throws", async () => {
    const lease = makeLease()
    const lock = mock<ReadWriteLock<number>>()
    lock.tryAcquireWrite.mockReturnValue(lease)
    const err = new Error("boom")

    await expect(
      tryWithWriteLock(lock, () => {
        throw err
      }),
    ).rejects.toBe(err)
    expect(lease.release).toHaveBeenCalledTimes(1)
  })
})

describe("withWriteLock", () => {
  it("waits for the lease, runs fn and releases", async () => {
    const lease = makeLease()
    const lock = mock<ReadWriteLock<number>>()
    lock.acquireWrite.mockResolvedValue(lease)

    await expect(withWriteLock(lock, () => 123, { timeoutMs: 50 })).resolves.toBe(123)
    expect(lock.acquireWrite).toHaveBeenCalledWith({ timeoutMs: 50 })
    expect(lease.release).toHaveBeenCalledTimes(1)
  })

  it("throws when the lease is not granted", async () => {
    const lock = mock<ReadWriteLock<number>>()
    lock.acquireWrite.mockResolvedValue(null)
    const fn = vi.fn(() => "should-not-run")

    await expect(withWriteLock(lock, fn)).rejects.toThrow("Failed to acquire write lock")
    expect(fn).not.toHaveBeenCalled()
  })

  it("throws before waiting when already aborted", async () => {
    const lock = mock<ReadWriteLock<number>>()
    const ac = new AbortController()
    ac.abort()

    await expect(withWriteLock(lock, () => 1, { signal: ac.signal })).rejects.toThrow(
      "Write lock acquisition aborted",
    )
    expect(lock.acquireWrite).not.toHaveBeenCalled()
  })

  it("releases when fn throws", async () => {
    const lease = makeLease()
    const lock = mock<ReadWriteLock<number>>()
    lock.acquireWrite.mockResolvedValue(lease)
    const err = new Error("boom")

    await expect(
      withWriteLock(lock, async () => {
        throw err
      }),
    ).rejects.toBe(err)
    expect(lease.release).toHaveBeenCalledTimes(1)
  })
})
