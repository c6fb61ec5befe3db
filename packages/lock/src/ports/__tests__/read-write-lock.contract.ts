import { isAppError } from "@barconf/errors"
import type { ReadWriteLock } from "../read-write-lock"
import type { WriteLease } from "../write-lease"

export type ReadWriteLockHarness = {
  name: string
  make: <T>(initial: T) => ReadWriteLock<T>
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    return isAppError(err) ? err.code : "not-an-app-error"
  }
  return undefined
}

export function describeReadWriteLockContract(h: ReadWriteLockHarness) {
  describe(`${h.name} (ReadWriteLock contract)`, () => {
    describe("read", () => {
      it("runs fn against the initial value and returns its result", () => {
        const lock = h.make({ port: 1 })

        expect(lock.read((v) => v.port + 1)).toBe(2)
      })

      it("counts nested read sections and closes them", () => {
        const lock = h.make("v")

        const seen = lock.read(() => lock.read(() => lock.activeReaders))

        expect(seen).toBe(2)
        expect(lock.activeReaders).toBe(0)
      })

      it("closes the read section when fn throws", () => {
        const lock = h.make("v")

        expect(() =>
          lock.read(() => {
            throw new Error("boom")
          }),
        ).toThrow("boom")
        expect(lock.activeReaders).toBe(0)
      })

      it("is not blocked by a held write lease", () => {
        const lock = h.make("old")
        const lease = lock.tryAcquireWrite()

        expect(lease).not.toBeNull()
        expect(lock.read((v) => v)).toBe("old")

        lease?.release()
      })
    })

    describe("tryAcquireWrite", () => {
      it("grants one lease at a time", () => {
        const lock = h.make(0)

        const a = lock.tryAcquireWrite()
        expect(a).not.toBeNull()
        expect(lock.isWriteLocked).toBe(true)
        expect(lock.tryAcquireWrite()).toBeNull()

        a?.release()

        expect(lock.isWriteLocked).toBe(false)
        const b = lock.tryAcquireWrite()
        expect(b).not.toBeNull()
        b?.release()
      })
    })

    describe("commit", () => {
      it("swaps the value seen by later reads", () => {
        const lock = h.make({ generation: 0 })
        const lease = lock.tryAcquireWrite()

        expect(lease?.current()).toEqual({ generation: 0 })

        lease?.commit({ generation: 1 })
        lease?.release()

        expect(lock.read((v) => v.generation)).toBe(1)
      })

      it("refuses to commit inside a read section", () => {
        const lock = h.make("old")
        const lease = lock.tryAcquireWrite()

        const code = lock.read(() => codeOf(() => lease?.commit("new")))

        expect(code).toBe("lock_commit_during_read")
        expect(lock.read((v) => v)).toBe("old")

        lease?.release()
      })

      it("refuses to commit after release", () => {
        const lock = h.make("old")
        const lease = lock.tryAcquireWrite()

        lease?.release()

        expect(lease?.released).toBe(true)
        expect(codeOf(() => lease?.commit("new"))).toBe("lock_lease_released")
        expect(lock.read((v) => v)).toBe("old")
      })

      it("release is idempotent", () => {
        const lock = h.make(0)
        const first = lock.tryAcquireWrite()

        first?.release()
        const second = lock.tryAcquireWrite()
        first?.release()

        expect(second).not.toBeNull()
        expect(lock.isWriteLocked).toBe(true)

        second?.release()
      })
    })

    describe("acquireWrite", () => {
      it("resolves immediately when free", async () => {
        const lock = h.make(0)

        const lease = await lock.acquireWrite()

        expect(lease).not.toBeNull()
        lease?.release()
      })

      it("waits for the holder and serves writers in arrival order", async () => {
        const lock = h.make<string[]>([])
        const holder = lock.tryAcquireWrite()

        const append = (name: string) => async (lease: WriteLease<string[]> | null) => {
          if (!lease) return
          lease.commit([...lease.current(), name])
          lease.release()
        }

        const first = lock.acquireWrite().then(append("first"))
        const second = lock.acquireWrite().then(append("second"))

        expect(lock.pendingWriters).toBe(2)

        holder?.release()
        await Promise.all([first, second])

        expect(lock.read((v) => v)).toEqual(["first", "second"])
        expect(lock.isWriteLocked).toBe(false)
      })

      it("returns null at once for timeoutMs 0 when held", async () => {
        const lock = h.make(0)
        const holder = lock.tryAcquireWrite()

        await expect(lock.acquireWrite({ timeoutMs: 0 })).resolves.toBeNull()
        expect(lock.pendingWriters).toBe(0)

        holder?.release()
      })

      it("returns null when the timeout elapses", async () => {
        const lock = h.make(0)
        const holder = lock.tryAcquireWrite()

        await expect(lock.acquireWrite({ timeoutMs: 20 })).resolves.toBeNull()
        expect(lock.pendingWriters).toBe(0)

        holder?.release()
        expect(lock.isWriteLocked).toBe(false)
      })

      it("returns null when aborted while waiting", async () => {
        const lock = h.make(0)
        const holder = lock.tryAcquireWrite()
        const ac = new AbortController()

        const pending = lock.acquireWrite({ signal: ac.signal })
        ac.abort()

        await expect(pending).resolves.toBeNull()
        expect(lock.pendingWriters).toBe(0)

        holder?.release()
      })

      it("returns null for an already aborted signal", async () => {
        const lock = h.make(0)
        const ac = new AbortController()
        ac.abort()

        await expect(lock.acquireWrite({ signal: ac.signal })).resolves.toBeNull()
        expect(lock.isWriteLocked).toBe(false)
      })

      it("rejects an invalid timeout", async () => {
        const lock = h.make(0)

        await expect(lock.acquireWrite({ timeoutMs: -1 })).rejects.toMatchObject({
          code: "lock_invalid_option",
        })
      })
    })
  })
}
