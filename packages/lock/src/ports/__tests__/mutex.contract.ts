import type { Mutex } from "../mutex"

export type MutexHarness = {
  name: string
  make: () => Mutex
}

export function describeMutexContract(h: MutexHarness) {
  describe(`${h.name} (Mutex contract)`, () => {
    let mutex: Mutex

    beforeEach(() => {
      mutex = h.make()
    })

    it("starts unlocked with no pending waiters", () => {
      expect(mutex.isLocked()).toBe(false)
      expect(mutex.pending).toBe(0)
    })

    it("acquire() on a free mutex resolves with a lease", async () => {
      const lease = await mutex.acquire()

      expect(lease).not.toBeNull()
      expect(mutex.isLocked()).toBe(true)
    })

    it("tryAcquire() returns null while held", () => {
      const lease = mutex.tryAcquire()

      expect(lease).not.toBeNull()
      expect(mutex.tryAcquire()).toBeNull()
    })

    it("release() frees the mutex", () => {
      const lease = mutex.tryAcquire()

      lease?.release()

      expect(mutex.isLocked()).toBe(false)
      expect(lease?.released).toBe(true)
    })

    it("release() is idempotent", async () => {
      const first = mutex.tryAcquire()
      const waiting = mutex.acquire()

      first?.release()
      first?.release()

      const second = await waiting

      expect(second).not.toBeNull()
      expect(mutex.isLocked()).toBe(true)
    })

    it("acquire() returns null when the signal is already aborted", async () => {
      const ac = new AbortController()
      ac.abort()

      await expect(mutex.acquire({ signal: ac.signal })).resolves.toBeNull()
      expect(mutex.isLocked()).toBe(false)
    })
  })
}
