import { InvalidArgumentError } from "../../core/errors/invalid-argument-error"
import type { CacheEvictionPolicy } from "../cache-eviction-policy"
import type { CacheHooks } from "../cache-options"
import type { SimpleCache } from "../simple-cache"

export type SimpleCacheHarness = {
  name: string
  policy: CacheEvictionPolicy
  make: (capacity: number, hooks?: CacheHooks<string>) => SimpleCache<string, number>
  /** `get` consumes the entry it returns. */
  readsRemove?: boolean
}

export function describeSimpleCacheContract(h: SimpleCacheHarness): void {
  describe(`${h.name} (SimpleCache contract)`, () => {
    describe("construction", () => {
      it.each([0, -1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])(
        "rejects capacity %s",
        (capacity) => {
          expect(() => h.make(capacity)).toThrow(InvalidArgumentError)
        },
      )

      it("names the rejected capacity in the error", () => {
        expect(() => h.make(0)).toThrow("capacity must be a positive integer, got: 0")
      })

      it("exposes capacity and policy", () => {
        const cache = h.make(3)

        expect(cache.capacity).toBe(3)
        expect(cache.policy).toBe(h.policy)
        expect(cache.size()).toBe(0)
      })
    })

    describe("below capacity", () => {
      it("keeps every distinct key with its last written value", () => {
        const cache = h.make(5)

        for (let i = 0; i < 5; i++) cache.set(`k${i}`, i)
        cache.set("k2", 20)

        expect(cache.size()).toBe(5)
        expect(cache.get("k0")).toBe(0)
        expect(cache.get("k2")).toBe(20)
        expect(cache.get("k4")).toBe(4)
      })

      it("returns undefined for an absent key", () => {
        const cache = h.make(2)

        cache.set("a", 1)

        expect(cache.get("b")).toBeUndefined()
        expect(cache.size()).toBe(1)
      })
    })

    describe("at capacity", () => {
      it("holds exactly capacity entries after capacity + 1 distinct writes", () => {
        const cache = h.make(3)

        for (let i = 0; i < 4; i++) cache.set(`k${i}`, i)

        expect(cache.size()).toBe(3)
        expect(cache.keys()).toContain("k3")
      })

      it("never grows past capacity under mixed reads and writes", () => {
        const cache = h.make(4)

        for (let i = 0; i < 40; i++) {
          cache.set(`k${i % 9}`, i)
          cache.get(`k${(i * 7) % 9}`)

          expect(cache.size()).toBeLessThanOrEqual(4)
        }
      })

      if (h.readsRemove !== true) {
        it("stays full when reads are interleaved with overflow", () => {
          const cache = h.make(2)

          cache.set("a", 1)
          cache.get("a")
          cache.set("b", 2)
          cache.get("b")
          cache.set("c", 3)

          expect(cache.size()).toBe(2)
        })
      }

      it("works with a capacity of one", () => {
        const cache = h.make(1)

        cache.set("a", 1)
        cache.set("b", 2)

        expect(cache.keys()).toStrictEqual(["b"])
        expect(cache.get("a")).toBeUndefined()
      })

      it("does not evict on overwrite of a present key", () => {
        const onEvict = vi.fn()
        const cache = h.make(2, { onEvict })

        cache.set("a", 1)
        cache.set("b", 2)
        cache.set("a", 3)

        expect(onEvict).not.toHaveBeenCalled()
        expect(cache.size()).toBe(2)
      })

      it("reports each eviction with the removed key", () => {
        const onEvict = vi.fn()
        const cache = h.make(2, { onEvict })

        cache.set("a", 1)
        cache.set("b", 2)
        cache.set("c", 3)

        expect(onEvict).toHaveBeenCalledTimes(1)

        const [evicted] = onEvict.mock.calls[0] ?? []

        expect(["a", "b"]).toContain(evicted)
        expect(cache.keys()).not.toContain(evicted)
      })
    })

    describe("clear", () => {
      it("empties the cache without reporting evictions", () => {
        const onEvict = vi.fn()
        const cache = h.make(3, { onEvict })

        cache.set("a", 1)
        cache.set("b", 2)
        cache.clear()

        expect(cache.keys()).toStrictEqual([])
        expect(cache.get("a")).toBeUndefined()
        expect(cache.get("b")).toBeUndefined()
        expect(onEvict).not.toHaveBeenCalled()
      })

      it("is a no-op on an empty cache", () => {
        const cache = h.make(1)

        cache.clear()

        expect(cache.size()).toBe(0)
      })
    })

    describe("keys and toString", () => {
      it("keys() is a copy", () => {
        const cache = h.make(3)

        cache.set("a", 1)

        const keys = cache.keys()
        keys.push("b")

        expect(cache.keys()).toStrictEqual(["a"])
      })

      it("renders entries in store order", () => {
        const cache = h.make(3)

        expect(cache.toString()).toBe("{}")

        cache.set("a", 1)
        cache.set("b", 2)

        expect(cache.toString()).toBe("{a: 1, b: 2}")
      })
    })
  })
}
