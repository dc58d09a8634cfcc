import { MruCache, SimpleMruCache } from "../mru-cache"

describe("MruCache (behavior)", () => {
  it("evicts the key touched last", async () => {
    const cache = new MruCache<string, number>(2)

    await cache.set("A", 1)
    await cache.set("B", 2)
    await cache.get("B")
    await cache.set("C", 3)

    await expect(cache.get("B")).resolves.toBeUndefined()
    await expect(cache.get("A")).resolves.toBe(1)
    await expect(cache.get("C")).resolves.toBe(3)
  })

  it("a read makes an older key the next victim", async () => {
    const evicted: string[] = []
    const cache = new MruCache<string, number>(2, { onEvict: (key) => evicted.push(key) })

    await cache.set("A", 1)
    await cache.set("B", 2)
    await cache.get("A")
    await cache.set("C", 3)

    expect(evicted).toStrictEqual(["A"])
    expect(cache.keys()).toStrictEqual(["B", "C"])
  })

  it("always keeps the newest write", () => {
    const cache = new SimpleMruCache<string, number>(2)

    for (let i = 0; i < 10; i++) cache.set(`k${i}`, i)

    expect(cache.keys()).toStrictEqual(["k0", "k9"])
  })
})
