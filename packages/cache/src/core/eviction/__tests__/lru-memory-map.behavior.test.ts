import { LruMemoryMap } from "../lru-memory-map"

describe("LruMemoryMap (behavior)", () => {
  let map: LruMemoryMap<string, number>

  beforeEach(() => {
    map = new LruMemoryMap()
    map.set("a", 1)
    map.set("b", 2)
    map.set("c", 3)
  })

  it("reports its policy", () => {
    expect(map.policy).toBe("lru")
  })

  it("picks the least recently used key", () => {
    expect(map.victim()).toBe("a")
  })

  it("a read moves the key to the most recent end", () => {
    expect(map.get("a")).toBe(1)

    expect(map.victim()).toBe("b")
    expect(map.keys()).toStrictEqual(["b", "c", "a"])
  })

  it("an overwrite counts as use", () => {
    map.set("a", 10)

    expect(map.victim()).toBe("b")
    expect(map.entries()).toStrictEqual([
      ["b", 2],
      ["c", 3],
      ["a", 10],
    ])
  })

  it("a miss does not reorder", () => {
    expect(map.get("zzz")).toBeUndefined()

    expect(map.keys()).toStrictEqual(["a", "b", "c"])
  })

  it("peek does not count as use", () => {
    map.peek("a")

    expect(map.victim()).toBe("a")
  })

  it("follows a mixed access pattern", () => {
    map.get("a")
    map.delete("b")
    map.set("d", 4)
    map.get("c")

    expect(map.keys()).toStrictEqual(["a", "d", "c"])
    expect(map.victim()).toBe("a")
  })

  it("a read of a stored undefined still counts as use", () => {
    const optional = new LruMemoryMap<string, number | undefined>()
    optional.set("a", undefined)
    optional.set("b", 2)

    expect(optional.get("a")).toBeUndefined()

    expect(optional.keys()).toStrictEqual(["b", "a"])
    expect(optional.victim()).toBe("b")
  })
})
