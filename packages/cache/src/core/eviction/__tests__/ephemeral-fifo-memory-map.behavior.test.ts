import { EphemeralFifoMemoryMap } from "../ephemeral-fifo-memory-map"

describe("EphemeralFifoMemoryMap (behavior)", () => {
  let map: EphemeralFifoMemoryMap<string, number>

  beforeEach(() => {
    map = new EphemeralFifoMemoryMap()
  })

  it("reports its policy", () => {
    expect(map.policy).toBe("ephemeral-fifo")
  })

  it("hands a value out once", () => {
    map.set("a", 1)

    expect(map.get("a")).toBe(1)
    expect(map.get("a")).toBeUndefined()
    expect(map.size()).toBe(0)
  })

  it("a read of an absent key changes nothing", () => {
    map.set("a", 1)

    expect(map.get("b")).toBeUndefined()
    expect(map.keys()).toStrictEqual(["a"])
  })

  it("peek does not consume", () => {
    map.set("a", 1)

    expect(map.peek("a")).toBe(1)
    expect(map.get("a")).toBe(1)
  })

  it("consuming the oldest entry advances the victim", () => {
    map.set("a", 1)
    map.set("b", 2)

    map.get("a")

    expect(map.victim()).toBe("b")
  })

  it("keeps an overwritten key in its original slot", () => {
    map.set("a", 1)
    map.set("b", 2)
    map.set("a", 3)

    expect(map.victim()).toBe("a")
    expect(map.get("a")).toBe(3)
  })
})
