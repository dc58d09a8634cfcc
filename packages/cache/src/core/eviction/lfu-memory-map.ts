import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { EvictionMap } from "./eviction-map"

/**
 * Frequency-ordered map. Every key carries a use count that starts at 1 when
 * the key is first written and grows by one on each read. Overwrites keep
 * both the count and the insertion position.
 *
 * The victim is the key with the lowest count; among equal counts, the
 * oldest-inserted key.
 */
export class LfuMemoryMap<K, V> implements EvictionMap<K, V> {
  readonly policy: CacheEvictionPolicy = "lfu"

  private readonly map = new Map<K, V>()
  private readonly frequencies = new Map<K, number>()

  get(key: K): V | undefined {
    const count = this.frequencies.get(key)

    if (count === undefined) return undefined

    this.frequencies.set(key, count + 1)

    return this.map.get(key)
  }

  peek(key: K): V | undefined {
    return this.map.get(key)
  }

  set(key: K, value: V): void {
    if (!this.frequencies.has(key)) this.frequencies.set(key, 1)

    this.map.set(key, value)
  }

  delete(key: K): boolean {
    this.frequencies.delete(key)

    return this.map.delete(key)
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  size(): number {
    return this.map.size
  }

  clear(): void {
    this.map.clear()
    this.frequencies.clear()
  }

  /** Current use count of `key`, or `undefined` if absent. */
  frequency(key: K): number | undefined {
    return this.frequencies.get(key)
  }

  // Both maps gain a key at the same moment and never reorder, so iterating
  // `frequencies` walks keys oldest-inserted first.
  victim(): K | undefined {
    let victim: K | undefined
    let lowest = Number.POSITIVE_INFINITY

    for (const [key, count] of this.frequencies) {
      if (count < lowest) {
        victim = key
        lowest = count
      }
    }

    return victim
  }

  keys(): K[] {
    return [...this.map.keys()]
  }

  entries(): [K, V][] {
    return [...this.map.entries()]
  }
}
