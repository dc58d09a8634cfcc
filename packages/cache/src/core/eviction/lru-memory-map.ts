import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { EvictionMap } from "./eviction-map"
import { firstKey } from "./fifo-memory-map"

/**
 * Recency-ordered map: the first key is the least recently used, the last
 * the most recently used. Both reads and writes count as use.
 */
export class LruMemoryMap<K, V> implements EvictionMap<K, V> {
  readonly policy: CacheEvictionPolicy = "lru"

  // Values are boxed: a stored `undefined` still marks the key present.
  protected readonly map = new Map<K, { value: V }>()

  get(key: K): V | undefined {
    const entry = this.map.get(key)

    if (entry === undefined) return undefined

    this.markMostRecentlyUsed(key, entry)

    return entry.value
  }

  peek(key: K): V | undefined {
    return this.map.get(key)?.value
  }

  set(key: K, value: V): void {
    this.markMostRecentlyUsed(key, { value })
  }

  delete(key: K): boolean {
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
  }

  victim(): K | undefined {
    return firstKey(this.map)
  }

  keys(): K[] {
    return [...this.map.keys()]
  }

  entries(): [K, V][] {
    return [...this.map].map(([key, entry]): [K, V] => [key, entry.value])
  }

  protected markMostRecentlyUsed(key: K, entry: { value: V }): void {
    this.map.delete(key)
    this.map.set(key, entry)
  }
}
