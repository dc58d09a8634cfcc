import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import { LruMemoryMap } from "./lru-memory-map"

/**
 * Same recency ordering as LRU, but the victim is the most recently used key.
 *
 * The owning cache evicts before it inserts, so on overflow the previous
 * most-recent entry goes and the incoming key always survives.
 */
export class MruMemoryMap<K, V> extends LruMemoryMap<K, V> {
  override readonly policy: CacheEvictionPolicy = "mru"

  // Last key of `map` whenever it is defined and still present.
  private newest: K | undefined

  override delete(key: K): boolean {
    if (key === this.newest) this.newest = undefined

    return super.delete(key)
  }

  override clear(): void {
    this.newest = undefined

    super.clear()
  }

  override victim(): K | undefined {
    if (this.newest !== undefined && this.map.has(this.newest)) return this.newest

    let last: K | undefined
    for (const key of this.map.keys()) last = key

    this.newest = last

    return last
  }

  protected override markMostRecentlyUsed(key: K, entry: { value: V }): void {
    super.markMostRecentlyUsed(key, entry)

    this.newest = key
  }
}
