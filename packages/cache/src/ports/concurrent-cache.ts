import type { CacheEvictionPolicy } from "./cache-eviction-policy"

/**
 * A bounded cache safe to share between concurrent async callers.
 *
 * `get`, `set` and `clear` are applied one at a time, in the order callers
 * reached the cache's lock. The synchronous accessors read a consistent
 * snapshot: nothing else runs while they do.
 */
export interface ConcurrentCache<K, V> {
  readonly capacity: number
  readonly policy: CacheEvictionPolicy

  get(key: K): Promise<V | undefined>
  set(key: K, value: V): Promise<void>
  clear(): Promise<void>

  keys(): K[]
  size(): number
  toString(): string
}
