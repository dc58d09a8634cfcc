import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"

/**
 * Eviction-aware key/value storage backing the in-memory caches.
 *
 * Encapsulates ordering and eviction behavior (FIFO, LRU, MRU, LFU) behind a
 * minimal Map-like interface. A map never evicts on its own: the owning cache
 * asks for a `victim()` and deletes it when it needs room.
 */
export interface EvictionMap<K, V> {
  readonly policy: CacheEvictionPolicy

  /**
   * Retrieve the value for the given key.
   *
   * Implementations may update internal ordering as a side effect
   * (touch-on-read for LRU/MRU, frequency bump for LFU, removal for
   * ephemeral FIFO).
   */
  get(key: K): V | undefined

  /**
   * Retrieve the value for the given key without any side effect.
   */
  peek(key: K): V | undefined

  /**
   * Insert or update the value for the given key.
   *
   * Implementations may update internal ordering as a side effect.
   */
  set(key: K, value: V): void

  /**
   * Remove the given key from the map.
   *
   * Returns true if the key was present.
   */
  delete(key: K): boolean

  has(key: K): boolean

  size(): number

  /** Remove every entry and any per-key bookkeeping. */
  clear(): void

  /**
   * Return the next key that should be evicted according to the
   * implementation's eviction policy, or `undefined` if empty.
   */
  victim(): K | undefined

  /** A fresh array of keys in store order. */
  keys(): K[]

  /** A fresh array of `[key, value]` pairs in store order. */
  entries(): [K, V][]
}
