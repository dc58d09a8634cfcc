import type { CacheEvictionPolicy } from "./cache-eviction-policy"

/**
 * A bounded, single-threaded cache. Every method completes synchronously.
 *
 * @remarks
 * - `size()` never exceeds `capacity`.
 * - `get` and `set` never throw; a missing key is `undefined`.
 */
export interface SimpleCache<K, V> {
  readonly capacity: number
  readonly policy: CacheEvictionPolicy

  /**
   * Value stored under `key`, or `undefined`. May reorder entries, or (for
   * ephemeral caches) remove the entry, according to the policy.
   */
  get(key: K): V | undefined

  /**
   * Insert or overwrite. Inserting a new key into a full cache evicts exactly
   * one entry first.
   */
  set(key: K, value: V): void

  /** Remove every entry. Does not count as eviction. */
  clear(): void

  /** A copy of the current keys in store order. */
  keys(): K[]

  size(): number

  /** `{key: value, ...}` in store order. */
  toString(): string
}
