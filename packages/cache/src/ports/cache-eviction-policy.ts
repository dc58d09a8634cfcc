/**
 * First In, First Out. Evicts entries in insertion order, regardless of
 * access patterns. Overwrites keep their original position.
 */
export type FifoCacheEvictionPolicy = "fifo"

/**
 * FIFO where every successful read also removes the entry: a value can be
 * read at most once.
 */
export type EphemeralFifoCacheEvictionPolicy = "ephemeral-fifo"

/**
 * Least Recently Used. Reads and writes both count as use; the entry
 * untouched for the longest time is evicted.
 */
export type LruCacheEvictionPolicy = "lru"

/**
 * Most Recently Used. Evicts the entry touched last, before the incoming key
 * is inserted, so the newest write always survives.
 */
export type MruCacheEvictionPolicy = "mru"

/**
 * Least Frequently Used. Evicts the entry with the fewest reads; ties go to
 * the oldest-inserted key.
 */
export type LfuCacheEvictionPolicy = "lfu"

export type CacheEvictionPolicy =
  | FifoCacheEvictionPolicy
  | EphemeralFifoCacheEvictionPolicy
  | LruCacheEvictionPolicy
  | MruCacheEvictionPolicy
  | LfuCacheEvictionPolicy

export const cacheEvictionPolicies = [
  "fifo",
  "ephemeral-fifo",
  "lru",
  "mru",
  "lfu",
] as const satisfies readonly CacheEvictionPolicy[]
