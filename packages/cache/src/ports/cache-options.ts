export type BoundedCacheOptions<K> = {
  /**
   * Maximum number of entries retained. Must be a positive integer.
   */
  capacity: number

  /**
   * Called once for every entry removed to make room for a new key.
   *
   * @remarks
   * Not called by `clear()`, by overwrites, or by an ephemeral read. The
   * hook runs inside the write; it should not throw.
   */
  onEvict?: (key: K) => void
}

/** Options accepted by the per-policy cache constructors, besides capacity. */
export type CacheHooks<K> = Omit<BoundedCacheOptions<K>, "capacity">
