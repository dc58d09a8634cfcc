import type { CacheEvictionPolicy } from "../ports/cache-eviction-policy"
import type { BoundedCacheOptions } from "../ports/cache-options"
import type { SimpleCache } from "../ports/simple-cache"
import type { EvictionMap } from "./eviction/eviction-map"
import { formatEntries } from "./format/format-entries"
import { assertValidCapacity } from "./validation/validation"

export type BoundedCacheDeps<K, V> = {
  store: EvictionMap<K, V>
}

/**
 * Single-threaded cache holding at most `capacity` entries.
 *
 * Ordering and victim selection belong to the injected {@link EvictionMap};
 * this class only enforces the bound. A new key arriving at a full cache
 * evicts exactly one entry before it is inserted.
 */
export class BoundedCache<K, V> implements SimpleCache<K, V> {
  readonly capacity: number

  public constructor(
    private readonly deps: BoundedCacheDeps<K, V>,
    private readonly opts: BoundedCacheOptions<K>,
  ) {
    assertValidCapacity(opts.capacity)

    this.capacity = opts.capacity
  }

  get policy(): CacheEvictionPolicy {
    return this.deps.store.policy
  }

  get(key: K): V | undefined {
    return this.deps.store.get(key)
  }

  set(key: K, value: V): void {
    if (!this.deps.store.has(key)) this.ensureCapacityForOne()

    this.deps.store.set(key, value)
  }

  clear(): void {
    this.deps.store.clear()
  }

  keys(): K[] {
    return this.deps.store.keys()
  }

  size(): number {
    return this.deps.store.size()
  }

  toString(): string {
    return formatEntries(this.deps.store.entries())
  }

  private ensureCapacityForOne(): void {
    while (this.deps.store.size() >= this.capacity) {
      const victim = this.deps.store.victim()

      if (victim === undefined) {
        throw new Error(
          "Invariant violation: EvictionMap.victim() returned undefined while at capacity",
        )
      }

      this.deps.store.delete(victim)
      this.opts.onEvict?.(victim)
    }
  }
}
