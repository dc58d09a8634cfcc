import { BoundedCache } from "../../core/bounded-cache"
import { LruMemoryMap } from "../../core/eviction/lru-memory-map"
import type { AlertConfigInput } from "../../core/monitoring/alert-config"
import { MonitoredCache, type MonitoredCacheDeps } from "../../core/monitoring/monitored-cache"
import { SynchronizedCache } from "../../core/synchronized-cache"
import type { CacheHooks } from "../../ports/cache-options"

/** Evicts the entry least recently read or written. */
export class SimpleLruCache<K, V> extends BoundedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ store: new LruMemoryMap<K, V>() }, { ...hooks, capacity })
  }
}

export class LruCache<K, V> extends SynchronizedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ inner: new SimpleLruCache<K, V>(capacity, hooks) })
  }
}

export class MonitoredLruCache<K, V> extends MonitoredCache<K, V> {
  public constructor(
    capacity: number,
    alertConfig: AlertConfigInput,
    deps: MonitoredCacheDeps = {},
  ) {
    super((hooks) => new LruCache<K, V>(capacity, hooks), alertConfig, deps)
  }
}
