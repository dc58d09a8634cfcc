import { BoundedCache } from "../../core/bounded-cache"
import { MruMemoryMap } from "../../core/eviction/mru-memory-map"
import type { AlertConfigInput } from "../../core/monitoring/alert-config"
import { MonitoredCache, type MonitoredCacheDeps } from "../../core/monitoring/monitored-cache"
import { SynchronizedCache } from "../../core/synchronized-cache"
import type { CacheHooks } from "../../ports/cache-options"

/**
 * Evicts the entry most recently read or written, before the new key goes
 * in. The latest write therefore always survives.
 */
export class SimpleMruCache<K, V> extends BoundedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ store: new MruMemoryMap<K, V>() }, { ...hooks, capacity })
  }
}

export class MruCache<K, V> extends SynchronizedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ inner: new SimpleMruCache<K, V>(capacity, hooks) })
  }
}

export class MonitoredMruCache<K, V> extends MonitoredCache<K, V> {
  public constructor(
    capacity: number,
    alertConfig: AlertConfigInput,
    deps: MonitoredCacheDeps = {},
  ) {
    super((hooks) => new MruCache<K, V>(capacity, hooks), alertConfig, deps)
  }
}
