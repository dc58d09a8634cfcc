import { BoundedCache } from "../../core/bounded-cache"
import { LfuMemoryMap } from "../../core/eviction/lfu-memory-map"
import type { AlertConfigInput } from "../../core/monitoring/alert-config"
import { MonitoredCache, type MonitoredCacheDeps } from "../../core/monitoring/monitored-cache"
import { SynchronizedCache } from "../../core/synchronized-cache"
import type { CacheHooks } from "../../ports/cache-options"

/**
 * Evicts the entry with the fewest reads, the oldest-inserted one on a tie.
 */
export class SimpleLfuCache<K, V> extends BoundedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ store: new LfuMemoryMap<K, V>() }, { ...hooks, capacity })
  }
}

export class LfuCache<K, V> extends SynchronizedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ inner: new SimpleLfuCache<K, V>(capacity, hooks) })
  }
}

export class MonitoredLfuCache<K, V> extends MonitoredCache<K, V> {
  public constructor(
    capacity: number,
    alertConfig: AlertConfigInput,
    deps: MonitoredCacheDeps = {},
  ) {
    super((hooks) => new LfuCache<K, V>(capacity, hooks), alertConfig, deps)
  }
}
