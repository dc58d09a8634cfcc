import { BoundedCache } from "../../core/bounded-cache"
import { FifoMemoryMap } from "../../core/eviction/fifo-memory-map"
import type { AlertConfigInput } from "../../core/monitoring/alert-config"
import { MonitoredCache, type MonitoredCacheDeps } from "../../core/monitoring/monitored-cache"
import { SynchronizedCache } from "../../core/synchronized-cache"
import type { CacheHooks } from "../../ports/cache-options"

/** Evicts in insertion order. Reads and overwrites never reorder. */
export class SimpleFifoCache<K, V> extends BoundedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ store: new FifoMemoryMap<K, V>() }, { ...hooks, capacity })
  }
}

export class FifoCache<K, V> extends SynchronizedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ inner: new SimpleFifoCache<K, V>(capacity, hooks) })
  }
}

export class MonitoredFifoCache<K, V> extends MonitoredCache<K, V> {
  public constructor(
    capacity: number,
    alertConfig: AlertConfigInput,
    deps: MonitoredCacheDeps = {},
  ) {
    super((hooks) => new FifoCache<K, V>(capacity, hooks), alertConfig, deps)
  }
}
