import { BoundedCache } from "../../core/bounded-cache"
import { EphemeralFifoMemoryMap } from "../../core/eviction/ephemeral-fifo-memory-map"
import type { AlertConfigInput } from "../../core/monitoring/alert-config"
import { MonitoredCache, type MonitoredCacheDeps } from "../../core/monitoring/monitored-cache"
import { SynchronizedCache } from "../../core/synchronized-cache"
import type { CacheHooks } from "../../ports/cache-options"

/**
 * FIFO cache whose values can be read once: a successful `get` removes the
 * entry.
 */
export class SimpleEphemeralFifoCache<K, V> extends BoundedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ store: new EphemeralFifoMemoryMap<K, V>() }, { ...hooks, capacity })
  }
}

export class EphemeralFifoCache<K, V> extends SynchronizedCache<K, V> {
  public constructor(capacity: number, hooks: CacheHooks<K> = {}) {
    super({ inner: new SimpleEphemeralFifoCache<K, V>(capacity, hooks) })
  }
}

export class MonitoredEphemeralFifoCache<K, V> extends MonitoredCache<K, V> {
  public constructor(
    capacity: number,
    alertConfig: AlertConfigInput,
    deps: MonitoredCacheDeps = {},
  ) {
    super((hooks) => new EphemeralFifoCache<K, V>(capacity, hooks), alertConfig, deps)
  }
}
