import type { CacheEvictionPolicy } from "../ports/cache-eviction-policy"
import type { CacheHooks } from "../ports/cache-options"
import type { ConcurrentCache } from "../ports/concurrent-cache"
import type { SimpleCache } from "../ports/simple-cache"
import { BoundedCache } from "./bounded-cache"
import { createEvictionMap } from "./eviction/create-eviction-map"
import type { AlertConfigInput } from "./monitoring/alert-config"
import { MonitoredCache, type MonitoredCacheDeps } from "./monitoring/monitored-cache"
import { SynchronizedCache } from "./synchronized-cache"

/** Single-threaded cache for `policy`. */
export function createSimpleCache<K, V>(
  policy: CacheEvictionPolicy,
  capacity: number,
  hooks: CacheHooks<K> = {},
): SimpleCache<K, V> {
  return new BoundedCache<K, V>({ store: createEvictionMap<K, V>(policy) }, { ...hooks, capacity })
}

/**
 * Concurrent cache for a policy chosen at runtime, e.g. from configuration.
 *
 * @example
 * ```ts
 * const sessions = createCache<string, Session>("lru", 10_000)
 * await sessions.set(id, session)
 * ```
 */
export function createCache<K, V>(
  policy: CacheEvictionPolicy,
  capacity: number,
  hooks: CacheHooks<K> = {},
): ConcurrentCache<K, V> {
  return new SynchronizedCache<K, V>({ inner: createSimpleCache<K, V>(policy, capacity, hooks) })
}

export function createMonitoredCache<K, V>(
  policy: CacheEvictionPolicy,
  capacity: number,
  alertConfig: AlertConfigInput,
  deps: MonitoredCacheDeps = {},
): MonitoredCache<K, V> {
  return new MonitoredCache<K, V>(
    (hooks) => createCache<K, V>(policy, capacity, hooks),
    alertConfig,
    deps,
  )
}
