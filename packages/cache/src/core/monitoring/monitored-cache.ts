import { type Clock, SystemClock } from "@evictor/clock"
import { type Logger, NullLogger } from "@evictor/logger"
import type { AlertManagerState } from "../../ports/alert"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { CacheMetricsView } from "../../ports/cache-metrics-view"
import type { CacheHooks } from "../../ports/cache-options"
import type { ConcurrentCache } from "../../ports/concurrent-cache"
import { type AlertConfigInput, parseAlertConfig } from "./alert-config"
import { AlertManager } from "./alert-manager"
import { CacheMetrics } from "./cache-metrics"

export type MonitoredCacheDeps = {
  clock?: Clock
  logger?: Logger
  /** Bound to every log entry as `cache`. */
  name?: string
}

/**
 * Builds the wrapped cache. The monitored cache passes hooks that feed
 * evictions into its metrics.
 */
export type ConcurrentCacheFactory<K, V> = (hooks: CacheHooks<K>) => ConcurrentCache<K, V>

/**
 * A concurrent cache instrumented with {@link CacheMetrics} and watched by an
 * {@link AlertManager}.
 *
 * Only `get` is timed: a present value counts as a hit with its latency, an
 * absent one as a miss. Capacity evictions are recorded too. Monitoring
 * starts on construction; `close()` stops the alert timer and leaves the
 * cache usable.
 */
export class MonitoredCache<K, V> implements ConcurrentCache<K, V> {
  private readonly cache: ConcurrentCache<K, V>
  private readonly recorder: CacheMetrics
  private readonly alerts: AlertManager
  private readonly clock: Clock

  public constructor(
    createCache: ConcurrentCacheFactory<K, V>,
    alertConfig: AlertConfigInput,
    deps: MonitoredCacheDeps = {},
  ) {
    const config = parseAlertConfig(alertConfig)

    this.clock = deps.clock ?? new SystemClock()
    this.recorder = new CacheMetrics({ clock: this.clock })
    this.cache = createCache({ onEvict: () => this.recorder.recordEviction() })

    const policy = this.cache.policy
    const logger = (deps.logger ?? new NullLogger()).child(
      deps.name === undefined ? { policy } : { policy, cache: deps.name },
    )

    this.alerts = new AlertManager({ metrics: this.recorder, logger }, config)
    this.alerts.start()
  }

  get capacity(): number {
    return this.cache.capacity
  }

  get policy(): CacheEvictionPolicy {
    return this.cache.policy
  }

  get metrics(): CacheMetricsView {
    return this.recorder
  }

  get monitoringState(): AlertManagerState {
    return this.alerts.state
  }

  async get(key: K): Promise<V | undefined> {
    const startedAt = this.clock.monotonicMs()
    const value = await this.cache.get(key)
    const elapsed = this.clock.monotonicMs() - startedAt

    if (value === undefined) {
      this.recorder.recordMiss()
    } else {
      this.recorder.recordHit(elapsed)
    }

    return value
  }

  async set(key: K, value: V): Promise<void> {
    return this.cache.set(key, value)
  }

  async clear(): Promise<void> {
    return this.cache.clear()
  }

  keys(): K[] {
    return this.cache.keys()
  }

  size(): number {
    return this.cache.size()
  }

  toString(): string {
    return this.cache.toString()
  }

  /** Stop alerting. Cache operations keep working. */
  close(): void {
    this.alerts.stop()
  }
}
