export {
  EphemeralFifoCache,
  MonitoredEphemeralFifoCache,
  SimpleEphemeralFifoCache,
} from "./adapters/memory/ephemeral-fifo-cache"
export { FifoCache, MonitoredFifoCache, SimpleFifoCache } from "./adapters/memory/fifo-cache"
export { LfuCache, MonitoredLfuCache, SimpleLfuCache } from "./adapters/memory/lfu-cache"
export { LruCache, MonitoredLruCache, SimpleLruCache } from "./adapters/memory/lru-cache"
export { MonitoredMruCache, MruCache, SimpleMruCache } from "./adapters/memory/mru-cache"
export { BoundedCache, type BoundedCacheDeps } from "./core/bounded-cache"
export { createCache, createMonitoredCache, createSimpleCache } from "./core/create-cache"
export { CacheError, type CacheErrorOptions, serializeError } from "./core/errors/cache-error"
export { InvalidArgumentError } from "./core/errors/invalid-argument-error"
export { toCacheError } from "./core/errors/to-cache-error"
export { createEvictionMap } from "./core/eviction/create-eviction-map"
export { EphemeralFifoMemoryMap } from "./core/eviction/ephemeral-fifo-memory-map"
export type { EvictionMap } from "./core/eviction/eviction-map"
export { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
export { LfuMemoryMap } from "./core/eviction/lfu-memory-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"
export { MruMemoryMap } from "./core/eviction/mru-memory-map"
export {
  type AlertConfig,
  type AlertConfigInput,
  type AlertThresholds,
  alertConfigSchema,
  loadAlertThresholds,
  parseAlertConfig,
} from "./core/monitoring/alert-config"
export { AlertManager, type AlertManagerDeps } from "./core/monitoring/alert-manager"
export { CacheMetrics, type CacheMetricsDeps } from "./core/monitoring/cache-metrics"
export { evaluateThresholds } from "./core/monitoring/evaluate-thresholds"
export {
  type ConcurrentCacheFactory,
  MonitoredCache,
  type MonitoredCacheDeps,
} from "./core/monitoring/monitored-cache"
export { SynchronizedCache, type SynchronizedCacheDeps } from "./core/synchronized-cache"
export type * from "./ports/alert"
export * from "./ports/cache-eviction-policy"
export type * from "./ports/cache-metrics-view"
export type * from "./ports/cache-options"
export type * from "./ports/cache-stats"
export type * from "./ports/concurrent-cache"
export type * from "./ports/error"
export type * from "./ports/simple-cache"
