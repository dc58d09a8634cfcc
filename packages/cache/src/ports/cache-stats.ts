/**
 * Point-in-time summary used for threshold checks.
 *
 * Rates and latencies cover the whole retained history; only
 * `evictionsPerMinute` is computed over the requested window. Latencies are
 * whole milliseconds.
 */
export type CacheStats = Readonly<{
  hitRate: number
  missRate: number
  averageLatencyMs: number
  p95LatencyMs: number
  p99LatencyMs: number
  evictionsPerMinute: number
}>
