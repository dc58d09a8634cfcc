import type { Milliseconds } from "@evictor/clock"
import type { CacheStats } from "./cache-stats"

export type CacheMetricsSnapshot = Readonly<{
  hits: number
  misses: number
  totalRequests: number
  hitRate: number
  missRate: number
  averageLatencyMs: Milliseconds
  evictions: number
  latencySamples: number
}>

/**
 * Read side of the metrics recorder, as handed out by monitored caches.
 *
 * Latencies are fractional milliseconds. Every query returns 0 rather than
 * NaN when nothing has been recorded yet.
 */
export interface CacheMetricsView {
  readonly hits: number
  readonly misses: number
  readonly totalRequests: number
  readonly evictions: number

  readonly hitRate: number
  readonly missRate: number

  /** Mean of all latency samples, truncated to microseconds. */
  readonly averageLatency: Milliseconds

  /**
   * Nearest-rank percentile over all samples: the sample at index
   * `floor((n - 1) * p / 100)` of the sorted list. The median of an even
   * number of samples is the mean of the two central ones.
   *
   * @throws InvalidArgumentError when `p` is outside `[0, 100]`.
   */
  getLatencyPercentile(p: number): Milliseconds

  /**
   * @throws InvalidArgumentError when `windowMs` is not positive.
   */
  getRecentStats(windowMs: Milliseconds): CacheStats

  snapshot(): CacheMetricsSnapshot
}
