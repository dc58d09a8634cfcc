import { type Clock, type Milliseconds, SystemClock } from "@evictor/clock"
import type { CacheMetricsSnapshot, CacheMetricsView } from "../../ports/cache-metrics-view"
import type { CacheStats } from "../../ports/cache-stats"
import { assertPercentile, assertPositiveWindowMs } from "../validation/validation"

export type CacheMetricsDeps = {
  clock?: Clock
}

const MS_PER_MINUTE = 60_000

/**
 * Hit/miss counters, latency samples and eviction timestamps for one cache.
 *
 * Samples accumulate until {@link CacheMetrics.reset}. Percentiles sort a
 * copy of every sample on each call.
 */
export class CacheMetrics implements CacheMetricsView {
  private readonly clock: Clock

  private hitCount = 0
  private missCount = 0
  private latencies: Milliseconds[] = []
  private evictionTimestamps: Milliseconds[] = []

  public constructor(deps: CacheMetricsDeps = {}) {
    this.clock = deps.clock ?? new SystemClock()
  }

  recordHit(latency: Milliseconds): void {
    this.hitCount++
    this.latencies.push(latency)
  }

  recordMiss(): void {
    this.missCount++
  }

  recordEviction(): void {
    this.evictionTimestamps.push(this.clock.nowMs())
  }

  get hits(): number {
    return this.hitCount
  }

  get misses(): number {
    return this.missCount
  }

  get totalRequests(): number {
    return this.hitCount + this.missCount
  }

  get evictions(): number {
    return this.evictionTimestamps.length
  }

  get hitRate(): number {
    const total = this.totalRequests

    return total === 0 ? 0 : this.hitCount / total
  }

  get missRate(): number {
    const total = this.totalRequests

    return total === 0 ? 0 : this.missCount / total
  }

  get averageLatency(): Milliseconds {
    if (this.latencies.length === 0) return 0

    let sum = 0
    for (const latency of this.latencies) sum += latency

    return truncateToMicros(sum / this.latencies.length)
  }

  getLatencyPercentile(p: number): Milliseconds {
    assertPercentile(p)

    const n = this.latencies.length
    if (n === 0) return 0

    const sorted = [...this.latencies].sort((a, b) => a - b)

    if (p === 50 && n % 2 === 0) {
      const lower = sorted[n / 2 - 1] ?? 0
      const upper = sorted[n / 2] ?? 0

      return truncateToMicros((lower + upper) / 2)
    }

    return sorted[Math.floor(((n - 1) * p) / 100)] ?? 0
  }

  getRecentStats(windowMs: Milliseconds): CacheStats {
    assertPositiveWindowMs(windowMs)

    const cutoff = this.clock.nowMs() - windowMs
    let recentEvictions = 0

    for (const at of this.evictionTimestamps) {
      if (at > cutoff) recentEvictions++
    }

    return {
      hitRate: this.hitRate,
      missRate: this.missRate,
      averageLatencyMs: Math.floor(this.averageLatency),
      p95LatencyMs: Math.floor(this.getLatencyPercentile(95)),
      p99LatencyMs: Math.floor(this.getLatencyPercentile(99)),
      evictionsPerMinute: Math.floor((recentEvictions * MS_PER_MINUTE) / windowMs),
    }
  }

  snapshot(): CacheMetricsSnapshot {
    return {
      hits: this.hitCount,
      misses: this.missCount,
      totalRequests: this.totalRequests,
      hitRate: this.hitRate,
      missRate: this.missRate,
      averageLatencyMs: this.averageLatency,
      evictions: this.evictions,
      latencySamples: this.latencies.length,
    }
  }

  reset(): void {
    this.hitCount = 0
    this.missCount = 0
    this.latencies = []
    this.evictionTimestamps = []
  }
}

function truncateToMicros(ms: Milliseconds): Milliseconds {
  return Math.trunc(ms * 1000) / 1000
}
