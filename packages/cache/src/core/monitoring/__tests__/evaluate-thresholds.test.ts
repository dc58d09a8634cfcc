import type { CacheStats } from "../../../ports/cache-stats"
import { evaluateThresholds, type Thresholds } from "../evaluate-thresholds"

const defaults: Thresholds = {
  hitRateThreshold: 0.5,
  missRateThreshold: 0.5,
  p95LatencyThresholdMs: 200,
  p99LatencyThresholdMs: 300,
  evictionsPerMinuteThreshold: 1000,
  averageLatencyThresholdMs: 100,
}

const healthy: CacheStats = {
  hitRate: 0.9,
  missRate: 0.1,
  averageLatencyMs: 3,
  p95LatencyMs: 12,
  p99LatencyMs: 20,
  evictionsPerMinute: 4,
}

describe("evaluateThresholds", () => {
  it("finds nothing in healthy stats", () => {
    expect(evaluateThresholds(healthy, defaults)).toStrictEqual([])
  })

  it("reports every crossed threshold in check order", () => {
    const stats: CacheStats = {
      hitRate: 0.1,
      missRate: 0.9,
      averageLatencyMs: 150,
      p95LatencyMs: 250,
      p99LatencyMs: 400,
      evictionsPerMinute: 1500,
    }

    expect(evaluateThresholds(stats, defaults).map((v) => v.message)).toStrictEqual([
      "Warning: Low hit rate detected. Actual: 0.1 (Threshold: 0.5)",
      "Warning: High miss rate detected. Actual: 0.9 (Threshold: 0.5)",
      "Warning: High p95 latency detected. Actual: 250ms (Threshold: 200ms)",
      "Warning: High p99 latency detected. Actual: 400ms (Threshold: 300ms)",
      "Warning: High average latency detected. Actual: 150ms (Threshold: 100ms)",
      "Warning: High eviction rate detected. Actual: 1500 evictions/min (Threshold: 1000 evictions/min)",
    ])
  })

  it("describes each violation structurally", () => {
    const [violation] = evaluateThresholds({ ...healthy, p99LatencyMs: 301 }, defaults)

    expect(violation).toStrictEqual({
      metric: "p99Latency",
      actual: 301,
      threshold: 300,
      message: "Warning: High p99 latency detected. Actual: 301ms (Threshold: 300ms)",
    })
  })

  it("treats values equal to a threshold as healthy", () => {
    const stats: CacheStats = {
      hitRate: 0.5,
      missRate: 0.5,
      averageLatencyMs: 100,
      p95LatencyMs: 200,
      p99LatencyMs: 300,
      evictionsPerMinute: 1000,
    }

    expect(evaluateThresholds(stats, defaults)).toStrictEqual([])
  })
})
