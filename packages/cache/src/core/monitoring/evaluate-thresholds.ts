import type { AlertViolation } from "../../ports/alert"
import type { CacheStats } from "../../ports/cache-stats"
import type { AlertConfig } from "./alert-config"

export type Thresholds = Omit<AlertConfig, "notifyCallback" | "alertCheckInterval">

/**
 * Compare `stats` against every threshold. Violations come back in a fixed
 * order: hit rate, miss rate, p95, p99, average latency, eviction rate.
 */
export function evaluateThresholds(stats: CacheStats, thresholds: Thresholds): AlertViolation[] {
  const violations: AlertViolation[] = []

  if (stats.hitRate < thresholds.hitRateThreshold) {
    violations.push({
      metric: "hitRate",
      actual: stats.hitRate,
      threshold: thresholds.hitRateThreshold,
      message: `Warning: Low hit rate detected. Actual: ${stats.hitRate} (Threshold: ${thresholds.hitRateThreshold})`,
    })
  }

  if (stats.missRate > thresholds.missRateThreshold) {
    violations.push({
      metric: "missRate",
      actual: stats.missRate,
      threshold: thresholds.missRateThreshold,
      message: `Warning: High miss rate detected. Actual: ${stats.missRate} (Threshold: ${thresholds.missRateThreshold})`,
    })
  }

  if (stats.p95LatencyMs > thresholds.p95LatencyThresholdMs) {
    violations.push(
      latencyViolation("p95Latency", "p95", stats.p95LatencyMs, thresholds.p95LatencyThresholdMs),
    )
  }

  if (stats.p99LatencyMs > thresholds.p99LatencyThresholdMs) {
    violations.push(
      latencyViolation("p99Latency", "p99", stats.p99LatencyMs, thresholds.p99LatencyThresholdMs),
    )
  }

  if (stats.averageLatencyMs > thresholds.averageLatencyThresholdMs) {
    violations.push(
      latencyViolation(
        "averageLatency",
        "average",
        stats.averageLatencyMs,
        thresholds.averageLatencyThresholdMs,
      ),
    )
  }

  if (stats.evictionsPerMinute > thresholds.evictionsPerMinuteThreshold) {
    violations.push({
      metric: "evictionsPerMinute",
      actual: stats.evictionsPerMinute,
      threshold: thresholds.evictionsPerMinuteThreshold,
      message:
        `Warning: High eviction rate detected. Actual: ${stats.evictionsPerMinute} evictions/min ` +
        `(Threshold: ${thresholds.evictionsPerMinuteThreshold} evictions/min)`,
    })
  }

  return violations
}

function latencyViolation(
  metric: AlertViolation["metric"],
  label: string,
  actual: number,
  threshold: number,
): AlertViolation {
  return {
    metric,
    actual,
    threshold,
    message: `Warning: High ${label} latency detected. Actual: ${actual}ms (Threshold: ${threshold}ms)`,
  }
}
