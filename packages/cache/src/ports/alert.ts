export type NotifyCallback = (message: string) => void

export type AlertMetric =
  | "hitRate"
  | "missRate"
  | "p95Latency"
  | "p99Latency"
  | "averageLatency"
  | "evictionsPerMinute"

/** One threshold crossed during a check. */
export type AlertViolation = Readonly<{
  metric: AlertMetric
  actual: number
  threshold: number
  message: string
}>

/**
 * `idle` until `start()`, `monitoring` while the timer is armed, `stopped`
 * after `stop()`. A stopped manager can be started again.
 */
export type AlertManagerState = "idle" | "monitoring" | "stopped"
