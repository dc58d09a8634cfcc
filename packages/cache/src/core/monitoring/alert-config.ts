import { z } from "zod"
import type { NotifyCallback } from "../../ports/alert"
import { InvalidArgumentError } from "../errors/invalid-argument-error"

// Node clamps setInterval delays above this to 1ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647

const rate = z.number().min(0).max(1)
const ceiling = z.number().nonnegative()

export const alertConfigSchema = z.strictObject({
  notifyCallback: z.custom<NotifyCallback>((value) => typeof value === "function", {
    error: "notifyCallback must be a function",
  }),
  hitRateThreshold: rate.default(0.5),
  missRateThreshold: rate.default(0.5),
  p95LatencyThresholdMs: ceiling.default(200),
  p99LatencyThresholdMs: ceiling.default(300),
  evictionsPerMinuteThreshold: ceiling.default(1000),
  averageLatencyThresholdMs: ceiling.default(100),
  alertCheckInterval: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(60_000),
})

/** Fully resolved alert configuration: every threshold present. */
export type AlertConfig = z.output<typeof alertConfigSchema>

/** What callers pass: only `notifyCallback` is required. */
export type AlertConfigInput = z.input<typeof alertConfigSchema>

export type AlertThresholds = Partial<Omit<AlertConfigInput, "notifyCallback">>

/**
 * Validate `input` and fill in defaults.
 *
 * @throws InvalidArgumentError listing every invalid field.
 */
export function parseAlertConfig(input: AlertConfigInput): AlertConfig {
  const result = alertConfigSchema.safeParse(input)

  if (!result.success) {
    throw new InvalidArgumentError(
      `Alert configuration validation failed:\n${z.prettifyError(result.error)}`,
      { argument: "alertConfig", value: input },
      result.error,
    )
  }

  return result.data
}

const ENV_PREFIX = "CACHE_ALERT_"

const envThresholdsSchema = z.object({
  HIT_RATE_THRESHOLD: z.coerce.number().optional(),
  MISS_RATE_THRESHOLD: z.coerce.number().optional(),
  P95_LATENCY_THRESHOLD_MS: z.coerce.number().optional(),
  P99_LATENCY_THRESHOLD_MS: z.coerce.number().optional(),
  EVICTIONS_PER_MINUTE_THRESHOLD: z.coerce.number().optional(),
  AVERAGE_LATENCY_THRESHOLD_MS: z.coerce.number().optional(),
  CHECK_INTERVAL_MS: z.coerce.number().optional(),
})

/**
 * Read threshold overrides from `CACHE_ALERT_*` variables. Unset and empty
 * variables are left out so the schema defaults apply.
 *
 * @example
 * ```ts
 * new MonitoredLruCache(500, { notifyCallback: notify, ...loadAlertThresholds() })
 * ```
 *
 * @throws InvalidArgumentError when a variable is set but not numeric.
 */
export function loadAlertThresholds(
  env: Record<string, string | undefined> = process.env,
): AlertThresholds {
  const stripped: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value.trim() !== "") {
      stripped[key.slice(ENV_PREFIX.length)] = value
    }
  }

  const result = envThresholdsSchema.safeParse(stripped)

  if (!result.success) {
    throw new InvalidArgumentError(
      `Alert threshold environment validation failed:\n${z.prettifyError(result.error)}`,
      { argument: "env", value: stripped },
      result.error,
    )
  }

  const vars = result.data
  const thresholds: AlertThresholds = {}

  if (vars.HIT_RATE_THRESHOLD !== undefined) thresholds.hitRateThreshold = vars.HIT_RATE_THRESHOLD
  if (vars.MISS_RATE_THRESHOLD !== undefined) {
    thresholds.missRateThreshold = vars.MISS_RATE_THRESHOLD
  }
  if (vars.P95_LATENCY_THRESHOLD_MS !== undefined) {
    thresholds.p95LatencyThresholdMs = vars.P95_LATENCY_THRESHOLD_MS
  }
  if (vars.P99_LATENCY_THRESHOLD_MS !== undefined) {
    thresholds.p99LatencyThresholdMs = vars.P99_LATENCY_THRESHOLD_MS
  }
  if (vars.EVICTIONS_PER_MINUTE_THRESHOLD !== undefined) {
    thresholds.evictionsPerMinuteThreshold = vars.EVICTIONS_PER_MINUTE_THRESHOLD
  }
  if (vars.AVERAGE_LATENCY_THRESHOLD_MS !== undefined) {
    thresholds.averageLatencyThresholdMs = vars.AVERAGE_LATENCY_THRESHOLD_MS
  }
  if (vars.CHECK_INTERVAL_MS !== undefined) thresholds.alertCheckInterval = vars.CHECK_INTERVAL_MS

  return thresholds
}
