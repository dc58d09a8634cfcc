import { type Logger, NullLogger } from "@evictor/logger"
import type { AlertManagerState, AlertViolation } from "../../ports/alert"
import type { CacheMetricsView } from "../../ports/cache-metrics-view"
import { toCacheError } from "../errors/to-cache-error"
import type { AlertConfig } from "./alert-config"
import { evaluateThresholds } from "./evaluate-thresholds"

export type AlertManagerDeps = {
  metrics: CacheMetricsView
  logger?: Logger
}

/**
 * Polls a metrics recorder every `alertCheckInterval` and reports each
 * crossed threshold to `notifyCallback`.
 *
 * The timer is unref'd: an armed manager never keeps the process alive. A
 * callback that throws is logged and skipped; the remaining violations are
 * still delivered and the timer keeps running.
 */
export class AlertManager {
  private readonly metrics: CacheMetricsView
  private readonly logger: Logger

  private timer: NodeJS.Timeout | undefined
  private currentState: AlertManagerState = "idle"

  public constructor(
    deps: AlertManagerDeps,
    private readonly config: AlertConfig,
  ) {
    this.metrics = deps.metrics
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "alert-manager" })
  }

  get state(): AlertManagerState {
    return this.currentState
  }

  /** Arm the timer. No-op while already monitoring. */
  start(): void {
    if (this.currentState === "monitoring") return

    this.timer = setInterval(() => {
      this.checkNow()
    }, this.config.alertCheckInterval)
    this.timer.unref()

    this.currentState = "monitoring"
    this.logger.debug("Alert monitoring started", {
      intervalMs: this.config.alertCheckInterval,
    })
  }

  stop(): void {
    if (this.currentState !== "monitoring") return

    clearInterval(this.timer)
    this.timer = undefined

    this.currentState = "stopped"
    this.logger.debug("Alert monitoring stopped")
  }

  /**
   * Run one check immediately, independent of the timer.
   *
   * @returns The violations found, in check order.
   */
  checkNow(): AlertViolation[] {
    const stats = this.metrics.getRecentStats(this.config.alertCheckInterval)
    const violations = evaluateThresholds(stats, this.config)

    for (const violation of violations) {
      this.logger.warn(violation.message, {
        metric: violation.metric,
        actual: violation.actual,
        threshold: violation.threshold,
      })

      this.notify(violation)
    }

    return violations
  }

  private notify(violation: AlertViolation): void {
    try {
      this.config.notifyCallback(violation.message)
    } catch (err) {
      this.logger.error("Alert notification callback failed", {
        err: toCacheError(err, "alert_callback_failed"),
        metric: violation.metric,
      })
    }
  }
}
