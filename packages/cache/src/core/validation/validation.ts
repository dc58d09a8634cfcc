import { InvalidArgumentError } from "../errors/invalid-argument-error"

export function assertValidCapacity(capacity: number): void {
  if (!Number.isSafeInteger(capacity) || capacity <= 0) {
    throw new InvalidArgumentError(`capacity must be a positive integer, got: ${capacity}`, {
      argument: "capacity",
      value: capacity,
    })
  }
}

export function assertPercentile(percentile: number): void {
  if (!Number.isFinite(percentile) || percentile < 0 || percentile > 100) {
    throw new InvalidArgumentError(
      `percentile must be between 0 and 100, got: ${percentile}`,
      { argument: "percentile", value: percentile },
    )
  }
}

export function assertPositiveWindowMs(windowMs: number): void {
  if (!Number.isFinite(windowMs) || windowMs <= 0) {
    throw new InvalidArgumentError(`window must be a positive duration, got: ${windowMs}ms`, {
      argument: "windowMs",
      value: windowMs,
    })
  }
}
