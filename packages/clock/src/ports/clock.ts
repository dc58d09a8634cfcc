import type { Milliseconds } from "./time"

export interface Clock {
  /**
   * Current wall-clock time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current wall-clock time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds

  /**
   * Monotonic, sub-millisecond reading for measuring elapsed time.
   *
   * Only differences between two readings are meaningful; the origin is
   * unspecified and never goes backwards.
   */
  monotonicMs(): Milliseconds
}
