import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Manually driven clock for tests. Wall-clock and monotonic readings move
 * together; nothing advances unless `advance()` or `set()` is called.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private elapsed: Milliseconds = 0

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  monotonicMs(): Milliseconds {
    return this.elapsed
  }

  advance(ms: Milliseconds): void {
    if (ms < 0) throw new RangeError(`FakeClock cannot move backwards (advance ${ms})`)

    this.time += ms
    this.elapsed += ms
  }

  /** Jump the wall clock to `ms`. The monotonic reading is untouched. */
  set(ms: Milliseconds): void {
    this.time = ms
  }
}
