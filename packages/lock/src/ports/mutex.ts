import type { MutexLease } from "./mutex-lease"

export type AcquireOptions = {
  /** Gives up waiting when aborted. Has no effect once the lock is held. */
  signal?: AbortSignal
}

/**
 * In-process mutual exclusion.
 *
 * Waiters are served in arrival order. A lease is handed directly to the next
 * waiter on release, so a caller arriving later can never overtake one that is
 * already queued.
 */
export interface Mutex {
  /**
   * Wait until the lock is free and take it.
   *
   * @returns The lease, or `null` if the signal aborted before acquisition.
   */
  acquire(opts?: AcquireOptions): Promise<MutexLease | null>

  /**
   * Take the lock only if nobody holds it or waits for it.
   *
   * @returns The lease, or `null` if the lock is busy.
   */
  tryAcquire(): MutexLease | null

  isLocked(): boolean

  /** Number of callers currently queued behind the holder. */
  readonly pending: number
}
