export interface MutexLease {
  /**
   * Give the lock back. Idempotent: only the first call has an effect.
   */
  release(): void

  readonly released: boolean
}
