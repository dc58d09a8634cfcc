/**
 * Well-known fields a log entry may carry. Everything is optional at the
 * call site; loggers merge their bound context with per-call meta.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the cache instance emitting the entry. */
  cache: string
  /** Eviction policy of that cache, e.g. "lru". */
  policy: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
