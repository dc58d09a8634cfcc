export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (argument names, values) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by the caller (bad arguments),
   * `false` for bugs and invariant violations.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * Serialized error shape for logging. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
