import type { ErrorCode } from "../../ports/error"
import { CacheError } from "./cache-error"

/**
 * Convert any thrown value to a CacheError.
 *
 * - CacheError passes through unchanged
 * - Error instances are wrapped with isOperational: false
 * - Non-Error values are wrapped with their value in the context
 */
export function toCacheError(err: unknown, fallbackCode: ErrorCode = "unknown"): CacheError {
  if (err instanceof CacheError) {
    return err
  }

  if (err instanceof Error) {
    return new CacheError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  return new CacheError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
