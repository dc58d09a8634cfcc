import { CacheError } from "./cache-error"

export type InvalidArgumentContext = {
  argument: string
  value: unknown
}

/**
 * Raised synchronously when a constructor or metrics query receives an
 * argument outside its domain (e.g. a non-positive capacity).
 */
export class InvalidArgumentError extends CacheError<"invalid_argument"> {
  constructor(message: string, context: InvalidArgumentContext, cause?: unknown) {
    super(message, { code: "invalid_argument", context, cause })
  }
}
