import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to implement them however they like.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Defaults to "info".
   */
  level: LogLevelName

  /**
   * Human-readable single-line output instead of JSON.
   * Meant for local development only.
   */
  prettify?: boolean
}
