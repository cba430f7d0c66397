import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" suppresses the per-decision "debug" lines the cache client writes.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans. Local development only; keep JSON in production.
   */
  prettify?: boolean
}
