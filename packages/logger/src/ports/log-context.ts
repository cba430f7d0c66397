/**
 * Fields a log line may carry.
 *
 * Process-level fields (`service`, `env`) are bound once at startup; the rest
 * describe one cache operation.
 */
export type LogContext = {
  service: string
  env: string
  module: string

  /** Cache key the operation is about. */
  key: string

  /** Fencing token of the lock this call holds, if any. */
  owner: string

  /** Outcome of the lock decision, e.g. "hit" or "locked-by-other". */
  decision: string

  consistency: "strong" | "weak"

  /** 0-indexed polling attempt. */
  attempt: number

  durationMs: number
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
