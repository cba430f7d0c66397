/** snake_case identifier, e.g. `store_unavailable`. */
export type ErrorCode = Lowercase<string>

/** Structured fields for the failing operation: key, operation, owner, sources. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** Trying the same operation again may succeed, e.g. after a store reconnect. */
  readonly isRetryable: boolean

  /**
   * `true` for failures the library anticipates (store down, bad options,
   * undecodable entry); `false` for anything that reached us unclassified.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe form of an {@link AppError}, causes included. */
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
