export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (bucket names, type names, sizes).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` when repeating the same call may succeed (e.g. a busy database). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing key, corrupt record), `false`
   * for programmer errors and broken invariants.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape used for log payloads.
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
