export type ErrorCode = Lowercase<string>

/**
 * Structured metadata carried by an error (source names, paths, formats).
 * Frozen on construction.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same operation later may succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, missing file),
   * `false` for broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
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
