export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (paths, section names, counts).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected runtime outcomes the caller may handle, `false` for
   * conditions after which the process should not carry on (malformed
   * configuration, broken invariants).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape of an error, used for log payloads.
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
