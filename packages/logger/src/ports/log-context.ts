export type LogContext = {
  service: string
  module: string

  /** Absolute path of the configuration file in play. */
  path: string

  generation: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields added to (or overriding) an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
