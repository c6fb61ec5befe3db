import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter: what is emitted and how it is rendered.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for a terminal. Leave off where logs are collected
   * as JSON lines.
   */
  prettify?: boolean
}
