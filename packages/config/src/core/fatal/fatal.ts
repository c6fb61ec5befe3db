import { toAppError } from "@barconf/errors"
import type { Logger } from "@barconf/logger"
import type { ConfigCache, RefreshResult } from "../cache/config-cache"
import { isConfigError } from "../errors"

export type FatalContext = {
  logger: Logger

  /** @default process.exit */
  exit?: (code: number) => void
}

const exitProcess = (code: number): void => {
  process.exit(code)
}

/**
 * Log `error` at fatal level and exit with status 1.
 */
export function terminate(error: unknown, ctx: FatalContext): void {
  const err = toAppError(error)

  ctx.logger.fatal(err.message, { err, code: err.code })
  ;(ctx.exit ?? exitProcess)(1)
}

export async function refreshOrExit(cache: ConfigCache, ctx: FatalContext): Promise<RefreshResult> {
  const result = await cache.refresh()

  if (!result.ok) {
    terminate(result.error, ctx)
  }

  return result
}

/**
 * Run a synchronous lookup (one UI tick). A thrown ConfigError terminates the
 * process and yields `undefined`; anything else propagates.
 */
export function guardFatal<R>(fn: () => R, ctx: FatalContext): R | undefined {
  try {
    return fn()
  } catch (err) {
    if (!isConfigError(err)) throw err

    terminate(err, ctx)
    return undefined
  }
}
