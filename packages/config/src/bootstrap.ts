import os from "node:os"
import { createPinoLogger, type Logger } from "@barconf/logger"
import { EnvSource } from "./adapters/env/env-source"
import { JsonFileSource } from "./adapters/json/json-file-source"
import { ConfigAccessor } from "./core/accessor/config-accessor"
import { ConfigCache } from "./core/cache/config-cache"
import { ENV_PREFIX, type Environment, readEnvironment } from "./core/environment/environment"
import { type FatalContext, refreshOrExit, terminate } from "./core/fatal/fatal"
import { resolveConfigPath } from "./core/path/config-path"
import type { EnvRecord } from "./ports/source"

export const SERVICE_NAME = "barconf"

export type BootstrapOptions = {
  /** @default process.env */
  env?: EnvRecord

  /** @default os.homedir() */
  homeDir?: string

  /** @default a pino logger configured from the environment */
  logger?: Logger

  /** @default process.exit */
  exit?: FatalContext["exit"]
}

export type ConfigContext = {
  cache: ConfigCache
  config: ConfigAccessor
  environment: Environment
  path: string
  logger: Logger
}

/**
 * Read the environment, load `~/.config/barconf/<file>` and return a ready
 * cache. Any configuration problem terminates the process.
 */
export async function bootstrapConfig(options: BootstrapOptions = {}): Promise<ConfigContext> {
  const exit = options.exit
  const envSource = new EnvSource({ prefix: ENV_PREFIX, env: options.env ?? process.env })

  let environment: Environment

  try {
    environment = await readEnvironment(envSource)
  } catch (err) {
    const logger = options.logger ?? createPinoLogger({}, { level: "info" }, { service: SERVICE_NAME })
    terminate(err, { logger, ...(exit && { exit }) })
    throw err
  }

  const logger =
    options.logger ??
    createPinoLogger(
      {},
      { level: environment.logLevel, prettify: environment.prettyLogs },
      { service: SERVICE_NAME },
    )

  const path = resolveConfigPath({
    fileName: environment.configFile,
    homeDir: options.homeDir ?? os.homedir(),
  })

  const cache = new ConfigCache({ source: new JsonFileSource({ file: path }), logger })
  const result = await refreshOrExit(cache, { logger, ...(exit && { exit }) })

  if (!result.ok) {
    throw result.error
  }

  logger.info("Config loaded", { path, generation: result.generation })

  return { cache, config: new ConfigAccessor(cache), environment, path, logger }
}
