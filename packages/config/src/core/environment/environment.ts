import { logLevelNames, type LogLevelName } from "@barconf/logger"
import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import type { ConfigSource, EnvRecord } from "../../ports/source"
import { invalidEnvironmentError } from "../errors"

export const ENV_PREFIX = "BARCONF_"

const environmentSchema = z
  .object({
    CONFIG: z.string().min(1).default("config.json"),
    LOG_LEVEL: z.enum(logLevelNames).default("info"),
    LOG_PRETTY: z.stringbool().default(false),
  })
  .transform((env) => ({
    configFile: env.CONFIG,
    logLevel: env.LOG_LEVEL,
    prettyLogs: env.LOG_PRETTY,
  }))

export type Environment = Readonly<{
  configFile: string
  logLevel: LogLevelName
  prettyLogs: boolean
}>

/**
 * Read and validate the `BARCONF_*` variables. Empty values count as unset.
 */
export async function readEnvironment(
  source: ConfigSource<EnvRecord> = new EnvSource({ prefix: ENV_PREFIX }),
): Promise<Environment> {
  const present: Record<string, string> = {}

  for (const [key, value] of Object.entries(await source.load())) {
    if (value !== undefined && value !== "") {
      present[key] = value
    }
  }

  const result = environmentSchema.safeParse(present)

  if (!result.success) {
    throw invalidEnvironmentError(z.prettifyError(result.error))
  }

  return result.data
}
