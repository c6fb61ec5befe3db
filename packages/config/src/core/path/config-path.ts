import os from "node:os"
import path from "node:path"

export const CONFIG_DIR = path.join(".config", "barconf")

export type ConfigPathOptions = {
  fileName: string

  /** @default os.homedir() */
  homeDir?: string
}

/**
 * `<home>/.config/barconf/<fileName>`
 */
export function resolveConfigPath(options: ConfigPathOptions): string {
  return path.join(options.homeDir ?? os.homedir(), CONFIG_DIR, options.fileName)
}
