import type { ConfigSource, EnvRecord } from "../../ports/source"

export type EnvSourceOptions = {
  prefix?: string
  env?: EnvRecord
}

export class EnvSource implements ConfigSource<EnvRecord> {
  readonly name = "env"
  private readonly prefix?: string | undefined
  private readonly env: EnvRecord

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<EnvRecord> {
    if (!this.prefix) return { ...this.env }

    const filtered: EnvRecord = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}
