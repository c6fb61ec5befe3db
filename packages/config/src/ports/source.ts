import type { ConfigDocument } from "./document"

/**
 * Somewhere configuration is loaded from.
 *
 * A source only loads; validation and caching happen downstream. Every call
 * to `load()` returns a fresh value the caller may keep.
 */
export interface ConfigSource<T> {
  /**
   * Human-readable name for logs, e.g. "env", "json:/home/me/.config/barconf/config.json".
   */
  readonly name: string

  load(): Promise<T>
}

export type DocumentSource = ConfigSource<ConfigDocument>

export type EnvRecord = Record<string, string | undefined>
