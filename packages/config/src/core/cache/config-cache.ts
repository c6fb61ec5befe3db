import { MemoryReadWriteLock, type ReadWriteLock, withWriteLock } from "@barconf/lock"
import { createNullLogger, type Logger } from "@barconf/logger"
import type { ConfigDocument } from "../../ports/document"
import type { DocumentSource } from "../../ports/source"
import { NULL_NODE, sectionCount } from "../document/json-value"
import { type ConfigError, toConfigError } from "../errors"
import { collectVariables } from "../variables/variable-table"

export type CacheSnapshot = Readonly<{
  document: ConfigDocument
  generation: number
}>

export type RefreshSuccess = Readonly<{
  ok: true
  generation: number
  sections: number
  variables: number
}>

export type RefreshFailure = Readonly<{
  ok: false
  error: ConfigError
}>

export type RefreshResult = RefreshSuccess | RefreshFailure

export type ConfigCacheDeps = {
  source: DocumentSource

  /** @default NullLogger */
  logger?: Logger

  /** @default a new MemoryReadWriteLock holding the empty snapshot */
  lock?: ReadWriteLock<CacheSnapshot>
}

export const EMPTY_SNAPSHOT: CacheSnapshot = Object.freeze({
  document: NULL_NODE,
  generation: 0,
})

/**
 * Holds the parsed configuration behind a many-reader / single-writer lock.
 *
 * Until the first successful refresh the document is a JSON `null`, so every
 * lookup misses. Loading and validation run outside the lock; the write lease is held
 * only for the swap.
 */
export class ConfigCache {
  private readonly lock: ReadWriteLock<CacheSnapshot>
  private readonly logger: Logger

  constructor(private readonly deps: ConfigCacheDeps) {
    this.lock = deps.lock ?? new MemoryReadWriteLock<CacheSnapshot>(EMPTY_SNAPSHOT)
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "config-cache" })
  }

  get generation(): number {
    return this.lock.read((snapshot) => snapshot.generation)
  }

  /**
   * Run `fn` against the current document inside a read section.
   * The document must not be retained past `fn`.
   */
  read<R>(fn: (document: ConfigDocument) => R): R {
    return this.lock.read((snapshot) => fn(snapshot.document))
  }

  async refresh(): Promise<RefreshResult> {
    const source = this.deps.source.name
    const startedAt = performance.now()

    let document: ConfigDocument
    let variables: number

    try {
      document = await this.deps.source.load()
      variables = collectVariables(document).length
    } catch (err) {
      const error = toConfigError(err, source)
      this.logger.error("Config refresh failed", { source, err: error })

      return { ok: false, error }
    }

    const generation = await withWriteLock(this.lock, (lease) => {
      const next: CacheSnapshot = { document, generation: lease.current().generation + 1 }
      lease.commit(next)

      return next.generation
    })

    const sections = sectionCount(document)

    this.logger.debug("Config refreshed", {
      source,
      generation,
      sections,
      variables,
      durationMs: performance.now() - startedAt,
    })

    return { ok: true, generation, sections, variables }
  }
}
