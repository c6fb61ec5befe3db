import fs from "node:fs/promises"
import path from "node:path"
import { parseJsonText } from "../../core/document/json-value"
import { unreadableError } from "../../core/errors"
import type { ConfigDocument } from "../../ports/document"
import type { DocumentSource } from "../../ports/source"

export type JsonFileSourceOptions = {
  file: string

  /** @default process.cwd() */
  cwd?: string
}

export class JsonFileSource implements DocumentSource {
  readonly name: string
  readonly path: string

  constructor(options: JsonFileSourceOptions) {
    this.path = path.resolve(options.cwd ?? process.cwd(), options.file)
    this.name = `json:${this.path}`
  }

  async load(): Promise<ConfigDocument> {
    let content: string

    try {
      content = await fs.readFile(this.path, "utf-8")
    } catch (err) {
      throw unreadableError(this.path, err)
    }

    return parseJsonText(content, this.path)
  }
}
