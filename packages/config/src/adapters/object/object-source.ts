import { fromPlain } from "../../core/document/json-value"
import type { ConfigDocument } from "../../ports/document"
import type { DocumentSource } from "../../ports/source"

/**
 * Serves an in-memory value. The value is validated on every load and each
 * load builds a separate document; the caller's object is untouched.
 */
export class ObjectSource implements DocumentSource {
  constructor(
    private readonly document: unknown,
    readonly name = "object",
  ) {}

  async load(): Promise<ConfigDocument> {
    return fromPlain(this.document, this.name)
  }
}
