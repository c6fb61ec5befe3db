import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { toPlain } from "../../core/document/json-value"
import type { DocumentSource } from "../source"

export type DocumentSourceHarness = {
  name: string
  make: (cwd: string) => Promise<{
    source: DocumentSource
    cleanup?: () => Promise<void>
  }>
  setup: (cwd: string) => Promise<void>
  expectedValue: () => unknown
  expectedSections: () => string[]
}

export function describeDocumentSourceContract(h: DocumentSourceHarness) {
  describe(`${h.name} (DocumentSource contract)`, () => {
    let cwd: string
    let source: DocumentSource
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "barconf-source-"))
      await h.setup(cwd)
      const result = await h.make(cwd)

      source = result.source
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() returns the expected document", async () => {
      expect(toPlain(await source.load())).toEqual(h.expectedValue())
    })

    it("load() keeps sections in document order", async () => {
      const document = await source.load()
      if (document.type !== "object") throw new Error("expected an object document")

      expect([...document.fields.keys()]).toEqual(h.expectedSections())
    })

    it("load() is idempotent", async () => {
      const a = await source.load()
      const b = await source.load()

      expect(b).toEqual(a)
    })

    it("load() returns frozen nodes", async () => {
      const document = await source.load()

      expect(Object.isFrozen(document)).toBe(true)
      if (document.type === "object") {
        for (const section of document.fields.values()) {
          expect(Object.isFrozen(section)).toBe(true)
        }
      }
    })

    it("load() returns a fresh value each time", async () => {
      const a = await source.load()
      const b = await source.load()

      expect(b).not.toBe(a)
    })
  })
}
