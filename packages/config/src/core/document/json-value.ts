import { type Node, type ParseError, parseTree, printParseErrorCode } from "jsonc-parser"
import { z } from "zod"
import type { ConfigDocument, JsonNode, JsonObject } from "../../ports/document"
import { invalidJsonError } from "../errors"

const INT32_MIN = -2_147_483_648
const INT32_MAX = 2_147_483_647
const INTEGER_LITERAL = /^-?\d+$/

export const NULL_NODE: ConfigDocument = Object.freeze({ type: "null" })

type PlainJson = string | number | boolean | null | PlainJson[] | { [key: string]: PlainJson }

const plainJsonSchema: z.ZodType<PlainJson> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(plainJsonSchema),
    z.record(z.string(), plainJsonSchema),
  ]),
)

/**
 * Parse JSON text, keeping field order and the source text of numbers.
 * Comments and trailing commas are rejected.
 *
 * @param origin - Path or source name, reported when parsing fails.
 */
export function parseJsonText(text: string, origin: string): ConfigDocument {
  const errors: ParseError[] = []
  const root = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false })

  const first = errors[0]
  if (first) {
    throw invalidJsonError(
      origin,
      new SyntaxError(`${printParseErrorCode(first.error)} at offset ${first.offset}`),
    )
  }

  if (!root) {
    throw invalidJsonError(origin, new SyntaxError("Empty document"))
  }

  return fromTree(root, text, origin)
}

function fromTree(node: Node, text: string, origin: string): JsonNode {
  switch (node.type) {
    case "object": {
      const fields = new Map<string, JsonNode>()

      for (const property of node.children ?? []) {
        const [name, value] = property.children ?? []
        if (name === undefined || typeof name.value !== "string" || value === undefined) {
          throw malformed(origin, property)
        }

        fields.set(name.value, fromTree(value, text, origin))
      }

      return Object.freeze({ type: "object", fields })
    }

    case "array":
      return Object.freeze({
        type: "array",
        items: Object.freeze((node.children ?? []).map((child) => fromTree(child, text, origin))),
      })

    case "number": {
      const source = text.slice(node.offset, node.offset + node.length)
      return Object.freeze({ type: "number", value: Number(source), text: source })
    }

    case "string":
      if (typeof node.value !== "string") throw malformed(origin, node)
      return Object.freeze({ type: "string", value: node.value })

    case "boolean":
      if (typeof node.value !== "boolean") throw malformed(origin, node)
      return Object.freeze({ type: "boolean", value: node.value })

    case "null":
      return NULL_NODE

    default:
      throw malformed(origin, node)
  }
}

function malformed(origin: string, node: Node) {
  return invalidJsonError(origin, new SyntaxError(`Unexpected ${node.type} at offset ${node.offset}`))
}

/**
 * Build a document from an in-memory value. Fields follow the object's own
 * property order.
 */
export function fromPlain(raw: unknown, origin: string): ConfigDocument {
  const result = plainJsonSchema.safeParse(raw)

  if (!result.success) {
    throw invalidJsonError(origin, new Error(z.prettifyError(result.error)))
  }

  return fromPlainValue(result.data)
}

function fromPlainValue(value: PlainJson): JsonNode {
  if (value === null) return NULL_NODE
  if (typeof value === "string") return Object.freeze({ type: "string", value })
  if (typeof value === "number") return Object.freeze({ type: "number", value, text: String(value) })
  if (typeof value === "boolean") return Object.freeze({ type: "boolean", value })

  if (Array.isArray(value)) {
    return Object.freeze({ type: "array", items: Object.freeze(value.map(fromPlainValue)) })
  }

  const fields = new Map<string, JsonNode>()
  for (const [name, child] of Object.entries(value)) {
    fields.set(name, fromPlainValue(child))
  }

  return Object.freeze({ type: "object", fields })
}

/**
 * The node as an ordinary JavaScript value. Numbers lose whatever precision a
 * double cannot hold.
 */
export function toPlain(node: JsonNode): unknown {
  switch (node.type) {
    case "null":
      return null
    case "string":
    case "number":
    case "boolean":
      return node.value
    case "array":
      return node.items.map(toPlain)
    case "object":
      return Object.fromEntries([...node.fields].map(([name, child]) => [name, toPlain(child)]))
  }
}

export function isJsonObject(node: JsonNode): node is JsonObject {
  return node.type === "object"
}

/**
 * Field `name` of `node`, or `undefined` when `node` is not an object or has
 * no such field. A stored `null` is present.
 */
export function field(node: JsonNode, name: string): JsonNode | undefined {
  return node.type === "object" ? node.fields.get(name) : undefined
}

export function lookup(document: ConfigDocument, root: string, key: string): JsonNode | undefined {
  const section = field(document, root)
  if (section === undefined) return undefined

  return field(section, key)
}

export function sectionCount(document: ConfigDocument): number {
  return document.type === "object" ? document.fields.size : 0
}

/**
 * Strings verbatim, everything else as compact JSON. Integer literals and
 * numbers a double cannot represent keep their source digits.
 */
export function toText(node: JsonNode): string {
  return node.type === "string" ? node.value : stringify(node)
}

function stringify(node: JsonNode): string {
  switch (node.type) {
    case "null":
      return "null"
    case "string":
      return JSON.stringify(node.value)
    case "boolean":
      return String(node.value)
    case "number":
      return INTEGER_LITERAL.test(node.text) || !Number.isFinite(node.value)
        ? node.text
        : String(node.value)
    case "array":
      return `[${node.items.map(stringify).join(",")}]`
    case "object":
      return `{${[...node.fields].map(([name, child]) => `${JSON.stringify(name)}:${stringify(child)}`).join(",")}}`
  }
}

/**
 * The value as a 32-bit signed integer, or `undefined` for anything else,
 * numeric strings included.
 */
export function toInt32(node: JsonNode): number | undefined {
  if (node.type !== "number" || !Number.isInteger(node.value)) return undefined
  if (node.value < INT32_MIN || node.value > INT32_MAX) return undefined

  return node.value | 0
}
