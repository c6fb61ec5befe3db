export type JsonString = Readonly<{ type: "string"; value: string }>

/**
 * `text` is the number as written in the source, so digits beyond double
 * precision and out-of-range exponents (`1e400`) survive parsing.
 */
export type JsonNumber = Readonly<{ type: "number"; value: number; text: string }>

export type JsonBoolean = Readonly<{ type: "boolean"; value: boolean }>

export type JsonNull = Readonly<{ type: "null" }>

export type JsonArray = Readonly<{ type: "array"; items: readonly JsonNode[] }>

/**
 * Fields in document order. A repeated key keeps its first position and its
 * last value.
 */
export type JsonObject = Readonly<{ type: "object"; fields: ReadonlyMap<string, JsonNode> }>

export type JsonNode = JsonString | JsonNumber | JsonBoolean | JsonNull | JsonArray | JsonObject

/**
 * A parsed configuration file.
 *
 * Sections ("roots") are the fields of a top-level object; each section maps
 * keys to values. A document whose top level is not an object has no sections.
 * Documents are immutable and replaced wholesale.
 */
export type ConfigDocument = JsonNode
