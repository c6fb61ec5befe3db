export type ValueKind = "string" | "integer"

/**
 * A present lookup result. Both lanes are always populated so call sites can
 * read either one; the lane that was not requested holds its zero value.
 */
export type StringValue = Readonly<{ kind: "string"; text: string; integer: 0 }>

export type IntegerValue = Readonly<{ kind: "integer"; text: ""; integer: number }>

export type TypedValue = StringValue | IntegerValue

export type StringLookup = {
  kind: "string"

  /** Replace variable names with their values before returning. */
  substitute?: boolean
}

export type IntegerLookup = {
  kind: "integer"
}

export type LookupOptions = StringLookup | IntegerLookup

export type StringDefaultLookup = StringLookup & {
  /** @default "" */
  fallback?: string
}

export type IntegerDefaultLookup = IntegerLookup & {
  /** @default 0 */
  fallback?: number
}

export type DefaultLookup = StringDefaultLookup | IntegerDefaultLookup

export function stringValue(text: string): StringValue {
  return { kind: "string", text, integer: 0 }
}

export function integerValue(integer: number): IntegerValue {
  return { kind: "integer", text: "", integer }
}
