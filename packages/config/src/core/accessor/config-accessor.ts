import type { Milliseconds } from "@barconf/lock"
import {
  type DefaultLookup,
  type IntegerDefaultLookup,
  type IntegerLookup,
  type IntegerValue,
  integerValue,
  type LookupOptions,
  type StringDefaultLookup,
  type StringLookup,
  type StringValue,
  stringValue,
  type TypedValue,
} from "../../ports/typed-value"
import type { VariableEntry } from "../../ports/variable"
import type { ConfigCache } from "../cache/config-cache"
import { lookup, toInt32, toText } from "../document/json-value"
import { notIntegerError } from "../errors"
import { getUpdateRate } from "../update-rate/update-rate"
import { substitute } from "../variables/substitute"
import { collectVariables } from "../variables/variable-table"

/**
 * Typed lookups of `root.key` against the cached document.
 *
 * Absence is reported as `undefined`; a value that cannot be read as the
 * requested kind throws a fatal ConfigError.
 */
export class ConfigAccessor {
  constructor(private readonly cache: ConfigCache) {}

  tryGet(root: string, key: string, options: StringLookup): StringValue | undefined
  tryGet(root: string, key: string, options: IntegerLookup): IntegerValue | undefined
  tryGet(root: string, key: string, options: LookupOptions): TypedValue | undefined
  tryGet(root: string, key: string, options: LookupOptions): TypedValue | undefined {
    if (options.kind === "integer") {
      const integer = this.cache.read((document) => {
        const value = lookup(document, root, key)
        if (value === undefined) return undefined

        const parsed = toInt32(value)
        if (parsed === undefined) throw notIntegerError(root, key)

        return parsed
      })

      return integer === undefined ? undefined : integerValue(integer)
    }

    const withVariables = options.substitute === true
    const found = this.cache.read((document) => {
      const value = lookup(document, root, key)
      if (value === undefined) return undefined

      return {
        text: toText(value),
        variables: withVariables ? collectVariables(document) : [],
      }
    })

    if (found === undefined) return undefined

    return stringValue(withVariables ? substitute(found.text, found.variables) : found.text)
  }

  getOrDefault(root: string, key: string, options: StringDefaultLookup): StringValue
  getOrDefault(root: string, key: string, options: IntegerDefaultLookup): IntegerValue
  getOrDefault(root: string, key: string, options: DefaultLookup): TypedValue
  getOrDefault(root: string, key: string, options: DefaultLookup): TypedValue {
    if (options.kind === "integer") {
      return this.tryGet(root, key, options) ?? integerValue(options.fallback ?? 0)
    }

    return this.tryGet(root, key, options) ?? stringValue(options.fallback ?? "")
  }

  variables(): VariableEntry[] {
    return this.cache.read(collectVariables)
  }

  updateRate(): Milliseconds {
    return getUpdateRate(this)
  }
}
