import type { Milliseconds } from "@barconf/lock"
import type { IntegerLookup, IntegerValue } from "../../ports/typed-value"
import { updateRateOutOfRangeError } from "../errors"
import { clamp } from "../math/clamp"

export const UPDATE_RATE = {
  root: "hybrid",
  key: "update_rate",
  defaultMs: 100,
  minMs: 5,
  maxMs: 10_000,
} as const

export interface IntegerReader {
  tryGet(root: string, key: string, options: IntegerLookup): IntegerValue | undefined
}

/**
 * `hybrid.update_rate` in milliseconds: 100 when unset, otherwise clamped to
 * [5, 10000].
 */
export function getUpdateRate(reader: IntegerReader): Milliseconds {
  const configured = reader.tryGet(UPDATE_RATE.root, UPDATE_RATE.key, { kind: "integer" })

  if (configured === undefined) return UPDATE_RATE.defaultMs

  return toMilliseconds(clamp(configured.integer, UPDATE_RATE.minMs, UPDATE_RATE.maxMs))
}

export function toMilliseconds(value: number): Milliseconds {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw updateRateOutOfRangeError(value)
  }

  return value
}
