import type { Milliseconds } from "../../ports/options"
import { invalidOptionError } from "../errors"

export function assertValidTimeMs(value: Milliseconds, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw invalidOptionError(name, value)
  }
}
