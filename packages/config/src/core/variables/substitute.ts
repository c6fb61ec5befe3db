import type { VariableEntry } from "../../ports/variable"

/**
 * Replace every occurrence of each variable's name with its value, one
 * variable at a time in table order. Later variables see the output of earlier
 * ones, so `[A -> B, B -> C]` turns "A" into "C". Values are inserted literally.
 */
export function substitute(text: string, variables: readonly VariableEntry[]): string {
  let result = text

  for (const { name, value } of variables) {
    if (result.includes(name)) {
      result = result.replaceAll(name, () => value)
    }
  }

  return result
}
