import type { ConfigDocument } from "../../ports/document"
import type { VariableEntry } from "../../ports/variable"
import { field, isJsonObject, toText } from "../document/json-value"
import { tooManyVariablesError } from "../errors"

export const VARIABLES_SECTION = "variables"
export const MAX_VARIABLES = 64

/**
 * The `variables` section as a table in document order. Values are converted to text;
 * a missing or non-object section gives an empty table.
 *
 * @throws ConfigError `config_too_many_variables` above {@link MAX_VARIABLES} entries.
 */
export function collectVariables(document: ConfigDocument): VariableEntry[] {
  const section = field(document, VARIABLES_SECTION)
  if (section === undefined || !isJsonObject(section)) return []

  if (section.fields.size > MAX_VARIABLES) {
    throw tooManyVariablesError(section.fields.size, MAX_VARIABLES)
  }

  return [...section.fields].map(([name, value]) => ({ name, value: toText(value) }))
}
