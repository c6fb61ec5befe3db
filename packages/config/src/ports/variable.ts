/**
 * A user-defined placeholder from the `variables` section.
 */
export type VariableEntry = Readonly<{
  name: string
  value: string
}>
