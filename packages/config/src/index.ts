export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonFileSource, type JsonFileSourceOptions } from "./adapters/json/json-file-source"
export { ObjectSource } from "./adapters/object/object-source"
export { type BootstrapOptions, bootstrapConfig, type ConfigContext, SERVICE_NAME } from "./bootstrap"
export { ConfigAccessor } from "./core/accessor/config-accessor"
export {
  type CacheSnapshot,
  ConfigCache,
  type ConfigCacheDeps,
  EMPTY_SNAPSHOT,
  type RefreshFailure,
  type RefreshResult,
  type RefreshSuccess,
} from "./core/cache/config-cache"
export {
  field,
  fromPlain,
  isJsonObject,
  lookup,
  NULL_NODE,
  parseJsonText,
  toInt32,
  toPlain,
  toText,
} from "./core/document/json-value"
export { ENV_PREFIX, type Environment, readEnvironment } from "./core/environment/environment"
export { type ConfigError, type ConfigErrorCode, isConfigError } from "./core/errors"
export { type FatalContext, guardFatal, refreshOrExit, terminate } from "./core/fatal/fatal"
export { clamp } from "./core/math/clamp"
export { CONFIG_DIR, type ConfigPathOptions, resolveConfigPath } from "./core/path/config-path"
export { getUpdateRate, type IntegerReader, UPDATE_RATE } from "./core/update-rate/update-rate"
export { substitute } from "./core/variables/substitute"
export { collectVariables, MAX_VARIABLES, VARIABLES_SECTION } from "./core/variables/variable-table"
export type {
  ConfigDocument,
  JsonArray,
  JsonBoolean,
  JsonNode,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
} from "./ports/document"
export type { ConfigSource, DocumentSource, EnvRecord } from "./ports/source"
export {
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
  type ValueKind,
} from "./ports/typed-value"
export type { VariableEntry } from "./ports/variable"
