export { ArgvSource, type ArgvSourceOptions, optionName } from "./adapters/argv/argv-source"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions, envVarName } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource, type ObjectSourceOptions } from "./adapters/object/object-source"
export { isSourceKind, type SourceKind, type SourceKindArgs } from "./adapters/registry"
export { AppendAction, ExtendAction } from "./core/actions/append"
export { CountAction } from "./core/actions/count"
export { type BuiltinActionName, builtinActions } from "./core/actions/registry"
export { StoreAction } from "./core/actions/store"
export { StoreConstAction, StoreFalseAction, StoreTrueAction } from "./core/actions/store-const"
export { coerce, coerceElement } from "./core/coerce"
export {
  ConfigParser,
  type ConfigParserOptions,
  type ResolveOptions,
} from "./core/config-parser"
export {
  ConfigError,
  type ConfigErrorOptions,
  isConfigError,
  serializeError,
} from "./core/errors/config-error"
export {
  InvalidChoiceError,
  InvalidFlagValueError,
  MissingRequiredConfigError,
  SourceError,
  SpecError,
  TypeConversionError,
} from "./core/errors/errors"
export { MENTIONED, type Mentioned, SUPPRESS, type Suppress } from "./core/markers"
export { ResolvedConfig } from "./core/resolved-config"
export { type Action, type ActionConstructor, type ActionResult, NOT_FOUND } from "./ports/action"
export type {
  ActionParams,
  AddConfigOptions,
  Coercion,
  CoercionFn,
  ConfigItemSpec,
} from "./ports/config-item"
export type { ConfigErrorCode, ErrorContext, SerializedError } from "./ports/error"
export type { IResolvedConfig, Namespace } from "./ports/resolved-config"
export type { ConfigSource, ContributionMap, SourceConstructor } from "./ports/source"
