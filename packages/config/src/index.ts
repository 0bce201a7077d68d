export { DotenvFormat } from "./adapters/dotenv/dotenv-format"
export { coerceEnvValue, EnvOverride, type EnvOverrideOptions } from "./adapters/env/env-override"
export { detectFormat } from "./adapters/file/detect-format"
export { FileSource, type FileSourceOptions } from "./adapters/file/file-source"
export { IniFormat } from "./adapters/ini/ini-format"
export { JsonFormat, type JsonFormatOptions } from "./adapters/json/json-format"
export { RonFormat } from "./adapters/ron/ron-format"
export { parseRon, RonSyntaxError } from "./adapters/ron/ron-parser"
export { writeRon } from "./adapters/ron/ron-writer"
export { StringSource } from "./adapters/string/string-source"
export { TomlFormat } from "./adapters/toml/toml-format"
export { YamlFormat } from "./adapters/yaml/yaml-format"
export { ConfigBuilder } from "./core/builder"
export { coerce } from "./core/coerce/coerce"
export { Config, type ConfigDeps } from "./core/config"
export * from "./core/errors"
export {
  createFormatRegistry,
  defaultFormatAdapters,
  FormatRegistry,
} from "./core/format-registry"
export { mergeAll, mergeTables, mergeValues } from "./core/merge/merge"
export {
  type ConfigBuilderOptions,
  DEFAULTS,
  type ResolvedBuilderOptions,
  resolveBuilderOptions,
} from "./core/options"
export * from "./core/value"
export type { IConfig, SaveOptions, TargetKind, TargetTypes } from "./ports/config"
export {
  type BuiltinFormat,
  builtinFormats,
  type FormatAdapter,
  type FormatTag,
  type ParseOptions,
} from "./ports/format"
export type { GetResult } from "./ports/get-result"
export { type ConfigSource, isWritableSource, type WritableConfigSource } from "./ports/source"
export type {
  ArrayValue,
  BoolValue,
  FloatValue,
  IntValue,
  NativeValue,
  NullValue,
  StringValue,
  TableValue,
  Value,
  ValueKind,
} from "./ports/value"
