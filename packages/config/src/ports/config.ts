import type { ZodType } from "zod"
import type { GetResult } from "./get-result"
import type { ConfigSource } from "./source"
import type { NativeValue, TableValue, Value } from "./value"

/**
 * What each requested kind yields from `get(path, kind)`.
 */
export type TargetTypes = {
  value: Value
  bool: boolean
  int: number
  bigint: bigint
  float: number
  string: string
  array: NativeValue[]
  table: { [key: string]: NativeValue }
}

export type TargetKind = keyof TargetTypes

export type SaveOptions = {
  /** Serialize only the `changes` layer instead of the merged root. */
  changesOnly?: boolean
}

/**
 * Merged, queryable view over an ordered list of sources.
 *
 * @example
 * ```typescript
 * const config = Config.builder()
 *   .add(new FileSource({ file: "base.json" }))
 *   .add(new FileSource({ file: "local.yaml", required: false }))
 *   .env({ prefix: "APP_" })
 *   .build()
 *
 * config.get("server.port", "int")   // 8080
 * config.explain("server.port")      // "env"
 * ```
 */
export interface IConfig {
  /** Deep clone of the merged root. */
  readonly value: TableValue

  /**
   * Looks up a dot-separated path.
   *
   * Without a kind the stored `Value` is returned as is. With a kind the
   * value is coerced; see `TargetTypes` for what each kind yields.
   *
   * @throws GetError `not_found`, `type_mismatch` or `coercion_failure`
   */
  get(path: string): Value
  get<K extends TargetKind>(path: string, kind: K): TargetTypes[K]

  /** Like `get`, but returns failures instead of throwing them. */
  tryGet<K extends TargetKind>(path: string, kind: K): GetResult<TargetTypes[K]>

  /**
   * Runs the sub-tree at `path` through a zod schema.
   *
   * @throws GetError `type_mismatch` carrying the schema issues
   */
  decode<T>(path: string, schema: ZodType<T>): T

  has(path: string): boolean

  /** Top-level keys in iteration order. */
  keys(): string[]

  /**
   * Name of the highest layer that defines `path`: a source name, `"env"` or
   * `"changes"`. `undefined` when no layer does.
   */
  explain(path: string): string | undefined

  /** Names of the layers that contributed at least one key, in application order. */
  sourcesUsed(): string[]

  /** Records an edit in the `changes` layer, which sits above every source. */
  set(path: string, value: Value): void

  /** Clone of the `changes` layer. */
  changes(): TableValue

  /**
   * Re-reads every source and the environment, then re-merges.
   * On failure the previous state is kept.
   *
   * @throws ReloadError `reload_failed`
   */
  reload(): void

  /**
   * Merges previously saved changes into the `changes` layer. Paths that no
   * source defines are dropped.
   *
   * @throws ParseError
   */
  restore(source: ConfigSource): void

  /**
   * Serializes the root (or only the changes) with the target source's format,
   * writes it when the source is writable and returns the text.
   *
   * @throws SaveError
   */
  save(target: string, options?: SaveOptions): string

  toString(): string
}
