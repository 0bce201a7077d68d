import type { Logger } from "@stratum/logger"
import type { ZodType } from "zod"
import type { EnvOverride } from "../adapters/env/env-override"
import type { IConfig, SaveOptions, TargetKind, TargetTypes } from "../ports/config"
import type { GetResult } from "../ports/get-result"
import { type ConfigSource, isWritableSource } from "../ports/source"
import type { TableValue, Value } from "../ports/value"
import { ConfigBuilder } from "./builder"
import { coerce } from "./coerce/coerce"
import { GetError } from "./errors/get-error"
import { ParseError } from "./errors/parse-error"
import { ReloadError } from "./errors/reload-error"
import { SaveError } from "./errors/save-error"
import type { FormatRegistry } from "./format-registry"
import { composeRoot, type Layer, type LoadContext, type LoadedLayers, loadLayers, parseSource, pruneToBase } from "./load"
import { mergeTables } from "./merge/merge"
import type { ConfigBuilderOptions } from "./options"
import { formatValue } from "./value/format-value"
import { toNative } from "./value/native"
import { formatPath, lookup, setPath } from "./value/path"
import { cloneValue, table, tableEntries, tableKeys } from "./value/value"

export type ConfigDeps = {
  sources: readonly ConfigSource[]
  envOverride: EnvOverride | undefined
  formats: FormatRegistry
  ordered: boolean
  logger: Logger
}

type ConfigState = {
  readonly loaded: LoadedLayers
  readonly changes: TableValue
  /** Sources and env merged, without changes. */
  readonly base: TableValue
  readonly root: TableValue
}

const CHANGES = "changes"

export class Config implements IConfig {
  private state: ConfigState

  static builder(options: ConfigBuilderOptions = {}): ConfigBuilder {
    return new ConfigBuilder(options)
  }

  constructor(
    private readonly deps: ConfigDeps,
    loaded: LoadedLayers,
  ) {
    this.state = settle(loaded, table([], deps.ordered), deps.ordered)
  }

  get value(): TableValue {
    return cloneValue(this.state.root)
  }

  get(path: string): Value
  get<K extends TargetKind>(path: string, kind: K): TargetTypes[K]
  get(path: string, kind: TargetKind = "value"): TargetTypes[TargetKind] {
    const found = lookup(this.state.root, path)
    if (found === undefined) throw GetError.notFound(path)

    return coerce(found, kind, path)
  }

  tryGet<K extends TargetKind>(path: string, kind: K): GetResult<TargetTypes[K]> {
    try {
      return { kind: "found", value: this.get(path, kind) }
    } catch (err) {
      if (err instanceof GetError) return { kind: "failed", error: err }
      throw err
    }
  }

  decode<T>(path: string, schema: ZodType<T>): T {
    const value = this.get(path)
    const result = schema.safeParse(toNative(value))

    if (!result.success) {
      throw GetError.typeMismatch(
        path,
        "schema",
        value.kind,
        result.error.issues.map((issue) => ({ path: formatPath(issue.path), message: issue.message })),
      )
    }

    return result.data
  }

  has(path: string): boolean {
    return lookup(this.state.root, path) !== undefined
  }

  keys(): string[] {
    return tableKeys(this.state.root)
  }

  explain(path: string): string | undefined {
    if (!this.has(path)) return undefined

    // Every layer holds the root, so the root belongs to the highest non-empty one.
    const defines = (layer: Layer) =>
      path === "" ? layer.value.entries.size > 0 : lookup(layer.value, path) !== undefined

    return this.layers().reverse().find(defines)?.name
  }

  sourcesUsed(): string[] {
    const used = this.layers()
      .filter((layer) => layer.value.entries.size > 0)
      .map((layer) => layer.name)

    return [...new Set(used)]
  }

  set(path: string, value: Value): void {
    const changes = setPath(this.state.changes, path, cloneValue(value))
    this.state = settle(this.state.loaded, changes, this.deps.ordered)

    this.logger.debug("config value set", { path })
  }

  changes(): TableValue {
    return cloneValue(this.state.changes)
  }

  reload(): void {
    const started = Date.now()
    let loaded: LoadedLayers

    try {
      loaded = loadLayers(this.deps.sources, this.deps.envOverride, this.context)
    } catch (err) {
      this.logger.warn("config reload failed, keeping previous state", { operation: "reload", err })
      throw ReloadError.failed(err)
    }

    this.state = settle(loaded, this.state.changes, this.deps.ordered)
    this.logger.info("config reloaded", { operation: "reload", durationMs: Date.now() - started })
  }

  restore(source: ConfigSource): void {
    const saved = parseSource(source, this.context)

    if (saved.kind !== "table") {
      throw ParseError.malformed(
        source.name,
        source.format,
        new TypeError(`Saved changes must be a table, found ${saved.kind}`),
      )
    }

    const restored = pruneToBase(saved, this.state.base)
    const changes = mergeTables(this.state.changes, restored)
    this.state = settle(this.state.loaded, changes, this.deps.ordered)

    this.logger.info("config changes restored", {
      operation: "restore",
      source: source.name,
      format: source.format,
      kept: restored.entries.size,
    })
  }

  save(target: string, options: SaveOptions = {}): string {
    const source = this.deps.sources.find((candidate) => candidate.name === target)
    if (source === undefined) throw SaveError.unknownSource(target)

    const adapter = this.deps.formats.get(source.format)
    if (adapter === undefined || adapter.serialize === undefined) {
      throw SaveError.unsupported(target, source.format)
    }

    let content: string
    try {
      content = adapter.serialize(options.changesOnly ? this.state.changes : this.state.root)
    } catch (err) {
      throw SaveError.serializeFailed(target, source.format, err)
    }

    if (isWritableSource(source)) {
      try {
        source.write(content)
      } catch (err) {
        throw SaveError.io(target, source.format, err)
      }
    }

    this.logger.info("config saved", {
      operation: "save",
      source: target,
      format: source.format,
      changesOnly: options.changesOnly ?? false,
    })

    return content
  }

  toString(): string {
    return tableEntries(this.state.root)
      .map(([key, value]) => `${key}: ${formatValue(value)}\n`)
      .join("")
  }

  private get logger(): Logger {
    return this.deps.logger
  }

  private get context(): LoadContext {
    return { formats: this.deps.formats, ordered: this.deps.ordered, logger: this.deps.logger }
  }

  /** Every layer in application order: sources, env, changes. */
  private layers(): Layer[] {
    const { loaded, changes } = this.state
    return [
      ...loaded.sources,
      ...(loaded.env === undefined ? [] : [loaded.env]),
      { name: CHANGES, value: changes },
    ]
  }
}

function settle(loaded: LoadedLayers, changes: TableValue, ordered: boolean): ConfigState {
  const base = composeRoot(
    loaded.env === undefined ? loaded.sources : [...loaded.sources, loaded.env],
    ordered,
  )

  return { loaded, changes, base, root: mergeTables(base, changes) }
}
