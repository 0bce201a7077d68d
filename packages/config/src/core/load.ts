import type { Logger } from "@stratum/logger"
import type { EnvOverride } from "../adapters/env/env-override"
import type { ConfigSource } from "../ports/source"
import type { TableValue, Value } from "../ports/value"
import { BuildError } from "./errors/build-error"
import { ParseError } from "./errors/parse-error"
import type { FormatRegistry } from "./format-registry"
import { mergeAll } from "./merge/merge"
import { table, tableEntries } from "./value/value"

/** One parsed source, the env table or the changes table. */
export type Layer = {
  readonly name: string
  readonly value: TableValue
}

export type LoadContext = {
  formats: FormatRegistry
  ordered: boolean
  logger: Logger
}

/**
 * Reads and parses one source. A missing optional file is an empty table.
 *
 * @throws ParseError
 */
export function parseSource(source: ConfigSource, ctx: LoadContext): Value {
  const adapter = ctx.formats.get(source.format)
  if (adapter === undefined) throw ParseError.formatUnavailable(source.name, source.format)

  let content: string | undefined
  try {
    content = source.read()
  } catch (err) {
    throw ParseError.unreadable(source.name, err)
  }

  if (content === undefined) {
    ctx.logger.debug("optional source missing", { source: source.name, format: source.format })
    return table([], ctx.ordered)
  }

  try {
    return adapter.parse(content, { ordered: ctx.ordered })
  } catch (err) {
    throw ParseError.malformed(source.name, source.format, err)
  }
}

/**
 * @throws ParseError when a source cannot be parsed
 * @throws BuildError `root_not_table` when a source does not hold a table
 */
export function readLayer(source: ConfigSource, ctx: LoadContext): Layer {
  const value = parseSource(source, ctx)
  if (value.kind !== "table") throw BuildError.rootNotTable(source.name, value.kind)

  ctx.logger.debug("source parsed", {
    source: source.name,
    format: source.format,
    keys: value.entries.size,
  })

  return { name: source.name, value }
}

/** Fail-fast: the first failing source stops the read. */
export function readLayers(sources: readonly ConfigSource[], ctx: LoadContext): Layer[] {
  return sources.map((source) => readLayer(source, ctx))
}

export function composeRoot(layers: readonly Layer[], ordered: boolean): TableValue {
  return mergeAll(
    layers.map((layer) => layer.value),
    ordered,
  )
}

/**
 * Drops entries of `changes` whose path does not exist in `base`. Tables on
 * both sides are pruned recursively; a table emptied by pruning is dropped.
 */
export function pruneToBase(changes: TableValue, base: TableValue): TableValue {
  const kept: Array<[string, Value]> = []

  for (const [key, value] of tableEntries(changes)) {
    const existing = base.entries.get(key)
    if (existing === undefined) continue

    if (value.kind === "table" && existing.kind === "table") {
      const pruned = pruneToBase(value, existing)
      if (pruned.entries.size > 0 || value.entries.size === 0) kept.push([key, pruned])
    } else {
      kept.push([key, value])
    }
  }

  return table(kept, changes.ordered)
}

export type LoadedLayers = {
  sources: Layer[]
  env: Layer | undefined
}

/**
 * Reads every source, then the environment.
 *
 * @throws ParseError
 * @throws BuildError `root_not_table`
 */
export function loadLayers(
  sources: readonly ConfigSource[],
  envOverride: EnvOverride | undefined,
  ctx: LoadContext,
): LoadedLayers {
  const layers = readLayers(sources, ctx)
  const env =
    envOverride === undefined
      ? undefined
      : { name: envOverride.name, value: envOverride.toTable(ctx.ordered) }

  return { sources: layers, env }
}
