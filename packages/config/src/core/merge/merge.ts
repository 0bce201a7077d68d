import type { TableValue, Value } from "../../ports/value"
import { table } from "../value/value"

/**
 * Deep-merges `right` over `left` without touching either.
 *
 * Tables merge key by key: shared keys recurse and keep left's position,
 * new keys are appended in right's order. Anything else, arrays and nulls
 * included, is replaced by right.
 */
export function mergeValues(left: Value, right: Value): Value {
  if (left.kind === "table" && right.kind === "table") return mergeTables(left, right)

  return right
}

export function mergeTables(left: TableValue, right: TableValue): TableValue {
  const entries = new Map(left.entries)

  for (const [key, value] of right.entries) {
    const existing = entries.get(key)
    entries.set(key, existing === undefined ? value : mergeValues(existing, value))
  }

  return table(entries, left.ordered)
}

/**
 * Left fold from the empty table; the last table wins.
 */
export function mergeAll(tables: Iterable<TableValue>, ordered = true): TableValue {
  let merged = table([], ordered)

  for (const next of tables) {
    merged = mergeTables(merged, next)
  }

  return merged
}
