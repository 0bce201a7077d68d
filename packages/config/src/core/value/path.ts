import type { TableValue, Value } from "../../ports/value"
import { table } from "./value"

export type Path = string | readonly string[]

const INDEX = /^(0|[1-9][0-9]*)$/

/**
 * Splits a dot-separated path. The empty path addresses the root.
 *
 * @example parsePath("server.hosts.0") // ["server", "hosts", "0"]
 */
export function parsePath(path: Path): string[] {
  if (typeof path !== "string") return [...path]
  return path === "" ? [] : path.split(".")
}

export function formatPath(segments: readonly PropertyKey[]): string {
  return segments.map(String).join(".")
}

/**
 * Returns the value at `path`, or `undefined` when a segment is missing or
 * steps into something it cannot index.
 */
export function lookup(root: Value, path: Path): Value | undefined {
  let current: Value = root

  for (const segment of parsePath(path)) {
    const next = child(current, segment)
    if (next === undefined) return undefined
    current = next
  }

  return current
}

function child(value: Value, segment: string): Value | undefined {
  if (value.kind === "table") return value.entries.get(segment)
  if (value.kind === "array" && INDEX.test(segment)) return value.items[Number(segment)]

  return undefined
}

/**
 * Returns a copy of `root` with `value` at `path`. Missing or non-table
 * intermediates become tables. Arrays are atomic and get replaced too.
 *
 * @throws RangeError on the empty path
 */
export function setPath(root: TableValue, path: Path, value: Value): TableValue {
  const [head, ...rest] = parsePath(path)

  if (head === undefined) throw new RangeError("Cannot replace the root table through a path")

  if (rest.length === 0) return withEntry(root, head, value)

  const existing = root.entries.get(head)
  const next = existing?.kind === "table" ? existing : table([], root.ordered)

  return withEntry(root, head, setPath(next, rest, value))
}

function withEntry(root: TableValue, key: string, value: Value): TableValue {
  const entries = new Map(root.entries)
  entries.set(key, value)

  return table(entries, root.ordered)
}
