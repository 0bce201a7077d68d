import type { Value } from "../../ports/value"
import { tableEntries } from "./value"

/**
 * Human-readable rendering used by `Config.toString()`.
 *
 * @example formatValue(table([["a", int(1)]])) // '{(a: 1)}'
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case "null":
      return "null"
    case "bool":
    case "int":
    case "float":
      return String(value.value)
    case "string":
      return JSON.stringify(value.value)
    case "array":
      return `[${value.items.map(formatValue).join(", ")}]`
    case "table":
      return `{${tableEntries(value)
        .map(([key, item]) => `(${key}: ${formatValue(item)})`)
        .join(", ")}}`
  }
}
