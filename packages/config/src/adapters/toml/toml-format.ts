import { parse, stringify } from "smol-toml"
import { formatPath } from "../../core/value/path"
import { fromNative, toNativeTable } from "../../core/value/native"
import type { FormatAdapter, ParseOptions } from "../../ports/format"
import type { Value } from "../../ports/value"

/**
 * TOML through `smol-toml`. Integers are read and written as bigint, so ints
 * and floats keep their own types across a save. Dates and times parse as
 * their ISO strings. TOML has no null, so saving a tree that holds one fails.
 */
export class TomlFormat implements FormatAdapter {
  readonly format = "toml"

  parse(content: string, { ordered }: ParseOptions): Value {
    return fromNative(parse(content, { integersAsBigInt: true }), { ordered, numbers: "float" })
  }

  serialize(value: Value): string {
    if (value.kind !== "table") throw new TypeError(`TOML documents must be tables, got ${value.kind}`)

    assertNoNull(value, [])

    return stringify(toNativeTable(value, { ints: "bigint" }), { numbersAsFloat: true })
  }
}

function assertNoNull(value: Value, at: string[]): void {
  switch (value.kind) {
    case "null":
      throw new TypeError(`TOML cannot represent null at "${formatPath(at)}"`)
    case "array":
      value.items.forEach((item, i) => assertNoNull(item, [...at, String(i)]))
      return
    case "table":
      for (const [key, item] of value.entries) assertNoNull(item, [...at, key])
      return
    default:
      return
  }
}
