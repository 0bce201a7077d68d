import type { NativeValue, TableValue, Value } from "../../ports/value"
import { array, bool, float, int, nullValue, str, table, tableEntries } from "./value"

export type FromNativeOptions = {
  /** @default true */
  ordered?: boolean

  /**
   * How JS numbers map onto the tree.
   *
   * - `"infer"`: safe integral numbers become ints, everything else floats.
   * - `"float"`: every number is a float. For parsers that already hand
   *   integers over as bigint.
   *
   * @default "infer"
   */
  numbers?: "infer" | "float"
}

/**
 * Converts parser output into a `Value`.
 *
 * @throws TypeError on functions, symbols and non-plain objects
 */
export function fromNative(input: unknown, options: FromNativeOptions = {}): Value {
  const ordered = options.ordered ?? true
  const numbers = options.numbers ?? "infer"

  const convert = (x: unknown, at: string): Value => {
    if (x === null || x === undefined) return nullValue()

    switch (typeof x) {
      case "boolean":
        return bool(x)
      case "bigint":
        return int(x)
      case "number":
        return numbers === "infer" && Number.isSafeInteger(x) ? int(x) : float(x)
      case "string":
        return str(x)
    }

    if (x instanceof Date) return str(x.toISOString())

    if (Array.isArray(x)) {
      return array(x.map((item: unknown, i) => convert(item, join(at, String(i)))))
    }

    if (x instanceof Map) {
      return table(
        [...x].map(([key, item]: [unknown, unknown]) => {
          const name = String(key)
          return [name, convert(item, join(at, name))] as const
        }),
        ordered,
      )
    }

    if (isPlainObject(x)) {
      return table(
        Object.entries(x).map(([key, item]) => [key, convert(item, join(at, key))] as const),
        ordered,
      )
    }

    throw new TypeError(`Cannot represent ${describe(x)} at "${at}" as a config value`)
  }

  return convert(input, "")
}

export type ToNativeOptions = {
  /**
   * `"auto"` hands ints back as numbers when they are safe integers and as
   * bigints otherwise. `"bigint"` always uses bigint, for writers that tell
   * integers from floats by JS type.
   *
   * @default "auto"
   */
  ints?: "auto" | "bigint"
}

/**
 * Converts a `Value` into plain JS.
 */
export function toNative(value: Value, options: ToNativeOptions = {}): NativeValue {
  switch (value.kind) {
    case "null":
      return null
    case "bool":
    case "float":
    case "string":
      return value.value
    case "int": {
      if (options.ints === "bigint") return value.value
      const n = Number(value.value)
      return Number.isSafeInteger(n) ? n : value.value
    }
    case "array":
      return value.items.map((item) => toNative(item, options))
    case "table":
      return toNativeTable(value, options)
  }
}

export function toNativeTable(
  value: TableValue,
  options: ToNativeOptions = {},
): { [key: string]: NativeValue } {
  return Object.fromEntries(
    tableEntries(value).map(([key, item]) => [key, toNative(item, options)]),
  )
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  if (typeof x !== "object" || x === null) return false

  const proto: unknown = Object.getPrototypeOf(x)
  return proto === Object.prototype || proto === null
}

function join(at: string, key: string): string {
  return at === "" ? key : `${at}.${key}`
}

function describe(x: unknown): string {
  return typeof x === "object" ? Object.prototype.toString.call(x) : typeof x
}
