import type { Value } from "../../ports/value"
import { tableEntries } from "../../core/value/value"

const IDENT = /^[A-Za-z_][A-Za-z0-9_]*$/
const INDENT = "    "

/**
 * Pretty-prints a value as RON. Tables whose keys are all identifiers are
 * written as anonymous structs, other tables as maps. Arrays of scalars stay
 * on one line.
 */
export function writeRon(value: Value): string {
  return `${write(value, 0)}\n`
}

function write(value: Value, depth: number): string {
  switch (value.kind) {
    case "null":
      return "None"
    case "bool":
    case "int":
      return String(value.value)
    case "float":
      return writeFloat(value.value)
    case "string":
      return quote(value.value)
    case "array": {
      if (value.items.every(isScalar)) return `[${value.items.map((item) => write(item, depth)).join(", ")}]`

      return block("[", "]", value.items.map((item) => write(item, depth + 1)), depth)
    }
    case "table": {
      const entries = tableEntries(value)
      if (entries.length === 0) return "{}"

      const asStruct = entries.every(([key]) => IDENT.test(key))
      const lines = entries.map(
        ([key, item]) => `${asStruct ? key : quote(key)}: ${write(item, depth + 1)}`,
      )

      return asStruct ? block("(", ")", lines, depth) : block("{", "}", lines, depth)
    }
  }
}

function block(open: string, close: string, lines: string[], depth: number): string {
  const pad = INDENT.repeat(depth + 1)
  return `${open}\n${lines.map((line) => `${pad}${line},\n`).join("")}${INDENT.repeat(depth)}${close}`
}

function isScalar(value: Value): boolean {
  return value.kind !== "array" && value.kind !== "table"
}

function writeFloat(n: number): string {
  if (Number.isNaN(n)) return "NaN"
  if (n === Number.POSITIVE_INFINITY) return "inf"
  if (n === Number.NEGATIVE_INFINITY) return "-inf"

  const text = String(n)
  return /[.e]/.test(text) ? text : `${text}.0`
}

function quote(text: string): string {
  let out = '"'

  for (const c of text) {
    switch (c) {
      case '"':
        out += '\\"'
        break
      case "\\":
        out += "\\\\"
        break
      case "\n":
        out += "\\n"
        break
      case "\r":
        out += "\\r"
        break
      case "\t":
        out += "\\t"
        break
      default: {
        const point = c.codePointAt(0) ?? 0
        out += point < 0x20 ? `\\u{${point.toString(16)}}` : c
      }
    }
  }

  return `${out}"`
}
