// adapters/json/json-format.ts
import { type Node, type ParseError, parseTree, printParseErrorCode } from "jsonc-parser"
import { formatPath } from "../../core/value/path"
import { array, bool, float, int, nullValue, str, table, tableEntries } from "../../core/value/value"
import type { FormatAdapter, ParseOptions } from "../../ports/format"
import type { Value } from "../../ports/value"

/**
 * Options for the JSON format adapter.
 */
export type JsonFormatOptions = {
  /**
   * Indentation used when saving, as `JSON.stringify` takes it.
   *
   * @default undefined (compact)
   */
  indent?: number | string
}

const INTEGER_LITERAL = /^-?(0|[1-9][0-9]*)$/
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

/**
 * Strict JSON. A number is an int when its literal has no fraction or
 * exponent and fits in 64 bits, and a float otherwise, so `1.0` stays a
 * float and large ids keep every digit. Ints are written back as exact
 * digits and integral floats keep a `.0`.
 */
export class JsonFormat implements FormatAdapter {
  readonly format = "json"

  constructor(private readonly opts: JsonFormatOptions = {}) {}

  parse(content: string, { ordered }: ParseOptions): Value {
    const errors: ParseError[] = []
    const root = parseTree(content, errors, {
      disallowComments: true,
      allowTrailingComma: false,
      allowEmptyContent: false,
    })

    const first = errors[0]
    if (first) {
      throw new SyntaxError(`${printParseErrorCode(first.error)} at offset ${first.offset}`)
    }
    if (!root) throw new SyntaxError("Empty JSON document")

    return fromNode(root, content, ordered)
  }

  serialize(value: Value): string {
    return write(value, [], indentUnit(this.opts.indent), "")
  }
}

function fromNode(node: Node, content: string, ordered: boolean): Value {
  switch (node.type) {
    case "null":
      return nullValue()
    case "boolean":
      return bool(node.value === true)
    case "string":
      return str(String(node.value))
    case "number":
      return numberLiteral(content.slice(node.offset, node.offset + node.length))
    case "array":
      return array((node.children ?? []).map((child) => fromNode(child, content, ordered)))
    case "object":
      return table(
        (node.children ?? []).map((property) => {
          const [key, item] = property.children ?? []
          if (!key || !item) throw new SyntaxError(`Incomplete property at offset ${property.offset}`)
          return [String(key.value), fromNode(item, content, ordered)] as const
        }),
        ordered,
      )
    case "property":
      throw new SyntaxError(`Unexpected property at offset ${node.offset}`)
  }
}

function numberLiteral(text: string): Value {
  if (INTEGER_LITERAL.test(text)) {
    const n = BigInt(text)
    if (n >= INT64_MIN && n <= INT64_MAX) return int(n)
  }
  return float(Number(text))
}

function write(value: Value, at: string[], unit: string, indent: string): string {
  switch (value.kind) {
    case "null":
      return "null"
    case "bool":
      return String(value.value)
    case "int":
      return value.value.toString()
    case "float":
      return writeFloat(value.value, at)
    case "string":
      return JSON.stringify(value.value)
    case "array": {
      const items = value.items.map((item, i) =>
        write(item, [...at, String(i)], unit, indent + unit),
      )
      return wrap("[", "]", items, unit, indent)
    }
    case "table": {
      const separator = unit ? ": " : ":"
      const members = tableEntries(value).map(
        ([key, item]) => JSON.stringify(key) + separator + write(item, [...at, key], unit, indent + unit),
      )
      return wrap("{", "}", members, unit, indent)
    }
  }
}

function writeFloat(n: number, at: string[]): string {
  if (!Number.isFinite(n)) throw new TypeError(`JSON cannot represent ${n} at "${formatPath(at)}"`)
  if (Object.is(n, -0)) return "-0.0"
  return Number.isInteger(n) && Math.abs(n) < 1e21 ? n.toFixed(1) : String(n)
}

function wrap(open: string, close: string, parts: string[], unit: string, indent: string): string {
  if (parts.length === 0) return open + close
  if (!unit) return open + parts.join(",") + close

  const inner = indent + unit
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${indent}${close}`
}

function indentUnit(indent: number | string | undefined): string {
  if (typeof indent === "number") return " ".repeat(Math.min(10, Math.max(0, Math.floor(indent))))
  return (indent ?? "").slice(0, 10)
}
