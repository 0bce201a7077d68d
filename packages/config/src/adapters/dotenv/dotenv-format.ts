import { parse } from "dotenv"
import { fromNative } from "../../core/value/native"
import { tableEntries } from "../../core/value/value"
import type { FormatAdapter, ParseOptions } from "../../ports/format"
import type { Value } from "../../ports/value"

const KEY = /^[\w.-]+$/
const BARE = /^[\w./:@+,=-]*$/

/**
 * `.env` files through `dotenv`. Every value parses as a string in a flat
 * table; nested tables and arrays cannot be saved.
 */
export class DotenvFormat implements FormatAdapter {
  readonly format = "dotenv"

  parse(content: string, { ordered }: ParseOptions): Value {
    return fromNative(parse(content), { ordered })
  }

  serialize(value: Value): string {
    if (value.kind !== "table") throw new TypeError(`dotenv files must be tables, got ${value.kind}`)

    return tableEntries(value)
      .map(([key, item]) => `${checkKey(key)}=${quote(key, scalarText(key, item))}\n`)
      .join("")
  }
}

function checkKey(key: string): string {
  if (!KEY.test(key)) throw new TypeError(`"${key}" is not a valid dotenv variable name`)
  return key
}

function scalarText(key: string, value: Value): string {
  switch (value.kind) {
    case "null":
      return ""
    case "bool":
    case "int":
    case "float":
      return String(value.value)
    case "string":
      return value.value
    case "array":
    case "table":
      throw new TypeError(`dotenv cannot represent the nested ${value.kind} at "${key}"`)
  }
}

/**
 * Single quotes keep text literal. Double quotes expand `\n`, so they are
 * only used when the text holds no such sequence.
 */
function quote(key: string, text: string): string {
  if (BARE.test(text)) return text
  if (!text.includes("'")) return `'${text}'`
  if (!text.includes('"') && !/\\[nr]/.test(text)) return `"${text}"`
  if (!text.includes("`")) return `\`${text}\``

  throw new TypeError(`dotenv cannot quote the value of "${key}"`)
}
