import type { FormatAdapter, ParseOptions } from "../../ports/format"
import type { Value } from "../../ports/value"
import { parseRon } from "./ron-parser"
import { writeRon } from "./ron-writer"

export class RonFormat implements FormatAdapter {
  readonly format = "ron"

  parse(content: string, { ordered }: ParseOptions): Value {
    return parseRon(content, ordered)
  }

  serialize(value: Value): string {
    return writeRon(value)
  }
}
