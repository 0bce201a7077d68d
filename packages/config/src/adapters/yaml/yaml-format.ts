import { parse, Scalar, stringify } from "yaml"
import { fromNative } from "../../core/value/native"
import { tableEntries } from "../../core/value/value"
import type { FormatAdapter, ParseOptions } from "../../ports/format"
import type { Value } from "../../ports/value"

/**
 * YAML through the `yaml` package.
 *
 * Integers are read as bigint so every JS number that comes back is a float.
 * Mappings are read as `Map` to keep key order. An empty document is an
 * empty table.
 */
export class YamlFormat implements FormatAdapter {
  readonly format = "yaml"

  parse(content: string, { ordered }: ParseOptions): Value {
    const doc: unknown = parse(content, { intAsBigInt: true, mapAsMap: true })

    return fromNative(doc ?? new Map(), { ordered, numbers: "float" })
  }

  serialize(value: Value): string {
    return stringify(toYamlNode(value))
  }
}

/** Integral floats keep a fraction digit so they read back as floats. */
function toYamlNode(value: Value): unknown {
  switch (value.kind) {
    case "null":
      return null
    case "bool":
    case "int":
    case "string":
      return value.value
    case "float": {
      if (!Number.isInteger(value.value)) return value.value

      const scalar = new Scalar(value.value)
      scalar.minFractionDigits = 1
      return scalar
    }
    case "array":
      return value.items.map(toYamlNode)
    case "table":
      return new Map(tableEntries(value).map(([key, item]) => [key, toYamlNode(item)]))
  }
}
