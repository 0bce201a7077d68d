import type {
  ArrayValue,
  BoolValue,
  FloatValue,
  IntValue,
  NullValue,
  StringValue,
  TableValue,
  Value,
  ValueKind,
} from "../../ports/value"

const NULL: NullValue = { kind: "null" }

export function nullValue(): NullValue {
  return NULL
}

export function bool(value: boolean): BoolValue {
  return { kind: "bool", value }
}

/**
 * @throws RangeError when a number is not an integer or outside 64-bit range
 */
export function int(value: number | bigint): IntValue {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new RangeError(`${value} is not an integer`)
  }

  const big = BigInt(value)

  if (BigInt.asIntN(64, big) !== big) {
    throw new RangeError(`${big} does not fit in a 64-bit integer`)
  }

  return { kind: "int", value: big }
}

export function float(value: number): FloatValue {
  return { kind: "float", value }
}

export function str(value: string): StringValue {
  return { kind: "string", value }
}

export function array(items: Iterable<Value> = []): ArrayValue {
  return { kind: "array", items: [...items] }
}

/**
 * Builds a table. A repeated key replaces the earlier value and keeps its
 * position.
 */
export function table(entries: Iterable<readonly [string, Value]> = [], ordered = true): TableValue {
  const map = new Map<string, Value>()

  for (const [key, value] of entries) {
    map.set(key, value)
  }

  return { kind: "table", entries: map, ordered }
}

export function kindOf(value: Value): ValueKind {
  return value.kind
}

export function isTable(value: Value): value is TableValue {
  return value.kind === "table"
}

/**
 * Entries in the order the table's mode requires: insertion order when
 * ordered, sorted by key otherwise.
 */
export function tableEntries(value: TableValue): Array<[string, Value]> {
  const entries = [...value.entries]

  if (!value.ordered) {
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  }

  return entries
}

export function tableKeys(value: TableValue): string[] {
  return tableEntries(value).map(([key]) => key)
}

/**
 * Structural equality. Table key order is ignored; floats compare with
 * `Object.is` so NaN equals NaN.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null"
    case "bool":
      return b.kind === "bool" && b.value === a.value
    case "int":
      return b.kind === "int" && b.value === a.value
    case "string":
      return b.kind === "string" && b.value === a.value
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value)
    case "array":
      return (
        b.kind === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i]
          return other !== undefined && valueEquals(item, other)
        })
      )
    case "table": {
      if (b.kind !== "table" || a.entries.size !== b.entries.size) return false

      for (const [key, value] of a.entries) {
        const other = b.entries.get(key)
        if (other === undefined || !valueEquals(value, other)) return false
      }

      return true
    }
  }
}

export function cloneValue<V extends Value>(value: V): V
export function cloneValue(value: Value): Value {
  switch (value.kind) {
    case "null":
      return NULL
    case "bool":
    case "int":
    case "float":
    case "string":
      return { ...value }
    case "array":
      return array(value.items.map((item) => cloneValue(item)))
    case "table":
      return table(
        [...value.entries].map(([key, item]) => [key, cloneValue(item)] as const),
        value.ordered,
      )
  }
}
