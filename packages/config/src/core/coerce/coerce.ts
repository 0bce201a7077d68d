import type { TargetKind, TargetTypes } from "../../ports/config"
import type { Value } from "../../ports/value"
import { GetError } from "../errors/get-error"
import { toNative, toNativeTable } from "../value/native"
import { cloneValue } from "../value/value"

type Coercion<K extends TargetKind> = (value: Value, path: string) => TargetTypes[K]

const INTEGER = /^[+-]?[0-9]+$/
const DECIMAL = /^[+-]?([0-9]+(\.[0-9]*)?|\.[0-9]+)([eE][+-]?[0-9]+)?$/
const SPECIAL_FLOATS: Readonly<Record<string, number>> = {
  inf: Number.POSITIVE_INFINITY,
  "+inf": Number.POSITIVE_INFINITY,
  "-inf": Number.NEGATIVE_INFINITY,
  nan: Number.NaN,
}
const TRUE_WORDS = new Set(["true", "t", "1"])
const FALSE_WORDS = new Set(["false", "f", "0"])

const coercions: { [K in TargetKind]: Coercion<K> } = {
  value: (value) => cloneValue(value),

  bool: (value, path) => {
    if (value.kind === "bool") return value.value
    if (value.kind === "string") {
      const word = value.value.toLowerCase()
      if (TRUE_WORDS.has(word)) return true
      if (FALSE_WORDS.has(word)) return false
      throw GetError.coercionFailure(path, "bool", "string", `"${value.value}" is not a boolean`)
    }
    throw GetError.typeMismatch(path, "bool", value.kind)
  },

  int: (value, path) => {
    const big = toBigInt(value, path, "int")
    const n = Number(big)
    if (!Number.isSafeInteger(n)) {
      throw GetError.coercionFailure(path, "int", value.kind, `${big} is outside the safe integer range`)
    }
    return n
  },

  bigint: (value, path) => toBigInt(value, path, "bigint"),

  float: (value, path) => {
    switch (value.kind) {
      case "float":
        return value.value
      case "int":
        return Number(value.value)
      case "string": {
        const n = parseFloatLiteral(value.value)
        if (n === undefined) {
          throw GetError.coercionFailure(path, "float", "string", `"${value.value}" is not a number`)
        }
        return n
      }
      default:
        throw GetError.typeMismatch(path, "float", value.kind)
    }
  },

  string: (value, path) => {
    if (value.kind === "string") return value.value
    throw GetError.typeMismatch(path, "string", value.kind)
  },

  array: (value, path) => {
    if (value.kind === "array") return value.items.map((item) => toNative(item))
    throw GetError.typeMismatch(path, "array", value.kind)
  },

  table: (value, path) => {
    if (value.kind !== "table") throw GetError.typeMismatch(path, "table", value.kind)

    return toNativeTable(value)
  },
}

/**
 * Converts a stored value into the requested kind.
 *
 * @throws GetError `type_mismatch` when the stored kind never converts to
 * the target, `coercion_failure` when this particular value does not
 */
export function coerce<K extends TargetKind>(value: Value, kind: K, path: string): TargetTypes[K] {
  const convert: Coercion<K> = coercions[kind]
  return convert(value, path)
}

function toBigInt(value: Value, path: string, expected: "int" | "bigint"): bigint {
  switch (value.kind) {
    case "int":
      return value.value
    case "float":
      if (!Number.isInteger(value.value)) {
        throw GetError.coercionFailure(path, expected, "float", `${value.value} has a fractional part`)
      }
      return within64Bits(BigInt(value.value), value, path, expected)
    case "string":
      if (!INTEGER.test(value.value)) {
        throw GetError.coercionFailure(path, expected, "string", `"${value.value}" is not an integer`)
      }
      return within64Bits(BigInt(value.value), value, path, expected)
    default:
      throw GetError.typeMismatch(path, expected, value.kind)
  }
}

function within64Bits(big: bigint, value: Value, path: string, expected: "int" | "bigint"): bigint {
  if (BigInt.asIntN(64, big) !== big) {
    throw GetError.coercionFailure(path, expected, value.kind, `${big} does not fit in 64 bits`)
  }
  return big
}

function parseFloatLiteral(text: string): number | undefined {
  const special = SPECIAL_FLOATS[text.toLowerCase()]
  if (special !== undefined) return special

  return DECIMAL.test(text) ? Number(text) : undefined
}
