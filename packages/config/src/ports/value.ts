/**
 * The tree every source is parsed into and every query reads from.
 *
 * Format-native values never cross a component boundary: adapters turn their
 * library's output into a `Value` and back.
 */
export type Value = NullValue | BoolValue | IntValue | FloatValue | StringValue | ArrayValue | TableValue

export type ValueKind = Value["kind"]

export type NullValue = { readonly kind: "null" }

export type BoolValue = { readonly kind: "bool"; readonly value: boolean }

/** 64-bit signed integer. */
export type IntValue = { readonly kind: "int"; readonly value: bigint }

export type FloatValue = { readonly kind: "float"; readonly value: number }

export type StringValue = { readonly kind: "string"; readonly value: string }

export type ArrayValue = { readonly kind: "array"; readonly items: readonly Value[] }

/**
 * String-keyed mapping.
 *
 * When `ordered` is true, iteration follows insertion order. When false,
 * iteration is sorted by key. Re-inserting a key keeps its first position.
 */
export type TableValue = {
  readonly kind: "table"
  readonly entries: ReadonlyMap<string, Value>
  readonly ordered: boolean
}

/**
 * Plain JS shape of a `Value`, as handed to callers and schema decoders.
 */
export type NativeValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | NativeValue[]
  | { [key: string]: NativeValue }
