import type { Value } from "./value"

export const builtinFormats = ["json", "yaml", "toml", "ini", "ron", "dotenv"] as const

export type BuiltinFormat = (typeof builtinFormats)[number]

/**
 * Format identifier. Built-in tags autocomplete; custom adapters may register
 * any other tag.
 */
export type FormatTag = BuiltinFormat | (string & {})

export type ParseOptions = {
  /** Whether parsed tables keep insertion order. */
  ordered: boolean
}

/**
 * Turns raw text of one format into a `Value` and, optionally, back.
 *
 * Adapters may throw on malformed input; the caller wraps the throw with the
 * source it came from.
 */
export interface FormatAdapter {
  readonly format: FormatTag

  parse(content: string, options: ParseOptions): Value

  /**
   * Absent when the format is read-only. Saving to a source of such a format
   * is rejected as unsupported.
   */
  serialize?(value: Value): string
}
