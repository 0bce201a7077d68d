import type { FormatTag } from "./format"

/**
 * A source of raw configuration text.
 *
 * A ConfigSource only *reads*. Parsing, merging and coercion happen
 * downstream, driven by `format`.
 *
 * Sources are evaluated in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Identifier used for diagnostics, provenance and as a save target.
   * Example: "base.json", "defaults"
   */
  readonly name: string

  readonly format: FormatTag

  /**
   * Returns the raw text, or `undefined` when an optional backing file is
   * missing. Called again on every reload.
   */
  read(): string | undefined
}

/**
 * A source that can persist serialized content back to where it came from.
 */
export interface WritableConfigSource extends ConfigSource {
  write(content: string): void
}

export function isWritableSource(source: ConfigSource): source is WritableConfigSource {
  return "write" in source && typeof source.write === "function"
}
