import type { FormatTag } from "../../ports/format"
import type { ConfigSource } from "../../ports/source"

/**
 * In-memory text. Always returns the same content and cannot be written to,
 * so saving to it only returns the serialized text.
 */
export class StringSource implements ConfigSource {
  constructor(
    readonly name: string,
    readonly format: FormatTag,
    private readonly content: string,
  ) {}

  read(): string {
    return this.content
  }
}
