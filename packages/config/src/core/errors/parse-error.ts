import { BaseError } from "@stratum/errors"
import type { FormatTag } from "../../ports/format"
import { describeCause } from "./describe-cause"

export type ParseErrorCode = "parse_failed" | "source_unreadable" | "format_unavailable"

/**
 * A source could not be turned into a `Value`. Always names the source.
 */
export class ParseError extends BaseError<ParseErrorCode> {
  static malformed(source: string, format: FormatTag, cause: unknown): ParseError {
    return new ParseError(`Failed to parse "${source}" as ${format}: ${describeCause(cause)}`, {
      code: "parse_failed",
      context: { source, format },
      cause,
    })
  }

  static unreadable(source: string, cause: unknown): ParseError {
    return new ParseError(`Failed to read "${source}": ${describeCause(cause)}`, {
      code: "source_unreadable",
      context: { source },
      cause,
    })
  }

  static formatUnavailable(source: string, format: FormatTag): ParseError {
    return new ParseError(`No adapter is registered for format "${format}" (source "${source}")`, {
      code: "format_unavailable",
      context: { source, format },
    })
  }

  get source(): string {
    return String(this.context.source)
  }
}
