import { BaseError } from "@stratum/errors"
import type { FormatTag } from "../../ports/format"
import { describeCause } from "./describe-cause"

export type SaveErrorCode = "unknown_source" | "unsupported" | "serialize_failed" | "io"

export class SaveError extends BaseError<SaveErrorCode> {
  static unknownSource(target: string): SaveError {
    return new SaveError(`No source named "${target}" to save to`, {
      code: "unknown_source",
      context: { target },
    })
  }

  static unsupported(target: string, format: FormatTag): SaveError {
    return new SaveError(`Format ${format} of "${target}" cannot be serialized`, {
      code: "unsupported",
      context: { target, format },
    })
  }

  static serializeFailed(target: string, format: FormatTag, cause: unknown): SaveError {
    return new SaveError(`Failed to serialize "${target}" as ${format}: ${describeCause(cause)}`, {
      code: "serialize_failed",
      context: { target, format },
      cause,
    })
  }

  static io(target: string, format: FormatTag, cause: unknown): SaveError {
    return new SaveError(`Failed to write "${target}": ${describeCause(cause)}`, {
      code: "io",
      context: { target, format },
      cause,
    })
  }
}
