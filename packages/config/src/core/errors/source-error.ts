import { BaseError } from "@stratum/errors"

export type SourceErrorCode = "unknown_format"

export class SourceError extends BaseError<SourceErrorCode> {
  static unknownFormat(file: string): SourceError {
    return new SourceError(`Cannot infer a config format from "${file}"`, {
      code: "unknown_format",
      context: { file },
    })
  }
}
