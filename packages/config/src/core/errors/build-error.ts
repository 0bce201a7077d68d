import { BaseError } from "@stratum/errors"
import type { ValueKind } from "../../ports/value"
import type { ParseError } from "./parse-error"

export type BuildErrorCode = "build_parse_failed" | "root_not_table"

export class BuildError extends BaseError<BuildErrorCode> {
  static parseFailed(err: ParseError): BuildError {
    return new BuildError(`Failed to build config: ${err.message}`, {
      code: "build_parse_failed",
      context: { source: err.source },
      cause: err,
    })
  }

  static rootNotTable(source: string, kind: ValueKind): BuildError {
    return new BuildError(`Source "${source}" must hold a table at its root, found ${kind}`, {
      code: "root_not_table",
      context: { source, kind },
    })
  }
}
