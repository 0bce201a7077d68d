import { BaseError } from "@stratum/errors"

export type GetErrorCode = "not_found" | "type_mismatch" | "coercion_failure"

export type SchemaIssue = {
  path: string
  message: string
}

export class GetError extends BaseError<GetErrorCode> {
  static notFound(path: string): GetError {
    return new GetError(`No config value at "${path}"`, {
      code: "not_found",
      context: { path },
    })
  }

  static typeMismatch(
    path: string,
    expected: string,
    actual: string,
    issues?: readonly SchemaIssue[],
  ): GetError {
    return new GetError(`Config value at "${path}" is ${actual}, expected ${expected}`, {
      code: "type_mismatch",
      context: { path, expected, actual, ...(issues && { issues }) },
    })
  }

  static coercionFailure(path: string, expected: string, actual: string, reason: string): GetError {
    return new GetError(`Cannot convert ${actual} at "${path}" to ${expected}: ${reason}`, {
      code: "coercion_failure",
      context: { path, expected, actual },
    })
  }
}
