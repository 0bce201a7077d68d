import type { GetError } from "../core/errors/get-error"

export type GetResult<T> = { kind: "found"; value: T } | { kind: "failed"; error: GetError }
