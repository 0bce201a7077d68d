import type { TableValue, Value } from "../../ports/value"
import { setPath } from "../../core/value/path"
import { bool, float, int, str, table } from "../../core/value/value"

export type EnvOverrideOptions = {
  /**
   * Only variables starting with this prefix apply. The prefix is stripped
   * before the name is split.
   *
   * @example "APP_"
   */
  prefix: string

  /**
   * Splits the stripped name into path segments. Empty segments are dropped.
   *
   * @default "_"
   */
  separator?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /**
   * Lowercase path segments, so `APP_SERVER_PORT` addresses `server.port`.
   *
   * @default true
   */
  lowercase?: boolean
}

const INTEGER = /^[+-]?[0-9]+$/
const DECIMAL = /^[+-]?([0-9]+\.[0-9]*|\.[0-9]+|[0-9]+(\.[0-9]*)?[eE][+-]?[0-9]+)$/

/**
 * Turns prefixed environment variables into a table applied above every
 * other source.
 *
 * The mapping is read on every `toTable()` call, so a reload sees changes.
 */
export class EnvOverride {
  readonly name = "env"
  readonly prefix: string
  private readonly separator: string
  private readonly env: Record<string, string | undefined>
  private readonly lowercase: boolean

  constructor(options: EnvOverrideOptions) {
    if (options.separator === "") throw new RangeError("Env separator must not be empty")

    this.prefix = options.prefix
    this.separator = options.separator ?? "_"
    this.env = options.env ?? process.env
    this.lowercase = options.lowercase ?? true
  }

  /**
   * Variables apply in sorted name order, so `APP_A=1` then `APP_A_B=2`
   * yields `a = { b = 2 }`.
   */
  toTable(ordered: boolean): TableValue {
    let result = table([], ordered)

    for (const name of Object.keys(this.env).sort()) {
      const raw = this.env[name]
      if (raw === undefined || !name.startsWith(this.prefix)) continue

      const segments = this.segments(name.slice(this.prefix.length))
      if (segments.length === 0) continue

      result = setPath(result, segments, coerceEnvValue(raw))
    }

    return result
  }

  private segments(rest: string): string[] {
    return rest
      .split(this.separator)
      .filter((segment) => segment !== "")
      .map((segment) => (this.lowercase ? segment.toLowerCase() : segment))
  }
}

/**
 * Integer and float literals become numbers and `true`/`false` in any case
 * become booleans. Everything else, including integers beyond 64 bits, stays
 * a string.
 */
export function coerceEnvValue(raw: string): Value {
  if (INTEGER.test(raw)) {
    const big = BigInt(raw)
    if (BigInt.asIntN(64, big) === big) return int(big)
    return str(raw)
  }

  if (DECIMAL.test(raw)) return float(Number(raw))

  const lower = raw.toLowerCase()
  if (lower === "true") return bool(true)
  if (lower === "false") return bool(false)

  return str(raw)
}
