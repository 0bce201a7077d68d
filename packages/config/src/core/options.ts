import { createNullLogger, type Logger } from "@stratum/logger"
import { createFormatRegistry, type FormatRegistry } from "./format-registry"

export type ConfigBuilderOptions = {
  /**
   * Keep insertion order in every table. When false, tables iterate sorted
   * by key.
   * @default true
   */
  ordered?: boolean

  /**
   * Receives build, reload, restore and save events under
   * `{ module: "config" }`.
   * @default NullLogger
   */
  logger?: Logger

  /**
   * Adapters available to sources.
   * @default createFormatRegistry() (every built-in format)
   */
  formats?: FormatRegistry
}

export type ResolvedBuilderOptions = {
  ordered: boolean
  logger: Logger
  formats: FormatRegistry
}

export const DEFAULTS = {
  ordered: true,
} as const

export function resolveBuilderOptions(options: ConfigBuilderOptions): ResolvedBuilderOptions {
  const logger = options.logger ?? createNullLogger()

  return {
    ordered: options.ordered ?? DEFAULTS.ordered,
    logger: logger.child({ module: "config" }),
    formats: options.formats ?? createFormatRegistry(),
  }
}
