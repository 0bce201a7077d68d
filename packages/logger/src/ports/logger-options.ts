import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Leave off where logs are
   * ingested as JSON.
   */
  prettify?: boolean
}
