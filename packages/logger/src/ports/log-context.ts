/**
 * Well-known fields attached to log entries emitted while loading,
 * querying or persisting configuration.
 */
export type LogContext = {
  service: string
  module: string

  /** Source identifier, e.g. "base.json" */
  source: string
  /** Format tag of the source, e.g. "yaml" */
  format: string
  /** Dotted key path or file path the entry is about */
  path: string
  operation: "build" | "reload" | "restore" | "save"

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Partial overlay passed to `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
