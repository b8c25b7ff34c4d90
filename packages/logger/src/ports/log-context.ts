export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the configuration source being read, e.g. "env" or "json:app.json". */
  source: string
  /** Configuration item the entry is about. */
  item: string
  /** Correlates every entry emitted by one parse. */
  parseId: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
