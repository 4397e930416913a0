export type LogContext = {
  service: string
  module: string
  env: string

  /** Identifies one traced execution run. */
  runId: string
  op: string

  kind: number
  kindName: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
