/**
 * Well-known structured fields. Anything else can still be attached through
 * the open `Record<string, unknown>` part of {@link LogMeta}.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  left: number
  right: number
  index: number

  capacity: number
  size: number
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
