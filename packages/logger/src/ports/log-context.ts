export type LogContext = {
  requestId: string
  traceId: string
  spanId: string

  ip: string
  method: string
  path: string
  route: string

  service: string
  module: string
  env: string
}

export type LogOutcome = {
  status: number
  durationMs: number
}

/**
 * Resolved attributes of a failure, as read from its error chain.
 */
export type LogFailure = {
  code: string
  retriable: boolean
}

export type LogEvent = {
  /** The failure itself; error chains are expanded by the adapter's `err` serializer */
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogFailure> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
