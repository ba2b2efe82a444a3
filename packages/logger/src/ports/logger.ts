import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

/**
 * Structured logger port.
 *
 * `meta.err` may hold any thrown value. Adapters that serialize it log an error chain by its
 * resolved attributes (response code, error code, retriability, messages) and the chain's
 * stack trace, rather than by the outermost link alone.
 */
export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Logger whose entries carry this logger's context plus `context`.
   * Keys in `context` win over inherited ones; the parent is unchanged.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
