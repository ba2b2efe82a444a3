import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options decide which log levels are emitted and whether output is rendered for
 * humans or for log processors. The pino adapter honors both; the null adapter ignores them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development.
   * Leave off in production, where structured (JSON) logs are ingested.
   */
  prettify?: boolean
}
