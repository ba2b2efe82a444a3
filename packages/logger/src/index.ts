export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export { logHttpError, UNKNOWN_FAILURE_CODE } from "./core/log-http-error"
export { loggerOptionsFromEnv } from "./core/logger-options-from-env"
export { serializeLoggedError } from "./core/serialize-logged-error"
export type {
  LogContext,
  LogContextPatch,
  LogEvent,
  LogFailure,
  LogMeta,
  LogOutcome,
} from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
