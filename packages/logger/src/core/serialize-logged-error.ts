import { isHttpError, serializeHttpError } from "@faultline/errors"
import { errWithCause } from "pino-std-serializers"

/**
 * `err` serializer for log entries.
 *
 * Error chains are logged with their resolved attributes and authoritative stack trace.
 * Other errors keep pino's standard shape, causes included. Anything else passes through.
 */
export function serializeLoggedError(err: unknown): unknown {
  if (isHttpError(err)) return serializeHttpError(err, { includeStack: true })
  if (err instanceof Error) return errWithCause(err)

  return err
}
