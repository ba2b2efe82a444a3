import type { HttpError, SerializedHttpError } from "../ports/http-error"

/**
 * Options for error serialization.
 */
export type SerializeOptions = Readonly<{
  /** Include the chain's stack trace in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize an error chain to its resolved attributes.
 *
 * @example
 * ```ts
 * serializeHttpError(toHttpError(err), { includeStack: true })
 * ```
 */
export function serializeHttpError(
  err: HttpError,
  options?: SerializeOptions,
): SerializedHttpError {
  const includeStack = options?.includeStack ?? false
  const stack = includeStack ? err.stackTrace() : ""

  return {
    name: err.name,
    message: err.outerMessage(),
    innerMessage: err.innerMessage(),
    messages: err.messages(),
    responseCode: err.responseCode(),
    errorCode: err.errorCode(),
    retriable: err.retriable(),
    ...(stack && { stack }),
  }
}
