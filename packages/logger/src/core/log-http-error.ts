import {
  httpResponseCodeFromError,
  toHttpError,
  UNINITIALIZED_ERROR_CODE,
} from "@faultline/errors"
import type { LogContextPatch } from "../ports/log-context"
import type { Logger } from "../ports/logger"

/** Logged as `code` when no error in the chain set an error code */
export const UNKNOWN_FAILURE_CODE = "unknown"

/**
 * Centralized request-failure logging policy:
 * - 5xx => error with `err`
 * - 4xx => warn without `err`, debug with `err`
 *
 * Status, code and retriability are read from the error chain.
 */
export function logHttpError(logger: Logger, err: unknown, meta: LogContextPatch = {}): void {
  const chain = toHttpError(err)
  const errorCode = chain.errorCode()

  const base = {
    ...meta,
    ...(meta.method && meta.route ? { op: `${meta.method} ${meta.route}` } : {}),
    status: httpResponseCodeFromError(chain),
    code: errorCode === UNINITIALIZED_ERROR_CODE ? UNKNOWN_FAILURE_CODE : errorCode,
    retriable: chain.retriable(),
  }

  if (base.status >= 500) {
    logger.error("Request failed", { ...base, err })
    return
  }

  logger.warn("Request failed", base)
  logger.debug("Request failed details", { ...base, err })
}
