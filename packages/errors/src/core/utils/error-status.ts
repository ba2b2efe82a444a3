import { UNINITIALIZED_RESPONSE_CODE } from "../../ports/http-error"
import { getErrorsSettings } from "../settings"
import { toHttpError } from "./to-http-error"

/**
 * Response code to send for `err`.
 *
 * Falls back to the configured `fallbackResponseCode` (500 unless changed) when no error in
 * the chain set one.
 */
export function httpResponseCodeFromError(err: unknown): number {
  const responseCode = toHttpError(err).responseCode()

  return responseCode === UNINITIALIZED_RESPONSE_CODE
    ? getErrorsSettings().fallbackResponseCode
    : responseCode
}

/**
 * Check if retrying could address `err`. Values that are not HttpErrors, and the absence of
 * an error, count as retriable.
 */
export function isRetriableError(err: unknown): boolean {
  if (err == null) return true

  return toHttpError(err).retriable()
}

export function isUnretriableError(err: unknown): boolean {
  return !isRetriableError(err)
}
