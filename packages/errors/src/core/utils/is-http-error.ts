import type { HttpError } from "../../ports/http-error"
import { ChainedHttpError } from "../chained-http-error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

const HTTP_ERROR_METHODS = [
  "messages",
  "fullMessage",
  "outerMessage",
  "innerMessage",
  "setResponseCode",
  "responseCode",
  "setErrorCode",
  "errorCode",
  "stackTrace",
  "setRetriable",
  "retriable",
] as const

/**
 * Type guard to check if a value is an HttpError.
 *
 * @example
 * ```ts
 * try {
 *   // ...
 * } catch (err) {
 *   if (isHttpError(err)) {
 *     console.log(err.responseCode(), err.errorCode())
 *   }
 * }
 * ```
 */
export function isHttpError(e: unknown): e is HttpError {
  if (e instanceof ChainedHttpError) return true
  if (!isRecord(e)) return false

  return (
    typeof e.message === "string" &&
    typeof e.name === "string" &&
    HTTP_ERROR_METHODS.every((method) => typeof e[method] === "function")
  )
}
