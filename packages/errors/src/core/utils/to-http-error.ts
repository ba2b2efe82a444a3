import { type HttpError, UNINITIALIZED_STACK_TRACE } from "../../ports/http-error"
import { ChainedHttpError } from "../chained-http-error"
import { isHttpError } from "./is-http-error"

/**
 * Convert any thrown value to an HttpError.
 *
 * - HttpErrors pass through unchanged
 * - Anything else becomes the cause of a new link with no message, no codes and
 *   {@link UNINITIALIZED_STACK_TRACE}, since this call site is not where the error happened
 */
export function toHttpError(err: unknown): HttpError {
  if (isHttpError(err)) {
    return err
  }

  return new ChainedHttpError({ message: "", cause: err, trace: UNINITIALIZED_STACK_TRACE })
}
