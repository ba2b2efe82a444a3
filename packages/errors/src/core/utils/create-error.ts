import { format } from "node:util"
import { ChainedHttpError } from "../chained-http-error"
import type { StackBoundary } from "../stack"

/**
 * Create a root error, capturing the caller's stack.
 *
 * @example
 * ```ts
 * throw newError("user not found").setResponseCode(HttpStatus.NotFound)
 * ```
 */
export function newError(message: string): ChainedHttpError {
  return new ChainedHttpError({ message, trace: newError })
}

/**
 * Create a root error with a printf-style message.
 *
 * @example
 * ```ts
 * newErrorf("user %s not found", userId)
 * ```
 */
export function newErrorf(fmt: string, ...args: unknown[]): ChainedHttpError {
  return new ChainedHttpError({ message: format(fmt, ...args), trace: newErrorf })
}

/**
 * Wrap an error with a message.
 *
 * A stack is captured only when `err` is a foreign error; a wrapped chain keeps its own trace.
 *
 * @returns `null` when there is no error to wrap
 *
 * @example
 * ```ts
 * const err = wrap(await save().catch((e: unknown) => e), "saving profile")
 * ```
 */
export function wrap(err: null | undefined, message: string): null
export function wrap(err: NonNullable<unknown>, message: string): ChainedHttpError
export function wrap(err: unknown, message: string): ChainedHttpError | null
export function wrap(err: unknown, message: string): ChainedHttpError | null {
  if (err == null) return null

  return new ChainedHttpError({ message, cause: err, trace: traceFor(err, wrap) })
}

/**
 * Wrap an error with a printf-style message.
 *
 * @returns `null` when there is no error to wrap
 */
export function wrapf(err: null | undefined, fmt: string, ...args: unknown[]): null
export function wrapf(
  err: NonNullable<unknown>,
  fmt: string,
  ...args: unknown[]
): ChainedHttpError
export function wrapf(err: unknown, fmt: string, ...args: unknown[]): ChainedHttpError | null
export function wrapf(err: unknown, fmt: string, ...args: unknown[]): ChainedHttpError | null {
  if (err == null) return null

  return new ChainedHttpError({
    message: format(fmt, ...args),
    cause: err,
    trace: traceFor(err, wrapf),
  })
}

export type CreateHttpErrorOptions = Readonly<{
  errorCode?: string
  retriable?: boolean
  /** Error to wrap; when it is a chain, the chain keeps its own stack trace */
  cause?: unknown
}>

/**
 * Factory function to create an error with its response code in one call.
 *
 * @example
 * ```ts
 * throw createHttpError(HttpStatus.Conflict, "email already taken", {
 *   errorCode: "email_taken",
 *   retriable: false,
 * })
 * ```
 */
export function createHttpError(
  responseCode: number,
  message: string,
  options?: CreateHttpErrorOptions,
): ChainedHttpError {
  const cause = options?.cause

  return new ChainedHttpError({
    message,
    cause,
    trace: traceFor(cause, createHttpError),
    responseCode,
    ...(options?.errorCode !== undefined && { errorCode: options.errorCode }),
    ...(options?.retriable !== undefined && { retriable: options.retriable }),
  })
}

function traceFor(cause: unknown, boundary: StackBoundary): StackBoundary | string {
  return cause instanceof ChainedHttpError ? "" : boundary
}
