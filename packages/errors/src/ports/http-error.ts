/** Response code of a link that never set one */
export const UNINITIALIZED_RESPONSE_CODE = -1

/** Error code of a link that never set one */
export const UNINITIALIZED_ERROR_CODE = ""

/** Returned when no link in a chain carries a message */
export const UNKNOWN_ERROR_MESSAGE = "Unknown error"

/** Stack trace of an error adapted from a foreign value by `toHttpError` */
export const UNINITIALIZED_STACK_TRACE = "Stack trace unavailable"

/**
 * An error carrying an HTTP response code, an error code, a retriability verdict and a
 * captured stack trace, possibly wrapping other errors.
 *
 * Every accessor resolves its value by walking the wrapped chain from this error inward.
 */
export interface HttpError extends Error {
  /** Every non-empty message in the chain, outermost first, ending with a foreign cause's text */
  messages(): string[]

  /** `messages()` joined with newlines */
  fullMessage(): string

  /** The outermost message */
  outerMessage(): string

  /** The innermost message */
  innerMessage(): string

  /** Sets the response code of this error only */
  setResponseCode(responseCode: number): this

  /**
   * The outermost response code.
   *
   * @returns {@link UNINITIALIZED_RESPONSE_CODE} when no error in the chain set one
   */
  responseCode(): number

  /** Sets the error code of this error only */
  setErrorCode(errorCode: string): this

  /**
   * The outermost error code.
   *
   * @returns {@link UNINITIALIZED_ERROR_CODE} when no error in the chain set one
   */
  errorCode(): string

  /** The innermost available stack trace */
  stackTrace(): string

  /**
   * Sets whether this error is retriable.
   *
   * @remarks
   * Only read at the root of a chain.
   */
  setRetriable(retriable: boolean): this

  /**
   * `true` if retrying the request could succeed.
   * Errors are retriable unless the root of the chain says otherwise.
   */
  retriable(): boolean
}

/**
 * Serialized chain for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedHttpError = Readonly<{
  name: string
  message: string
  innerMessage: string
  messages: string[]
  responseCode: number
  errorCode: string
  retriable: boolean
  stack?: string
}>
