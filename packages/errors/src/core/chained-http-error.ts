import {
  type HttpError,
  type SerializedHttpError,
  UNINITIALIZED_ERROR_CODE,
  UNINITIALIZED_RESPONSE_CODE,
  UNKNOWN_ERROR_MESSAGE,
} from "../ports/http-error"
import { type ChainNode, foreignText, innermostNode, walkChain } from "./chain"
import { serializeHttpError } from "./serialize"
import { captureStack, type StackBoundary } from "./stack"

export type ChainedHttpErrorInit = Readonly<{
  message: string
  /** The wrapped error; `null` or `undefined` makes this link a root */
  cause?: unknown
  /**
   * Factory to capture the caller's stack from, making this link the owner of the chain's trace,
   * or a fixed trace. `""` leaves the trace to the wrapped chain.
   */
  trace: StackBoundary | string
  responseCode?: number
  errorCode?: string
  retriable?: boolean
}>

/**
 * One link of an error chain.
 *
 * Links are built by `newError`, `wrap` and friends rather than by calling the constructor.
 * Accessors resolve lazily from this link inward, so a setter called on an inner link
 * after wrapping is still seen through every link that wraps it.
 */
export class ChainedHttpError extends Error implements HttpError {
  readonly inner: ChainNode | null
  readonly capturedStack: string

  private ownResponseCode: number
  private ownErrorCode: string
  private ownRetriable: boolean

  constructor(init: ChainedHttpErrorInit) {
    // No implicit capture; an owning link captures its trace below, once
    const stackTraceLimit = Error.stackTraceLimit
    Error.stackTraceLimit = 0
    super(init.message, init.cause == null ? undefined : { cause: init.cause })
    Error.stackTraceLimit = stackTraceLimit

    this.name = this.constructor.name
    this.inner = toChainNode(init.cause)
    this.capturedStack =
      typeof init.trace === "string" ? init.trace : captureStack(this, init.trace)
    this.ownResponseCode = init.responseCode ?? UNINITIALIZED_RESPONSE_CODE
    this.ownErrorCode = init.errorCode ?? UNINITIALIZED_ERROR_CODE
    this.ownRetriable = init.retriable ?? true
  }

  messages(): string[] {
    const out: string[] = []

    for (const node of walkChain(this)) {
      switch (node.kind) {
        case "link":
          if (node.link.message !== "") out.push(node.link.message)
          break
        case "foreign":
          out.push(foreignText(node.error))
          break
      }
    }

    return out.length > 0 ? out : [UNKNOWN_ERROR_MESSAGE]
  }

  fullMessage(): string {
    return this.messages().join("\n")
  }

  outerMessage(): string {
    for (const node of walkChain(this)) {
      switch (node.kind) {
        case "link":
          if (node.link.message !== "") return node.link.message
          break
        case "foreign":
          return foreignText(node.error)
      }
    }

    return UNKNOWN_ERROR_MESSAGE
  }

  innerMessage(): string {
    const node = innermostNode(this)

    switch (node.kind) {
      case "link":
        return node.link.message !== "" ? node.link.message : UNKNOWN_ERROR_MESSAGE
      case "foreign":
        return foreignText(node.error)
    }
  }

  setResponseCode(responseCode: number): this {
    this.ownResponseCode = responseCode
    return this
  }

  responseCode(): number {
    for (const node of walkChain(this)) {
      if (node.kind === "foreign") break
      if (node.link.ownResponseCode !== UNINITIALIZED_RESPONSE_CODE) {
        return node.link.ownResponseCode
      }
    }

    return UNINITIALIZED_RESPONSE_CODE
  }

  setErrorCode(errorCode: string): this {
    this.ownErrorCode = errorCode
    return this
  }

  errorCode(): string {
    for (const node of walkChain(this)) {
      if (node.kind === "foreign") break
      if (node.link.ownErrorCode !== UNINITIALIZED_ERROR_CODE) {
        return node.link.ownErrorCode
      }
    }

    return UNINITIALIZED_ERROR_CODE
  }

  /**
   * Stack trace of the innermost link.
   *
   * @remarks
   * Only a root link, or a link wrapping a foreign error, captures a stack, so the innermost
   * link always holds the trace for the whole chain.
   */
  stackTrace(): string {
    let owner: ChainedHttpError = this

    for (const node of walkChain(this)) {
      if (node.kind === "link") owner = node.link
    }

    return owner.capturedStack
  }

  setRetriable(retriable: boolean): this {
    this.ownRetriable = retriable
    return this
  }

  retriable(): boolean {
    const node = innermostNode(this)

    switch (node.kind) {
      case "link":
        return node.link.ownRetriable
      case "foreign":
        return true
    }
  }

  toString(): string {
    return this.fullMessage()
  }

  toJSON(): SerializedHttpError {
    return serializeHttpError(this)
  }
}

function toChainNode(cause: unknown): ChainNode | null {
  if (cause == null) return null

  return cause instanceof ChainedHttpError
    ? { kind: "link", link: cause }
    : { kind: "foreign", error: cause }
}
