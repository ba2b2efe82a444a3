import { UNKNOWN_ERROR_MESSAGE } from "../ports/http-error"
import type { ChainedHttpError } from "./chained-http-error"

/**
 * One element of a chain: either one of our links or an opaque foreign cause.
 */
export type ChainNode =
  | Readonly<{ kind: "link"; link: ChainedHttpError }>
  | Readonly<{ kind: "foreign"; error: unknown }>

/**
 * Walk the chain from `start` toward its root, yielding `start` first.
 *
 * Ends at a link without a cause or at a foreign cause. A link's cause is fixed when the link
 * is built and must exist before it, so the walk always terminates.
 *
 * @example
 * ```ts
 * for (const node of walkChain(err)) {
 *   if (node.kind === "foreign") console.log(foreignText(node.error))
 * }
 * ```
 */
export function* walkChain(start: ChainedHttpError): Generator<ChainNode, void, undefined> {
  let node: ChainNode | null = { kind: "link", link: start }

  while (node !== null) {
    yield node
    node = node.kind === "link" ? node.link.inner : null
  }
}

export function innermostNode(start: ChainedHttpError): ChainNode {
  let node: ChainNode = { kind: "link", link: start }

  while (node.kind === "link" && node.link.inner !== null) {
    node = node.link.inner
  }

  return node
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/** Text of a foreign cause */
export function foreignText(error: unknown): string {
  if (typeof error === "string") return error
  if (isRecord(error) && typeof error.message === "string") return error.message

  try {
    return String(error)
  } catch {
    return UNKNOWN_ERROR_MESSAGE
  }
}
