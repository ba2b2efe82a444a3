import { getErrorsSettings } from "./settings"

/** The library function whose frame, and every frame inside it, is left out of a capture */
export type StackBoundary = (...args: never[]) => unknown

/**
 * Capture the current call stack onto `target.stack`, omitting `boundary` and everything it
 * called, and return it.
 *
 * The header line is `target`'s own `name: message`. At most `maxStackFrames` frames are recorded.
 */
export function captureStack(target: { stack?: string }, boundary: StackBoundary): string {
  const previousLimit = Error.stackTraceLimit

  Error.stackTraceLimit = getErrorsSettings().maxStackFrames
  try {
    Error.captureStackTrace(target, boundary)
  } finally {
    Error.stackTraceLimit = previousLimit
  }

  return target.stack ?? ""
}
