import { z } from "zod"

const settingsSchema = z.object({
  /** Upper bound on the frames kept by a stack capture; deeper stacks are truncated */
  maxStackFrames: z.number().int().min(1).max(1024),

  /** Status reported by `httpResponseCodeFromError` when no error in the chain set one */
  fallbackResponseCode: z.number().int().min(100).max(599),
})

export type ErrorsSettings = Readonly<z.infer<typeof settingsSchema>>

export const DEFAULT_ERRORS_SETTINGS: ErrorsSettings = Object.freeze({
  maxStackFrames: 64,
  fallbackResponseCode: 500,
})

export const ERRORS_ENV_PREFIX = "FAULTLINE_"

const envSchema = z.object({
  MAX_STACK_FRAMES: z.coerce.number().optional(),
  FALLBACK_RESPONSE_CODE: z.coerce.number().optional(),
})

let current: ErrorsSettings = DEFAULT_ERRORS_SETTINGS

export function getErrorsSettings(): ErrorsSettings {
  return current
}

/**
 * Merge `overrides` over the current settings.
 *
 * @throws Error when the merged settings are invalid; the current settings are kept
 */
export function configureErrors(overrides: Partial<ErrorsSettings>): ErrorsSettings {
  const result = settingsSchema.safeParse({ ...current, ...stripUndefined(overrides) })

  if (!result.success) {
    throw new Error(`Invalid errors settings:\n${z.prettifyError(result.error)}`)
  }

  current = Object.freeze(result.data)
  return current
}

export function resetErrorsSettings(): void {
  current = DEFAULT_ERRORS_SETTINGS
}

/**
 * Read settings overrides from `FAULTLINE_`-prefixed environment variables.
 *
 * Only variables that are present and non-empty are returned.
 *
 * @example
 * ```ts
 * configureErrors(errorsSettingsFromEnv())
 * ```
 */
export function errorsSettingsFromEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<ErrorsSettings> {
  const filtered: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ERRORS_ENV_PREFIX) && value !== undefined && value !== "") {
      filtered[key.slice(ERRORS_ENV_PREFIX.length)] = value
    }
  }

  const result = envSchema.safeParse(filtered)

  if (!result.success) {
    throw new Error(`Invalid errors settings:\n${z.prettifyError(result.error)}`)
  }

  return stripUndefined({
    maxStackFrames: result.data.MAX_STACK_FRAMES,
    fallbackResponseCode: result.data.FALLBACK_RESPONSE_CODE,
  })
}

function stripUndefined(settings: Partial<ErrorsSettings>): Partial<ErrorsSettings> {
  return {
    ...(settings.maxStackFrames !== undefined && { maxStackFrames: settings.maxStackFrames }),
    ...(settings.fallbackResponseCode !== undefined && {
      fallbackResponseCode: settings.fallbackResponseCode,
    }),
  }
}
