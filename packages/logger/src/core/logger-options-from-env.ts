import { z } from "zod"
import { logLevelNames } from "../ports/log-level"
import type { LoggerOptions } from "../ports/logger-options"

const envSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).optional(),
  LOG_PRETTY: z.enum(["true", "false"]).optional(),
})

/**
 * Read logger options from `LOG_LEVEL` and `LOG_PRETTY`.
 *
 * @example
 * ```ts
 * const logger = createPinoLogger({}, loggerOptionsFromEnv())
 * ```
 */
export function loggerOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<LoggerOptions> {
  const result = envSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    LOG_PRETTY: env.LOG_PRETTY || undefined,
  })

  if (!result.success) {
    throw new Error(`Invalid logger options:\n${z.prettifyError(result.error)}`)
  }

  const { LOG_LEVEL: level, LOG_PRETTY: pretty } = result.data

  return {
    ...(level && { level }),
    ...(pretty && { prettify: pretty === "true" }),
  }
}
