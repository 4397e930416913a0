import { z } from "zod"
import { logLevelNames } from "../ports/log-level"
import type { LoggerOptions } from "../ports/logger-options"

export const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type LoggerEnv = z.infer<typeof loggerEnvSchema>

/**
 * Read logger policy from environment variables.
 *
 * @example
 * ```ts
 * const logger = new PinoLogger({}, loadLoggerOptions(process.env), { service: "vm" })
 * ```
 */
export function loadLoggerOptions(
  env: Readonly<Record<string, string | undefined>>,
): Required<LoggerOptions> {
  const result = loggerEnvSchema.safeParse(env)

  if (!result.success) {
    throw new Error(`Logger configuration invalid:\n${z.prettifyError(result.error)}`)
  }

  return {
    level: result.data.LOG_LEVEL,
    prettify: result.data.LOG_PRETTY,
  }
}
