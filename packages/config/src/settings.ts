/**
 * Runtime settings for the spatial index, resolved from environment variables.
 *
 * Values are read once through `optional()` and validated with zod. An invalid
 * value throws at load time with the variable name in the message.
 */

import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** Raw environment record, e.g. `process.env`. */
export type EnvSource = Record<string, string | undefined>

const positiveInt = (key: string) =>
  z.coerce
    .number({ invalid_type_error: `${key} must be a number` })
    .int(`${key} must be an integer`)
    .min(1, `${key} must be at least 1`)

export const settingsSchema = z.object({
  maxLeafSize: positiveInt('POINTDEX_MAX_LEAF_SIZE'),
  parallelGrain: positiveInt('POINTDEX_PARALLEL_GRAIN'),
  axisScanCount: positiveInt('POINTDEX_AXIS_SCAN_COUNT'),
  logLevel: z.enum(LOG_LEVELS, {
    errorMap: () => ({ message: `POINTDEX_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` }),
  }),
})

export type Settings = z.infer<typeof settingsSchema>

/** Defaults applied when a variable is unset or empty. */
export const DEFAULT_SETTINGS: Settings = {
  maxLeafSize: 20,
  parallelGrain: 1024,
  axisScanCount: 128,
  logLevel: 'warn',
}

function optional(env: EnvSource, key: string, fallback: string): string {
  const val = env[key]
  return val === undefined || val.trim() === '' ? fallback : val.trim()
}

/**
 * Resolve settings from an environment record.
 * @throws Error naming the offending variable when a value does not validate.
 */
export function loadSettings(env: EnvSource): Settings {
  const result = settingsSchema.safeParse({
    maxLeafSize: optional(env, 'POINTDEX_MAX_LEAF_SIZE', String(DEFAULT_SETTINGS.maxLeafSize)),
    parallelGrain: optional(env, 'POINTDEX_PARALLEL_GRAIN', String(DEFAULT_SETTINGS.parallelGrain)),
    axisScanCount: optional(env, 'POINTDEX_AXIS_SCAN_COUNT', String(DEFAULT_SETTINGS.axisScanCount)),
    logLevel: optional(env, 'POINTDEX_LOG_LEVEL', DEFAULT_SETTINGS.logLevel).toLowerCase(),
  })

  if (!result.success) {
    const issue = result.error.issues[0]
    throw new Error(
      `Invalid pointdex configuration: ${issue?.message ?? result.error.message}. ` +
      `Check the POINTDEX_* environment variables.`,
    )
  }

  return result.data
}

/** Settings resolved from `process.env` when this module is first imported. */
export const settings: Settings = Object.freeze(loadSettings(process.env))
