/**
 * Engine configuration
 *
 * Defaults for namespaces and registries, overridable from the
 * environment:
 * - FLAGWISE_HISTORY_LIMIT   rollback history kept per registry
 * - FLAGWISE_LOG_LEVEL       debug | info | warn | error
 * - FLAGWISE_STRICT_SNAPSHOTS  'false' to skip unknown feature keys on load
 */

import { z } from 'zod'
import { InvalidArgumentError } from '../flags/errors'
import { LOG_LEVELS, type LogLevel } from './logger'

export interface EngineConfig {
  /** Configurations kept for rollback (default: 10) */
  historyLimit: number
  logLevel: LogLevel
  /** Fail snapshot loads that mention unknown features (default: true) */
  strictSnapshots: boolean
}

export const defaultEngineConfig: EngineConfig = {
  historyLimit: 10,
  logLevel: 'info',
  strictSnapshots: true,
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

const envSchema = z.object({
  FLAGWISE_HISTORY_LIMIT: z.coerce.number().int().min(0).optional(),
  FLAGWISE_LOG_LEVEL: logLevelSchema.optional(),
  FLAGWISE_STRICT_SNAPSHOTS: z.enum(['true', 'false']).optional(),
  DEBUG: z.string().optional(),
})

type Env = Record<string, string | undefined>

/**
 * Build engine configuration from defaults, the environment and explicit
 * overrides, in that order of precedence (overrides win).
 */
export function loadEngineConfig(env: Env = process.env, overrides?: Partial<EngineConfig>): EngineConfig {
  const parsed = envSchema.safeParse({
    FLAGWISE_HISTORY_LIMIT: env.FLAGWISE_HISTORY_LIMIT || undefined,
    FLAGWISE_LOG_LEVEL: env.FLAGWISE_LOG_LEVEL || undefined,
    FLAGWISE_STRICT_SNAPSHOTS: env.FLAGWISE_STRICT_SNAPSHOTS || undefined,
    DEBUG: env.DEBUG || undefined,
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue ? issue.path.join('.') : 'environment'
    throw new InvalidArgumentError(`Invalid ${variable}: ${issue?.message ?? 'unknown error'}`, {
      variable,
      expected: variable === 'FLAGWISE_LOG_LEVEL' ? LOG_LEVELS.join(' | ') : undefined,
    })
  }

  const fromEnv: Partial<EngineConfig> = {}
  if (parsed.data.FLAGWISE_HISTORY_LIMIT !== undefined) fromEnv.historyLimit = parsed.data.FLAGWISE_HISTORY_LIMIT
  if (parsed.data.FLAGWISE_LOG_LEVEL !== undefined) fromEnv.logLevel = parsed.data.FLAGWISE_LOG_LEVEL
  else if (parsed.data.DEBUG !== undefined) fromEnv.logLevel = 'debug'
  if (parsed.data.FLAGWISE_STRICT_SNAPSHOTS !== undefined) {
    fromEnv.strictSnapshots = parsed.data.FLAGWISE_STRICT_SNAPSHOTS === 'true'
  }

  return {
    ...defaultEngineConfig,
    ...fromEnv,
    ...overrides,
  }
}

let cached: EngineConfig | undefined

/**
 * Process-wide configuration, read from the environment on first use.
 */
export function getEngineConfig(): EngineConfig {
  cached ??= loadEngineConfig()
  return cached
}

/**
 * Replace the process-wide configuration; `undefined` re-reads the
 * environment on next use.
 */
export function setEngineConfig(config: EngineConfig | undefined): void {
  cached = config
}
