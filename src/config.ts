/**
 * Runtime configuration, parsed once from process.env.
 * Entry points load `.env` via `dotenv/config` before importing this module.
 */

import { z } from 'zod'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => value === undefined ? true : value === 'true' || value === '1')

export const ConfigSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  EVENT_DATABASE_URL: z.string().optional().transform(value => value || undefined),
  DATABASE_CA_CERT: z.string().optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  TARGET_TENANT: z.string().min(1).default('master'),
  TARGET_COHORT: z.string().min(1).default('Active in last 3 months'),
  AFFINITY_HALF_LIFE_DAYS: z.coerce.number().positive().default(7),
  AFFINITY_GC_THRESHOLD: z.coerce.number().min(0).max(1).default(0.05),
  AFFINITY_SCHEDULER_ENABLED: booleanFlag,
})

export type RawConfig = z.infer<typeof ConfigSchema>

export interface AppConfig {
  databaseUrl: string
  eventDatabaseUrl: string
  databaseCaCert?: string
  nodeEnv: RawConfig['NODE_ENV']
  port: number
  targetTenant: string
  targetCohort: string
  halfLifeDays: number
  gcThreshold: number
  schedulerEnabled: boolean
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = ConfigSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }

  const raw = parsed.data
  return {
    databaseUrl: raw.DATABASE_URL,
    eventDatabaseUrl: raw.EVENT_DATABASE_URL ?? raw.DATABASE_URL,
    databaseCaCert: raw.DATABASE_CA_CERT,
    nodeEnv: raw.NODE_ENV,
    port: raw.PORT,
    targetTenant: raw.TARGET_TENANT,
    targetCohort: raw.TARGET_COHORT,
    halfLifeDays: raw.AFFINITY_HALF_LIFE_DAYS,
    gcThreshold: raw.AFFINITY_GC_THRESHOLD,
    schedulerEnabled: raw.AFFINITY_SCHEDULER_ENABLED,
  }
}

let cached: AppConfig | null = null

export function loadConfig(): AppConfig {
  if (!cached) cached = parseConfig(process.env)
  return cached
}
