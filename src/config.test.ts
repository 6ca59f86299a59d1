import { describe, it, expect } from 'vitest'
import { parseConfig } from './config.js'

describe('parseConfig', () => {
  it('applies defaults and reuses DATABASE_URL for the event store', () => {
    const config = parseConfig({ DATABASE_URL: 'postgres://localhost/affinity' })

    expect(config).toEqual({
      databaseUrl: 'postgres://localhost/affinity',
      eventDatabaseUrl: 'postgres://localhost/affinity',
      databaseCaCert: undefined,
      nodeEnv: 'development',
      port: 3000,
      targetTenant: 'master',
      targetCohort: 'Active in last 3 months',
      halfLifeDays: 7,
      gcThreshold: 0.05,
      schedulerEnabled: true,
    })
  })

  it('reads overrides from the environment', () => {
    const config = parseConfig({
      DATABASE_URL: 'postgres://localhost/affinity',
      EVENT_DATABASE_URL: 'postgres://localhost/events',
      PORT: '8080',
      AFFINITY_HALF_LIFE_DAYS: '14',
      AFFINITY_SCHEDULER_ENABLED: 'false',
    })

    expect(config.eventDatabaseUrl).toBe('postgres://localhost/events')
    expect(config.port).toBe(8080)
    expect(config.halfLifeDays).toBe(14)
    expect(config.schedulerEnabled).toBe(false)
  })

  it('rejects a missing database URL and an out-of-range threshold', () => {
    expect(() => parseConfig({})).toThrow(/^Invalid configuration: DATABASE_URL/)
    expect(() => parseConfig({ DATABASE_URL: 'postgres://x', AFFINITY_GC_THRESHOLD: '2' }))
      .toThrow('Invalid configuration: AFFINITY_GC_THRESHOLD')
  })
})
