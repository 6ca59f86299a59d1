/**
 * Affinity Engine - Main Server
 * Recommendation API plus the hourly scoring and garbage collection jobs
 */

import 'dotenv/config'
import { loadConfig } from './config.js'
import { IdentityResolver } from './identity.js'
import { createOrchestrator } from './orchestrator/index.js'
import { CheckpointStore, initScheduler } from './scheduler.js'
import { buildServer } from './server.js'
import { closeDatabase, getEventPool, getPool, initDatabase } from './store/database.js'
import { runMigrations } from './store/migrations.js'

const config = loadConfig()

initDatabase(config.databaseUrl, config.eventDatabaseUrl, {
  caCert: config.databaseCaCert,
  production: config.nodeEnv === 'production',
})
await runMigrations(getPool(), getEventPool())

const orchestrator = createOrchestrator(config)
const server = await buildServer({
  orchestrator,
  resolver: new IdentityResolver(getPool()),
  defaultTenant: config.targetTenant,
})

const tasks = config.schedulerEnabled
  ? initScheduler({
    orchestrator,
    checkpoints: new CheckpointStore(getPool()),
    tenantName: config.targetTenant,
    cohortName: config.targetCohort,
    gcThreshold: config.gcThreshold,
  })
  : []

async function shutdown(signal: string): Promise<void> {
  server.log.info(`${signal} received, shutting down`)
  for (const task of tasks) task.stop()
  await server.close()
  await closeDatabase()
  process.exit(0)
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(err => {
      server.log.error(err, 'Shutdown failed')
      process.exit(1)
    })
  })
}

try {
  await server.listen({ port: config.port, host: '0.0.0.0' })
  server.log.info(`Affinity engine ready on port ${config.port} | scheduler ${config.schedulerEnabled ? 'on' : 'off'}`)
} catch (err) {
  server.log.error(err)
  process.exit(1)
}
