/**
 * Database Migration Runner
 * Calls runMigrations() from store/migrations.ts. Safe to run multiple times,
 * all statements use IF NOT EXISTS.
 *
 * Usage: npx tsx src/migrate.ts
 */
import 'dotenv/config'
import { loadConfig } from './config.js'
import { closeDatabase, getEventPool, getPool, initDatabase } from './store/database.js'
import { runMigrations } from './store/migrations.js'

const config = loadConfig()

console.log('🗄️  Connecting to database...')
initDatabase(config.databaseUrl, config.eventDatabaseUrl, {
    caCert: config.databaseCaCert,
    production: config.nodeEnv === 'production',
})

try {
    await runMigrations(getPool(), getEventPool())
    console.log('✅  All migrations applied successfully')
} catch (err) {
    console.error('❌  Migration failed:', err instanceof Error ? err.message : err)
    process.exitCode = 1
} finally {
    await closeDatabase()
}
