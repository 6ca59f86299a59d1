#!/usr/bin/env node
/**
 * Affinity CLI
 *
 *   affinity migrate
 *   affinity batch --tenant master --cohort "Active in last 3 months" \
 *                  --start 2026-10-18T09:00:00Z --end 2026-10-18T10:00:00Z
 *   affinity gc [--threshold 0.05]
 *   affinity decide <profileId> [--tenant master]
 *   affinity refresh [--tenant master] [--min-score 0.1]
 *
 * Dev: npx tsx src/cli.ts <command>
 */

import 'dotenv/config'
import { pathToFileURL } from 'node:url'
import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from './config.js'
import type { AppConfig } from './config.js'
import { isAppError } from './errors.js'
import { IdentityResolver } from './identity.js'
import { createOrchestrator } from './orchestrator/index.js'
import { closeDatabase, getEventPool, getPool, initDatabase } from './store/database.js'
import { runMigrations } from './store/migrations.js'
import { IsoDateSchema } from './types/schemas.js'

function parseDate(value: string): Date {
  const parsed = IsoDateSchema.safeParse(value)
  if (!parsed.success) throw new InvalidArgumentError(`Not a valid date: ${value}`)
  return parsed.data
}

function parseScore(value: string): number {
  const n = Number(value)
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new InvalidArgumentError('Expected a number within [0, 1]')
  return n
}

async function withDatabase<T>(work: (config: AppConfig) => Promise<T>): Promise<T> {
  const config = loadConfig()
  initDatabase(config.databaseUrl, config.eventDatabaseUrl, {
    caCert: config.databaseCaCert,
    production: config.nodeEnv === 'production',
  })
  try {
    return await work(config)
  } finally {
    await closeDatabase()
  }
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2))
}

export function createCLI(): Command {
  const program = new Command()

  program
    .name('affinity')
    .description('Behavioral affinity scoring and next-best-action decisions')

  program
    .command('migrate')
    .description('Create affinity and event store tables if missing')
    .action(async () => {
      await withDatabase(async () => {
        await runMigrations(getPool(), getEventPool())
        console.log('✅ Migrations applied')
      })
    })

  program
    .command('batch')
    .description('Score one event window for a cohort and persist decisions')
    .option('--tenant <name>', 'Tenant display name')
    .option('--cohort <name>', 'Cohort display name')
    .requiredOption('--start <iso>', 'Window start (inclusive)', parseDate)
    .requiredOption('--end <iso>', 'Window end (exclusive)', parseDate)
    .action(async (opts: { tenant?: string; cohort?: string; start: Date; end: Date }) => {
      await withDatabase(async config => {
        const touched = await createOrchestrator(config).runBatchUpdate(
          opts.tenant ?? config.targetTenant,
          opts.cohort ?? config.targetCohort,
          opts.start,
          opts.end
        )
        print({ touched })
      })
    })

  program
    .command('gc')
    .description('Delete affinity records whose interest decayed below the threshold')
    .option('--threshold <score>', 'Retention threshold', parseScore)
    .action(async (opts: { threshold?: number }) => {
      await withDatabase(async config => {
        const result = await createOrchestrator(config).collectGarbage(opts.threshold ?? config.gcThreshold)
        print(result)
        if (!result.ok) process.exitCode = 1
      })
    })

  program
    .command('decide')
    .description('Compute next best and next likely actions for one profile (read-only)')
    .argument('<profileId>', 'Profile id')
    .option('--tenant <name>', 'Tenant display name')
    .action(async (profileId: string, opts: { tenant?: string }) => {
      await withDatabase(async config => {
        const tenantId = await new IdentityResolver(getPool()).resolveTenant(opts.tenant ?? config.targetTenant)
        const orchestrator = createOrchestrator(config)
        print({
          profileId,
          nextBestActions: await orchestrator.getDecisions(tenantId, profileId),
          nextLikelyActions: await orchestrator.getPredictions(tenantId, profileId),
        })
      })
    })

  program
    .command('refresh')
    .description('Re-evaluate stored decision columns for a tenant')
    .option('--tenant <name>', 'Tenant display name')
    .option('--min-score <score>', 'Only records at or above this interest', parseScore)
    .action(async (opts: { tenant?: string; minScore?: number }) => {
      await withDatabase(async config => {
        const updated = await createOrchestrator(config).refreshDecisions(opts.tenant ?? config.targetTenant, opts.minScore)
        print({ updated })
      })
    })

  return program
}

export async function main(argv = process.argv): Promise<void> {
  try {
    await createCLI().parseAsync(argv)
  } catch (error) {
    const message = isAppError(error) ? `${error.code}: ${error.message}` : error instanceof Error ? error.message : String(error)
    console.error(`\n❌ ${message}\n`)
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack)
    }
    process.exitCode = 1
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await main()
}
