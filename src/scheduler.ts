/**
 * Scheduler - hourly affinity scoring and garbage collection
 *
 * The engine takes an explicit window; the scheduler owns the checkpoint.
 * Each run scores [checkpoint, current hour boundary) and advances the
 * checkpoint only after the batch commits, so a failed hour is picked up
 * again by the next tick.
 */

import cron from 'node-cron'
import type { ScheduledTask } from 'node-cron'
import type { AggregationWindow } from './affinity/types.js'
import type { AffinityOrchestrator } from './orchestrator/orchestrator.js'
import type { DatabaseClient } from './store/database.js'
import type { CheckpointRow } from './types/database.js'
import { safeError } from './utils/safe-log.js'

const HOUR_MS = 60 * 60 * 1000

export type ScheduledJobs = Pick<AffinityOrchestrator, 'runBatchUpdate' | 'collectGarbage'>

export interface SchedulerDeps {
  orchestrator: ScheduledJobs
  checkpoints: CheckpointStore
  tenantName: string
  cohortName: string
  gcThreshold: number
}

// ─── Checkpoints ────────────────────────────────────────────────────────────

export class CheckpointStore {
  constructor(private readonly db: DatabaseClient) {}

  async load(tenantName: string, cohortName: string): Promise<Date | null> {
    const { rows } = await this.db.query<CheckpointRow>(
      `SELECT window_end FROM affinity_batch_checkpoints
       WHERE tenant_name = $1 AND cohort_name = $2`,
      [tenantName, cohortName]
    )
    if (rows.length === 0) return null
    const value = rows[0].window_end
    return value instanceof Date ? value : new Date(value)
  }

  async save(tenantName: string, cohortName: string, windowEnd: Date): Promise<void> {
    await this.db.query(
      `INSERT INTO affinity_batch_checkpoints (tenant_name, cohort_name, window_end, updated_at)
       VALUES ($1, $2, $3, now())
       ON CONFLICT (tenant_name, cohort_name) DO UPDATE SET
         window_end = EXCLUDED.window_end,
         updated_at = now()`,
      [tenantName, cohortName, windowEnd]
    )
  }
}

// ─── Windows ────────────────────────────────────────────────────────────────

export function floorToHour(date: Date): Date {
  return new Date(Math.floor(date.getTime() / HOUR_MS) * HOUR_MS)
}

/**
 * Window for the next run: from the checkpoint (or one hour back on the
 * first run) up to the last whole hour. Null when there is nothing new.
 */
export function nextWindow(checkpoint: Date | null, now: Date): AggregationWindow | null {
  const windowEnd = floorToHour(now)
  const windowStart = checkpoint ?? new Date(windowEnd.getTime() - HOUR_MS)
  if (windowStart.getTime() >= windowEnd.getTime()) return null
  return { windowStart, windowEnd }
}

// ─── Jobs ───────────────────────────────────────────────────────────────────

let batchRunning = false

export async function runScheduledBatch(deps: SchedulerDeps, now = new Date()): Promise<number | null> {
  if (batchRunning) {
    console.log('[SCHEDULER] Previous affinity batch still running, skipping tick')
    return null
  }

  batchRunning = true
  try {
    const checkpoint = await deps.checkpoints.load(deps.tenantName, deps.cohortName)
    const window = nextWindow(checkpoint, now)
    if (!window) return 0

    const touched = await deps.orchestrator.runBatchUpdate(
      deps.tenantName,
      deps.cohortName,
      window.windowStart,
      window.windowEnd
    )
    await deps.checkpoints.save(deps.tenantName, deps.cohortName, window.windowEnd)
    return touched
  } catch (error) {
    console.error('[SCHEDULER] Affinity batch failed:', safeError(error))
    return null
  } finally {
    batchRunning = false
  }
}

export async function runScheduledGc(deps: SchedulerDeps): Promise<void> {
  // collectGarbage logs and reports its own failures.
  await deps.orchestrator.collectGarbage(deps.gcThreshold)
}

// ─── Init ───────────────────────────────────────────────────────────────────

export function initScheduler(deps: SchedulerDeps): ScheduledTask[] {
  const tasks = [
    // Score the previous hour a few minutes past the boundary, once late events land
    cron.schedule('5 * * * *', async () => {
      await runScheduledBatch(deps)
    }),

    // Garbage collection on the half hour, independent of the batch
    cron.schedule('30 * * * *', async () => {
      await runScheduledGc(deps)
    }),
  ]

  console.log(`[SCHEDULER] Affinity jobs initialized for tenant="${deps.tenantName}" cohort="${deps.cohortName}"`)
  return tasks
}
