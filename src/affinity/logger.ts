/**
 * Affinity Logger
 * Structured log lines for batch runs, decisions and garbage collection.
 */

import { safeError } from '../utils/safe-log.js'
import type { AggregationWindow, GarbageCollectionResult } from './types.js'

export interface BatchRunSummary {
  aggregated: number
  touched: number
  skipped: number
  durationMs: number
}

export function logBatchStarted(tenantName: string, cohortName: string, window: AggregationWindow): void {
  console.log('[affinity] batch_started', {
    tenantName,
    cohortName,
    windowStart: window.windowStart.toISOString(),
    windowEnd: window.windowEnd.toISOString(),
  })
}

export function logAggregated(tenantId: string, cohortId: string, pairs: number): void {
  console.log(`[affinity] Event store returned ${pairs} profile-subject pairs`, {
    tenantId,
    cohortId,
  })
}

export function logWindowAlreadyApplied(tenantName: string, cohortName: string, window: AggregationWindow): void {
  console.log('[affinity] window_already_applied', {
    tenantName,
    cohortName,
    windowStart: window.windowStart.toISOString(),
    windowEnd: window.windowEnd.toISOString(),
  })
}

export function logBatchCompleted(tenantName: string, summary: BatchRunSummary): void {
  console.log('[affinity] batch_completed', { tenantName, ...summary })
}

export function logBatchFailed(tenantName: string, error: unknown): void {
  console.error(`[affinity] Batch failed for tenant="${tenantName}", rolled back:`, safeError(error))
}

export function logDecisionsRefreshed(tenantName: string, updated: number): void {
  console.log('[affinity] decisions_refreshed', { tenantName, updated })
}

export function logGarbageCollection(result: GarbageCollectionResult): void {
  if (result.ok) {
    console.log(`[affinity] GC removed ${result.deleted} records (interest < ${result.threshold})`)
  } else {
    console.error(`[affinity] GC failed (interest < ${result.threshold}): ${result.error}`)
  }
}
