import { AffinityStore } from './affinity-store.js'
import { DECAY_HALF_LIFE_DAYS, GC_SCORE_THRESHOLD } from './constants.js'
import { logGarbageCollection } from './logger.js'
import type { GarbageCollectionResult } from './types.js'

export interface GarbageCollectionOptions {
  threshold?: number
  halfLifeDays?: number
  tenantId?: string
  now?: Date
}

/**
 * Delete every record whose interest score, decayed to now, is strictly below
 * the threshold. Never throws: a failed pass is logged and reported, and the
 * next scheduled pass retries.
 */
export async function collectGarbage(
  store: AffinityStore,
  options: GarbageCollectionOptions = {}
): Promise<GarbageCollectionResult> {
  const threshold = options.threshold ?? GC_SCORE_THRESHOLD
  let result: GarbageCollectionResult
  try {
    const deleted = await store.deleteBelow(threshold, {
      halfLifeDays: options.halfLifeDays ?? DECAY_HALF_LIFE_DAYS,
      tenantId: options.tenantId,
      now: options.now,
    })
    result = { ok: true, deleted, threshold }
  } catch (err) {
    const cause = err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : ''
    result = {
      ok: false,
      deleted: 0,
      threshold,
      error: `${err instanceof Error ? err.message : String(err)}${cause}`,
    }
  }
  logGarbageCollection(result)
  return result
}
