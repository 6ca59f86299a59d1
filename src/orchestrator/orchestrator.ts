/**
 * Affinity Orchestrator
 *
 * Batch path: resolve ids → aggregate the window → per (profile, subject):
 * decay + fold → write scores → predict → prescribe → write decision columns.
 * All writes of one run share a transaction; any failure rolls the run back.
 *
 * Read path: stored scores only, with Predictive/Prescriptive re-run on every
 * call. The persisted decision columns are an audit artifact of the last batch
 * and are never served.
 */

import { AffinityStore } from '../affinity/affinity-store.js'
import { assertWindow } from '../affinity/aggregator.js'
import type { EventAggregator } from '../affinity/aggregator.js'
import { DECAY_HALF_LIFE_DAYS, DEFAULT_SCORING_CONTEXT, GC_SCORE_THRESHOLD } from '../affinity/constants.js'
import { computeNewRaw, normalizeInterest } from '../affinity/decay.js'
import { collectGarbage } from '../affinity/garbage-collector.js'
import {
  logAggregated,
  logBatchCompleted,
  logBatchFailed,
  logBatchStarted,
  logDecisionsRefreshed,
  logWindowAlreadyApplied,
} from '../affinity/logger.js'
import type {
  AffinityKey,
  AffinityRecord,
  AggregatedInterest,
  AggregationWindow,
  GarbageCollectionResult,
  InterestedProfile,
  ScoringContext,
  WindowScope,
} from '../affinity/types.js'
import { DEFAULT_THRESHOLDS } from '../decision/constants.js'
import { decide } from '../decision/pipeline.js'
import { predictUserEvent } from '../decision/predictive.js'
import type { Decision } from '../decision/types.js'
import { AppError, BatchFailure, BatchInProgressError, PersistenceError, ValidationError } from '../errors.js'
import { IdentityResolver } from '../identity.js'
import { withTransaction } from '../store/database.js'
import type { DatabaseClient, DatabasePool } from '../store/database.js'
import { withRetry } from '../utils/retry.js'
import type { RetryOptions } from '../utils/retry.js'
import type { DecisionView, PredictionView, ProfileAffinity } from './types.js'

export interface OrchestratorDeps {
  pool: DatabasePool
  aggregator: EventAggregator
  resolver?: IdentityResolver
  halfLifeDays?: number
  gcThreshold?: number
  retry?: RetryOptions
}

export interface BatchOptions {
  context?: ScoringContext
}

export interface GarbageCollectionScope {
  tenantId?: string
  now?: Date
}

interface PairOutcome {
  touched: boolean
}

interface EvaluatedSubject {
  record: AffinityRecord
  decision: Decision
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of source) items.push(item)
  return items
}

/** Highest-interest record per subject; input is already ordered by interest descending. */
function bestPerSubject(records: AffinityRecord[]): AffinityRecord[] {
  const seen = new Set<string>()
  return records.filter(record => {
    if (seen.has(record.subjectId)) return false
    seen.add(record.subjectId)
    return true
  })
}

export class AffinityOrchestrator {
  private readonly pool: DatabasePool
  private readonly aggregator: EventAggregator
  private readonly resolver: IdentityResolver
  private readonly halfLifeDays: number
  private readonly gcThreshold: number
  private readonly retry: RetryOptions

  constructor(deps: OrchestratorDeps) {
    this.pool = deps.pool
    this.aggregator = deps.aggregator
    this.resolver = deps.resolver ?? new IdentityResolver(deps.pool)
    this.halfLifeDays = deps.halfLifeDays ?? DECAY_HALF_LIFE_DAYS
    this.gcThreshold = deps.gcThreshold ?? GC_SCORE_THRESHOLD
    this.retry = deps.retry ?? {}
  }

  // ─── Batch path ─────────────────────────────────────────────────────────

  /**
   * Score one window for a cohort and persist scores plus decisions.
   * Returns the number of records written.
   *
   * Each applied window is recorded per (tenant, cohort, context) in the same
   * transaction as its scores. Re-running a recorded window writes nothing, in
   * any order relative to later windows; a window that partly overlaps a
   * recorded one is rejected.
   *
   * Not safe to run concurrently for one tenant; a second run fails with
   * BatchInProgressError instead of racing the first.
   */
  async runBatchUpdate(
    tenantName: string,
    cohortName: string,
    windowStart: Date,
    windowEnd: Date,
    options: BatchOptions = {}
  ): Promise<number> {
    assertWindow(windowStart, windowEnd)
    const startedAt = Date.now()
    const window: AggregationWindow = { windowStart, windowEnd }
    logBatchStarted(tenantName, cohortName, window)

    const resolved = await this.resolver.resolveContext(tenantName, cohortName)
    const scope: WindowScope = {
      tenantId: resolved.tenantId,
      cohortId: resolved.cohortId,
      ...(options.context ?? DEFAULT_SCORING_CONTEXT),
    }

    // Checked again under the batch lock; this one only spares the event store.
    if (await this.isApplied(new AffinityStore(this.pool), scope, window)) {
      logWindowAlreadyApplied(tenantName, cohortName, window)
      return 0
    }

    const pairs = await withRetry(
      () => this.aggregator.aggregate({ ...window, tenantId: scope.tenantId, cohortId: scope.cohortId }),
      'aggregate',
      this.retry
    )
    logAggregated(scope.tenantId, scope.cohortId, pairs.length)

    if (pairs.length === 0) {
      logBatchCompleted(tenantName, { aggregated: 0, touched: 0, skipped: 0, durationMs: Date.now() - startedAt })
      return 0
    }

    const touched = await this.guardBatch(tenantName, async () => {
      const personas = await this.resolver.loadPersonas(scope.tenantId, pairs.map(pair => pair.profileId))
      return withTransaction(this.pool, async client => {
        const store = await this.lockedStore(client, scope.tenantId)
        if (await this.isApplied(store, scope, window)) return null

        let count = 0
        for (const pair of pairs) {
          const outcome = await this.applyPair(store, scope, pair, personas.get(pair.profileId) ?? [])
          if (outcome.touched) count++
        }
        await store.recordAppliedWindow(scope, window)
        return count
      })
    })

    if (touched === null) {
      logWindowAlreadyApplied(tenantName, cohortName, window)
      return 0
    }

    logBatchCompleted(tenantName, {
      aggregated: pairs.length,
      touched,
      skipped: pairs.length - touched,
      durationMs: Date.now() - startedAt,
    })
    return touched
  }

  /**
   * Re-evaluate decision columns for every stored record of a tenant at or
   * above `minScore`, in one transaction. Scores are not touched. Records the
   * garbage collector removes while the refresh runs are skipped.
   */
  async refreshDecisions(tenantName: string, minScore = DEFAULT_THRESHOLDS.warm): Promise<number> {
    const tenantId = await this.resolver.resolveTenant(tenantName)

    const updated = await this.guardBatch(tenantName, () =>
      withTransaction(this.pool, async client => {
        const store = await this.lockedStore(client, tenantId)
        const candidates = await collect(store.scan(tenantId, minScore))
        if (candidates.length === 0) return 0
        const personas = await this.resolver.loadPersonas(tenantId, candidates.map(record => record.profileId))

        let count = 0
        for (const record of candidates) {
          const decision = decide(record.interestScore, personas.get(record.profileId) ?? [])
          const written = await store.updateDecision(
            record, decision.predictedEvent, decision.probability, decision.action, decision.confidence
          )
          if (written) count++
        }
        return count
      })
    )

    logDecisionsRefreshed(tenantName, updated)
    return updated
  }

  // ─── Read path ──────────────────────────────────────────────────────────

  async getDecisions(tenantId: string, profileId: string): Promise<Record<string, DecisionView>> {
    const evaluated = await this.evaluateProfile(tenantId, profileId)
    return Object.fromEntries(evaluated.map(({ record, decision }) => [
      record.subjectId,
      {
        action: decision.action,
        channel: decision.channel,
        confidence: decision.confidence,
        reason: decision.reason,
      },
    ]))
  }

  async getPredictions(tenantId: string, profileId: string): Promise<Record<string, PredictionView>> {
    const evaluated = await this.evaluateProfile(tenantId, profileId)
    return Object.fromEntries(evaluated.map(({ record, decision }) => [
      record.subjectId,
      { predictedEvent: decision.predictedEvent, probability: decision.probability },
    ]))
  }

  async findInterested(tenantId: string, subjectId: string, minScore: number): Promise<InterestedProfile[]> {
    if (!Number.isFinite(minScore) || minScore < 0 || minScore > 1) {
      throw new ValidationError(`min_score must be within [0, 1], got ${minScore}`)
    }
    return new AffinityStore(this.pool).findInterested(tenantId, subjectId, minScore)
  }

  /** 360 view of one profile: identity, scores per subject and next likely actions. */
  async getProfileAffinity(tenantId: string, lookupKey: string): Promise<ProfileAffinity | null> {
    const profile = await this.resolver.findProfile(tenantId, lookupKey)
    if (!profile) return null

    const records = bestPerSubject(await collect(new AffinityStore(this.pool).scanByProfile(tenantId, profile.profileId)))
    const entries = <T>(value: (record: AffinityRecord) => T): Record<string, T> =>
      Object.fromEntries(records.map(record => [record.subjectId, value(record)]))

    return {
      profileId: profile.profileId,
      identities: profile.identities,
      primaryEmail: profile.primaryEmail,
      rawScores: entries(record => record.rawScore),
      interestScores: entries(record => record.interestScore),
      nextLikelyActions: entries(record => predictUserEvent(record.interestScore, profile.segments).predictedEvent),
      segments: profile.segments,
    }
  }

  // ─── Maintenance ────────────────────────────────────────────────────────

  /** Remove records whose interest, decayed to `now` with this engine's half-life, fell below `threshold`. */
  async collectGarbage(threshold = this.gcThreshold, scope: GarbageCollectionScope = {}): Promise<GarbageCollectionResult> {
    return collectGarbage(new AffinityStore(this.pool), {
      threshold,
      halfLifeDays: this.halfLifeDays,
      tenantId: scope.tenantId,
      now: scope.now,
    })
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private async lockedStore(client: DatabaseClient, tenantId: string): Promise<AffinityStore> {
    const store = new AffinityStore(client)
    if (!(await store.tryAcquireBatchLock(tenantId))) {
      throw new BatchInProgressError(tenantId)
    }
    return store
  }

  /**
   * True when exactly this window was already applied for the scope. A partial
   * overlap would count the shared events twice and is rejected.
   */
  private async isApplied(store: AffinityStore, scope: WindowScope, window: AggregationWindow): Promise<boolean> {
    if (window.windowStart.getTime() === window.windowEnd.getTime()) return false

    const applied = await store.findAppliedWindows(scope, window)
    if (applied.length === 0) return false
    const same = applied.some(prior =>
      prior.windowStart.getTime() === window.windowStart.getTime() &&
      prior.windowEnd.getTime() === window.windowEnd.getTime()
    )
    if (same) return true

    const prior = applied[0]
    throw new ValidationError(
      `Window ${window.windowStart.toISOString()}..${window.windowEnd.toISOString()} overlaps applied window ` +
      `${prior.windowStart.toISOString()}..${prior.windowEnd.toISOString()}`
    )
  }

  private async applyPair(
    store: AffinityStore,
    scope: WindowScope,
    pair: AggregatedInterest,
    personas: string[]
  ): Promise<PairOutcome> {
    const key: AffinityKey = {
      tenantId: scope.tenantId,
      profileId: pair.profileId,
      subjectId: pair.subjectId,
      contextMapId: scope.contextMapId,
      contextStageId: scope.contextStageId,
      modelId: scope.modelId,
    }
    const prior = await store.get(key)

    // Latest event already folded in by an earlier run, e.g. another cohort's.
    if (prior && prior.lastInteractionAt.getTime() === pair.lastEventTime.getTime()) {
      return { touched: false }
    }

    const rawScore = computeNewRaw(
      prior?.rawScore ?? null,
      prior?.lastInteractionAt ?? null,
      pair.incomingScore,
      pair.lastEventTime,
      this.halfLifeDays
    )
    const lastInteractionAt = prior && prior.lastInteractionAt.getTime() > pair.lastEventTime.getTime()
      ? prior.lastInteractionAt
      : pair.lastEventTime
    const interestScore = normalizeInterest(rawScore)

    await store.upsert(key, { rawScore, interestScore, lastInteractionAt })

    const decision = decide(interestScore, personas)
    await store.upsertDecision(key, decision.predictedEvent, decision.probability, decision.action, decision.confidence)
    return { touched: true }
  }

  private async evaluateProfile(tenantId: string, profileId: string): Promise<EvaluatedSubject[]> {
    const records = bestPerSubject(await collect(new AffinityStore(this.pool).scanByProfile(tenantId, profileId)))
    if (records.length === 0) return []

    const personas = (await this.resolver.loadPersonas(tenantId, [profileId])).get(profileId) ?? []
    return records.map(record => ({ record, decision: decide(record.interestScore, personas) }))
  }

  /**
   * Persistence failures become BatchFailure (the transaction is already rolled
   * back by withTransaction). Engine errors such as BatchInProgressError or
   * DecisionTableGapError pass through unchanged.
   */
  private async guardBatch<T>(tenantName: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work()
    } catch (err) {
      logBatchFailed(tenantName, err)
      if (err instanceof AppError && !(err instanceof PersistenceError)) throw err
      throw new BatchFailure(tenantName, err)
    }
  }
}
