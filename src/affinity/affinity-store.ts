import { PersistenceError } from '../errors.js'
import type { DatabaseClient } from '../store/database.js'
import type { AffinityRow, AppliedWindowRow, BatchLockRow, InterestedProfileRow } from '../types/database.js'
import { AUDIENCE_PAGE_SIZE, SCORING_K_FACTOR } from './constants.js'
import type {
  AffinityKey,
  AffinityRecord,
  AggregationWindow,
  DecayedDeleteOptions,
  InterestedProfile,
  ScanOptions,
  ScoreUpdate,
  WindowScope,
} from './types.js'

const SCAN_PAGE_SIZE = 500

const RECORD_COLUMNS = `tenant_id, profile_id, subject_id, context_map_id, context_stage_id, model_id,
       raw_score, interest_score, last_interaction_at,
       predicted_user_event, prediction_probability, next_best_action, nba_confidence, updated_at`

const KEY_PREDICATE = `tenant_id = $1 AND profile_id = $2 AND subject_id = $3
       AND context_map_id = $4 AND context_stage_id = $5 AND model_id = $6`

// Raw score decayed from last_interaction_at to $2; $3 is the half-life in days.
const DECAYED_RAW = `(raw_score * power(0.5,
         GREATEST(0, extract(epoch FROM ($2::timestamptz - last_interaction_at))) / 86400.0 / $3::float8))`

const SCOPE_PREDICATE = `tenant_id = $1 AND cohort_id = $2
       AND context_map_id = $3 AND context_stage_id = $4 AND model_id = $5`

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value)
}

function toNumber(value: number | string): number {
  const n = Number(value)
  return Number.isFinite(n) ? n : 0
}

function toNullableNumber(value: number | string | null): number | null {
  return value === null ? null : toNumber(value)
}

function keyParams(key: AffinityKey): unknown[] {
  return [key.tenantId, key.profileId, key.subjectId, key.contextMapId, key.contextStageId, key.modelId]
}

function scopeParams(scope: WindowScope): unknown[] {
  return [scope.tenantId, scope.cohortId, scope.contextMapId, scope.contextStageId, scope.modelId]
}

export function toAffinityRecord(row: AffinityRow): AffinityRecord {
  return {
    tenantId: row.tenant_id,
    profileId: row.profile_id,
    subjectId: row.subject_id,
    contextMapId: row.context_map_id,
    contextStageId: row.context_stage_id,
    modelId: row.model_id,
    rawScore: toNumber(row.raw_score),
    interestScore: toNumber(row.interest_score),
    lastInteractionAt: toDate(row.last_interaction_at),
    predictedUserEvent: row.predicted_user_event,
    predictionProbability: toNullableNumber(row.prediction_probability),
    nextBestAction: row.next_best_action,
    nbaConfidence: toNullableNumber(row.nba_confidence),
    updatedAt: toDate(row.updated_at),
  }
}

/**
 * Durable record of raw and normalized scores per composite key.
 *
 * Bound to a single client: pass the pool for independent reads, or the
 * transaction client during a batch run so every write commits together.
 */
export class AffinityStore {
  constructor(private readonly db: DatabaseClient) {}

  async get(key: AffinityKey): Promise<AffinityRecord | null> {
    const { rows } = await this.run('get', () => this.db.query<AffinityRow>(
      `SELECT ${RECORD_COLUMNS}
       FROM affinity_records
       WHERE ${KEY_PREDICATE}`,
      keyParams(key)
    ))
    return rows.length > 0 ? toAffinityRecord(rows[0]) : null
  }

  async upsert(key: AffinityKey, update: ScoreUpdate): Promise<void> {
    await this.run('upsert', () => this.db.query(
      `INSERT INTO affinity_records (
         tenant_id, profile_id, subject_id, context_map_id, context_stage_id, model_id,
         raw_score, interest_score, last_interaction_at, updated_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, now())
       ON CONFLICT (tenant_id, profile_id, subject_id, context_map_id, context_stage_id, model_id)
       DO UPDATE SET
         raw_score = EXCLUDED.raw_score,
         interest_score = EXCLUDED.interest_score,
         last_interaction_at = EXCLUDED.last_interaction_at,
         updated_at = now()`,
      [...keyParams(key), update.rawScore, update.interestScore, update.lastInteractionAt]
    ))
  }

  /** Write decision columns onto an existing score record; fails if the record is gone. */
  async upsertDecision(
    key: AffinityKey,
    predictedEvent: string,
    probability: number,
    action: string,
    confidence: number
  ): Promise<void> {
    if (!(await this.updateDecision(key, predictedEvent, probability, action, confidence))) {
      throw new PersistenceError('upsertDecision', new Error(`no score record for ${key.profileId}/${key.subjectId}`))
    }
  }

  /** Same write, reporting false instead of failing when the record no longer exists. */
  async updateDecision(
    key: AffinityKey,
    predictedEvent: string,
    probability: number,
    action: string,
    confidence: number
  ): Promise<boolean> {
    const result = await this.run('updateDecision', () => this.db.query(
      `UPDATE affinity_records
       SET predicted_user_event = $7,
           prediction_probability = $8,
           next_best_action = $9,
           nba_confidence = $10,
           updated_at = now()
       WHERE ${KEY_PREDICATE}`,
      [...keyParams(key), predictedEvent, probability, action, confidence]
    ))
    return (result.rowCount ?? 0) > 0
  }

  /** Records of a tenant at or above `minInterestScore`, highest interest first. */
  async *scan(tenantId: string, minInterestScore: number, options: ScanOptions = {}): AsyncGenerator<AffinityRecord> {
    const params: unknown[] = [tenantId, minInterestScore]
    let subjectFilter = ''
    if (options.subjectId !== undefined) {
      params.push(options.subjectId)
      subjectFilter = `AND subject_id = $${params.length}`
    }

    let remaining = options.limit ?? Infinity
    let offset = 0
    while (remaining > 0) {
      const pageSize = Math.min(SCAN_PAGE_SIZE, remaining)
      const { rows } = await this.run('scan', () => this.db.query<AffinityRow>(
        `SELECT ${RECORD_COLUMNS}
         FROM affinity_records
         WHERE tenant_id = $1 AND interest_score >= $2 ${subjectFilter}
         ORDER BY interest_score DESC, profile_id, subject_id, context_map_id, context_stage_id, model_id
         LIMIT ${pageSize} OFFSET ${offset}`,
        params
      ))
      for (const row of rows) yield toAffinityRecord(row)
      if (rows.length < pageSize) return
      remaining -= rows.length
      offset += rows.length
    }
  }

  /** Every subject for one profile, highest interest first. */
  async *scanByProfile(tenantId: string, profileId: string): AsyncGenerator<AffinityRecord> {
    const { rows } = await this.run('scanByProfile', () => this.db.query<AffinityRow>(
      `SELECT ${RECORD_COLUMNS}
       FROM affinity_records
       WHERE tenant_id = $1 AND profile_id = $2
       ORDER BY interest_score DESC, subject_id`,
      [tenantId, profileId]
    ))
    for (const row of rows) yield toAffinityRecord(row)
  }

  /** Audience for a subject: one row per profile (its best context), capped at a page. */
  async findInterested(
    tenantId: string,
    subjectId: string,
    minScore: number,
    limit = AUDIENCE_PAGE_SIZE
  ): Promise<InterestedProfile[]> {
    const { rows } = await this.run('findInterested', () => this.db.query<InterestedProfileRow>(
      `SELECT profile_id, interest_score, raw_score
       FROM (
         SELECT DISTINCT ON (profile_id) profile_id, interest_score, raw_score
         FROM affinity_records
         WHERE tenant_id = $1 AND subject_id = $2 AND interest_score >= $3
         ORDER BY profile_id, interest_score DESC
       ) best
       ORDER BY interest_score DESC, profile_id
       LIMIT $4`,
      [tenantId, subjectId, minScore, limit]
    ))
    return rows.map(row => ({
      profileId: row.profile_id,
      interestScore: toNumber(row.interest_score),
      rawScore: toNumber(row.raw_score),
    }))
  }

  /**
   * Delete records whose interest, decayed to `now`, is below the threshold.
   * Stored scores only move when a batch touches a record, so idle records
   * are judged on what their score would be today.
   */
  async deleteBelow(threshold: number, options: DecayedDeleteOptions): Promise<number> {
    const params: unknown[] = [threshold, options.now ?? new Date(), options.halfLifeDays, options.k ?? SCORING_K_FACTOR]
    let tenantFilter = ''
    if (options.tenantId !== undefined) {
      params.push(options.tenantId)
      tenantFilter = 'AND tenant_id = $5'
    }

    const result = await this.run('deleteBelow', () => this.db.query(
      `DELETE FROM affinity_records
       WHERE ${DECAYED_RAW} / (${DECAYED_RAW} + $4::float8) < $1::float8 ${tenantFilter}`,
      params
    ))
    return result.rowCount ?? 0
  }

  /** Windows already applied for this scope that intersect [windowStart, windowEnd). */
  async findAppliedWindows(scope: WindowScope, window: AggregationWindow): Promise<AggregationWindow[]> {
    const { rows } = await this.run('findAppliedWindows', () => this.db.query<AppliedWindowRow>(
      `SELECT window_start, window_end
       FROM affinity_applied_windows
       WHERE ${SCOPE_PREDICATE}
         AND window_start < $7 AND window_end > $6
       ORDER BY window_start`,
      [...scopeParams(scope), window.windowStart, window.windowEnd]
    ))
    return rows.map(row => ({ windowStart: toDate(row.window_start), windowEnd: toDate(row.window_end) }))
  }

  async recordAppliedWindow(scope: WindowScope, window: AggregationWindow): Promise<void> {
    await this.run('recordAppliedWindow', () => this.db.query(
      `INSERT INTO affinity_applied_windows (
         tenant_id, cohort_id, context_map_id, context_stage_id, model_id, window_start, window_end, applied_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, now())`,
      [...scopeParams(scope), window.windowStart, window.windowEnd]
    ))
  }

  /**
   * Transaction-scoped advisory lock serializing batch runs per tenant.
   * Only meaningful on a transaction client; released on COMMIT/ROLLBACK.
   */
  async tryAcquireBatchLock(tenantId: string): Promise<boolean> {
    const { rows } = await this.run('tryAcquireBatchLock', () => this.db.query<BatchLockRow>(
      `SELECT pg_try_advisory_xact_lock(hashtext($1)) AS locked`,
      [`affinity-batch:${tenantId}`]
    ))
    return rows[0]?.locked === true
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query()
    } catch (err) {
      throw new PersistenceError(operation, err)
    }
  }
}
