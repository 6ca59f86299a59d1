export interface ScoringContext {
  contextMapId: string
  contextStageId: string
  modelId: string
}

/** Full composite identity of an affinity record. */
export interface AffinityKey extends ScoringContext {
  tenantId: string
  profileId: string
  subjectId: string
}

export interface AffinityRecord extends AffinityKey {
  rawScore: number
  interestScore: number
  lastInteractionAt: Date
  predictedUserEvent: string | null
  predictionProbability: number | null
  nextBestAction: string | null
  nbaConfidence: number | null
  updatedAt: Date
}

export interface AggregationWindow {
  windowStart: Date
  windowEnd: Date
}

export interface AggregationQuery extends AggregationWindow {
  tenantId: string
  cohortId: string
}

/** One (profile, subject) group produced by the event aggregator. */
export interface AggregatedInterest {
  profileId: string
  subjectId: string
  incomingScore: number
  lastEventTime: Date
}

export interface ScoreUpdate {
  rawScore: number
  interestScore: number
  lastInteractionAt: Date
}

export interface ScanOptions {
  subjectId?: string
  limit?: number
}

export interface InterestedProfile {
  profileId: string
  interestScore: number
  rawScore: number
}

export type GarbageCollectionResult =
  | { ok: true; deleted: number; threshold: number }
  | { ok: false; deleted: 0; threshold: number; error: string }

export interface DecayedDeleteOptions {
  halfLifeDays: number
  k?: number
  /** Point in time scores are decayed to. Defaults to the current time. */
  now?: Date
  tenantId?: string
}

/** What one batch run accumulates into: a cohort of a tenant under one scoring context. */
export interface WindowScope extends ScoringContext {
  tenantId: string
  cohortId: string
}
