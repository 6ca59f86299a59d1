/**
 * Row shapes as returned by pg for the affinity and event stores.
 * Column names stay snake_case; mapping to domain types happens in the stores.
 */

// ===========================================
// AFFINITY STORE
// ===========================================

export interface AffinityRow {
  tenant_id: string
  profile_id: string
  subject_id: string
  context_map_id: string
  context_stage_id: string
  model_id: string
  raw_score: number | string
  interest_score: number | string
  last_interaction_at: Date | string
  predicted_user_event: string | null
  prediction_probability: number | string | null
  next_best_action: string | null
  nba_confidence: number | string | null
  updated_at: Date | string
}

export interface InterestedProfileRow {
  profile_id: string
  interest_score: number | string
  raw_score: number | string
}

export interface BatchLockRow {
  locked: boolean
}

export interface AppliedWindowRow {
  window_start: Date | string
  window_end: Date | string
}

export interface CheckpointRow {
  window_end: Date | string
}

// ===========================================
// PROFILES & TENANTS
// ===========================================

/** One entry of cdp_profiles.segments. */
export interface SegmentEntry {
  id?: string | null
  name?: string | null
}

export interface TenantRow {
  tenant_id: string
  tenant_name: string
}

export interface CohortRow {
  cohort_id: string
}

export interface ProfileSegmentsRow {
  profile_id: string
  segments: SegmentEntry[] | string | null
}

export interface ProfileRow extends ProfileSegmentsRow {
  identities: string[] | string | null
  primary_email: string | null
}

// ===========================================
// EVENT STORE
// ===========================================

export interface AggregateRow {
  profile_id: string
  subject_id: string
  incoming_score: number | string
  last_event_time: Date | string
}
