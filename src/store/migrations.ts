/**
 * Schema for the affinity store and the event store. Every statement is
 * IF NOT EXISTS, so this runs safely on every startup.
 */

import type { DatabaseClient } from './database.js'

const AFFINITY_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS tenant (
    tenant_id   UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    tenant_name TEXT NOT NULL UNIQUE,
    status      TEXT NOT NULL DEFAULT 'active',
    created_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at  TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS cdp_profiles (
    profile_id     TEXT PRIMARY KEY,
    tenant_id      UUID NOT NULL REFERENCES tenant(tenant_id) ON DELETE CASCADE,
    fingerprint_id TEXT,
    identities     JSONB NOT NULL DEFAULT '[]'::jsonb,
    primary_email  TEXT,
    segments       JSONB NOT NULL DEFAULT '[]'::jsonb,
    created_at     TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at     TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_cdp_profiles_tenant ON cdp_profiles (tenant_id)`,
  `CREATE INDEX IF NOT EXISTS idx_cdp_profiles_fingerprint ON cdp_profiles (fingerprint_id)`,
  `CREATE INDEX IF NOT EXISTS idx_cdp_profiles_segments ON cdp_profiles USING GIN (segments jsonb_path_ops)`,
  `CREATE TABLE IF NOT EXISTS affinity_records (
    tenant_id              UUID NOT NULL,
    profile_id             TEXT NOT NULL,
    subject_id             TEXT NOT NULL,
    context_map_id         TEXT NOT NULL,
    context_stage_id       TEXT NOT NULL,
    model_id               TEXT NOT NULL,
    raw_score              DOUBLE PRECISION NOT NULL DEFAULT 0 CHECK (raw_score >= 0),
    interest_score         DOUBLE PRECISION NOT NULL DEFAULT 0 CHECK (interest_score >= 0 AND interest_score < 1),
    last_interaction_at    TIMESTAMPTZ NOT NULL,
    predicted_user_event   TEXT,
    prediction_probability DOUBLE PRECISION,
    next_best_action       TEXT,
    nba_confidence         DOUBLE PRECISION,
    updated_at             TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (tenant_id, profile_id, subject_id, context_map_id, context_stage_id, model_id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_affinity_subject ON affinity_records (tenant_id, subject_id)`,
  `CREATE INDEX IF NOT EXISTS idx_affinity_interest ON affinity_records (interest_score)`,
  `CREATE TABLE IF NOT EXISTS affinity_applied_windows (
    tenant_id        UUID NOT NULL,
    cohort_id        TEXT NOT NULL,
    context_map_id   TEXT NOT NULL,
    context_stage_id TEXT NOT NULL,
    model_id         TEXT NOT NULL,
    window_start     TIMESTAMPTZ NOT NULL,
    window_end       TIMESTAMPTZ NOT NULL,
    applied_at       TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (tenant_id, cohort_id, context_map_id, context_stage_id, model_id, window_start),
    CHECK (window_start < window_end)
  )`,
  `CREATE TABLE IF NOT EXISTS affinity_batch_checkpoints (
    tenant_name TEXT NOT NULL,
    cohort_name TEXT NOT NULL,
    window_end  TIMESTAMPTZ NOT NULL,
    updated_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (tenant_name, cohort_name)
  )`,
]

const EVENT_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS tracking_events (
    event_id           BIGSERIAL PRIMARY KEY,
    profile_identifier TEXT NOT NULL,
    event_type_name    TEXT NOT NULL,
    event_data         JSONB NOT NULL DEFAULT '{}'::jsonb,
    created_at         TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_tracking_events_created ON tracking_events (created_at)`,
  `CREATE TABLE IF NOT EXISTS event_metrics (
    event_name TEXT PRIMARY KEY,
    score      DOUBLE PRECISION NOT NULL
  )`,
]

export async function runMigrations(db: DatabaseClient, eventDb: DatabaseClient = db): Promise<void> {
  for (const statement of AFFINITY_SCHEMA) {
    await db.query(statement)
  }
  for (const statement of EVENT_SCHEMA) {
    await eventDb.query(statement)
  }
}
