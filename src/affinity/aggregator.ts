/**
 * Event Aggregator
 *
 * Folds raw tracking events in a half-open window [start, end) into one
 * (profile, subject) row each: SUM of the per-event-type weight and the
 * latest event timestamp. Events without a subject attribute are noise and
 * never reach the grouping.
 *
 * The query runs against the event store, which must expose
 * `tracking_events`, `event_metrics` and the `cdp_profiles` projection
 * (the same table when both stores share a database, a synced copy otherwise).
 */

import { AggregationError, ValidationError } from '../errors.js'
import type { DatabaseClient } from '../store/database.js'
import type { AggregateRow } from '../types/database.js'
import type { AggregatedInterest, AggregationQuery } from './types.js'

export const SUBJECT_ATTRIBUTE = 'subject'

export interface EventAggregator {
  aggregate(query: AggregationQuery): Promise<AggregatedInterest[]>
}

const AGGREGATE_SQL = `
  SELECT profile_id, subject_id,
         SUM(weight) AS incoming_score,
         MAX(created_at) AS last_event_time
  FROM (
    SELECT p.profile_id,
           btrim(e.event_data->>$5) AS subject_id,
           m.score AS weight,
           e.created_at
    FROM tracking_events e
    JOIN cdp_profiles p ON p.fingerprint_id = e.profile_identifier
    JOIN event_metrics m ON m.event_name = e.event_type_name
    WHERE e.created_at >= $1
      AND e.created_at < $2
      AND p.tenant_id = $3
      AND p.segments @> jsonb_build_array(jsonb_build_object('id', $4::text))
  ) qualified
  WHERE subject_id IS NOT NULL AND subject_id <> ''
  GROUP BY profile_id, subject_id
  ORDER BY profile_id, subject_id`

export function assertWindow(windowStart: Date, windowEnd: Date): void {
  if (Number.isNaN(windowStart.getTime()) || Number.isNaN(windowEnd.getTime())) {
    throw new ValidationError('Aggregation window bounds must be valid dates')
  }
  if (windowStart.getTime() > windowEnd.getTime()) {
    throw new ValidationError(
      `Aggregation window is inverted: ${windowStart.toISOString()} > ${windowEnd.toISOString()}`
    )
  }
}

export function toAggregatedInterest(row: AggregateRow): AggregatedInterest {
  const incoming = Number(row.incoming_score)
  return {
    profileId: row.profile_id,
    subjectId: row.subject_id,
    incomingScore: Number.isFinite(incoming) ? incoming : 0,
    lastEventTime: row.last_event_time instanceof Date ? row.last_event_time : new Date(row.last_event_time),
  }
}

export class PgEventAggregator implements EventAggregator {
  constructor(
    private readonly db: DatabaseClient,
    private readonly subjectAttribute = SUBJECT_ATTRIBUTE
  ) {}

  async aggregate(query: AggregationQuery): Promise<AggregatedInterest[]> {
    assertWindow(query.windowStart, query.windowEnd)
    if (query.windowStart.getTime() === query.windowEnd.getTime()) return []

    let rows: AggregateRow[]
    try {
      const result = await this.db.query<AggregateRow>(AGGREGATE_SQL, [
        query.windowStart,
        query.windowEnd,
        query.tenantId,
        query.cohortId,
        this.subjectAttribute,
      ])
      rows = result.rows
    } catch (err) {
      throw new AggregationError('Event store aggregation query failed', err)
    }

    return rows.map(toAggregatedInterest)
  }
}
