/**
 * In-process stand-in for the affinity and event store pools.
 *
 * Understands exactly the statements the resolver, the affinity store and
 * the event aggregator issue, keeps rows in memory and honours
 * BEGIN/COMMIT/ROLLBACK with a snapshot, so orchestrator tests can assert on
 * committed state.
 */

import type { QueryResult, QueryResultRow } from 'pg'
import type { DatabasePool, TransactionalClient } from '../store/database.js'
import type { AffinityRow, SegmentEntry } from '../types/database.js'

export interface FakeProfile {
    tenantId: string
    segments: SegmentEntry[]
    identities: string[]
    primaryEmail: string | null
    fingerprintId?: string
}

export interface FakeEvent {
    profileIdentifier: string
    eventType: string
    data: Record<string, unknown>
    createdAt: Date
}

export interface FakeAppliedWindow {
    scope: string
    windowStart: Date
    windowEnd: Date
}

const MS_PER_DAY = 86_400_000

function result(rows: QueryResultRow[], rowCount: number = rows.length): QueryResult {
    return { command: '', rowCount, oid: 0, fields: [], rows }
}

function toDate(value: unknown): Date {
    return value instanceof Date ? value : new Date(String(value))
}

function recordKey(values: unknown[]): string {
    return values.slice(0, 6).map(String).join('|')
}

/** Mirrors `btrim(event_data->>attr)`: objects and null have no text form here. */
function subjectOf(data: Record<string, unknown>, attribute: string): string | null {
    const value = data[attribute]
    if (typeof value === 'string') return value.trim()
    if (typeof value === 'number' || typeof value === 'boolean') return String(value)
    return null
}

function byInterestDesc(a: AffinityRow, b: AffinityRow): number {
    return Number(b.interest_score) - Number(a.interest_score) || a.subject_id.localeCompare(b.subject_id)
}

export class FakeDatabase implements DatabasePool {
    readonly tenants = new Map<string, string>()
    /** `${tenantId}|${cohortName}` → cohort id */
    readonly cohorts = new Map<string, string>()
    readonly profiles = new Map<string, FakeProfile>()
    records = new Map<string, AffinityRow>()
    appliedWindows: FakeAppliedWindow[] = []
    readonly events: FakeEvent[] = []
    /** event type → weight */
    readonly metrics = new Map<string, number>()
    readonly statements: string[] = []
    lockAvailable = true
    /** Any statement containing this fragment fails. */
    failOn: string | null = null
    /** Runs before each statement, for interleaving a concurrent writer. */
    onStatement: ((sql: string) => void) | null = null

    private snapshot: { records: Map<string, AffinityRow>; appliedWindows: FakeAppliedWindow[] } | null = null

    seed(row: AffinityRow): void {
        this.records.set(
            recordKey([row.tenant_id, row.profile_id, row.subject_id, row.context_map_id, row.context_stage_id, row.model_id]),
            row
        )
    }

    rows(): AffinityRow[] {
        return [...this.records.values()]
    }

    async query<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
        return this.execute(sql.trim(), params)
    }

    async connect(): Promise<TransactionalClient> {
        return this
    }

    release(): void {}

    async end(): Promise<void> {}

    private execute(sql: string, params: unknown[]): QueryResult {
        this.statements.push(sql)
        this.onStatement?.(sql)
        if (this.failOn && sql.includes(this.failOn)) {
            throw new Error(`simulated failure on "${this.failOn}"`)
        }

        if (sql === 'BEGIN') {
            this.snapshot = { records: new Map(this.records), appliedWindows: [...this.appliedWindows] }
            return result([])
        }
        if (sql === 'COMMIT') {
            this.snapshot = null
            return result([])
        }
        if (sql === 'ROLLBACK') {
            if (this.snapshot) {
                this.records = this.snapshot.records
                this.appliedWindows = this.snapshot.appliedWindows
            }
            this.snapshot = null
            return result([])
        }

        if (sql.includes('pg_try_advisory_xact_lock')) {
            return result([{ locked: this.lockAvailable }])
        }
        if (sql.includes('FROM tracking_events')) {
            return result(this.aggregate(params))
        }
        if (sql.includes('FROM affinity_applied_windows')) {
            const scope = params.slice(0, 5).map(String).join('|')
            const start = toDate(params[5]).getTime()
            const end = toDate(params[6]).getTime()
            return result(this.appliedWindows
                .filter(w => w.scope === scope && w.windowStart.getTime() < end && w.windowEnd.getTime() > start)
                .sort((a, b) => a.windowStart.getTime() - b.windowStart.getTime())
                .map(w => ({ window_start: w.windowStart, window_end: w.windowEnd })))
        }
        if (sql.startsWith('INSERT INTO affinity_applied_windows')) {
            const scope = params.slice(0, 5).map(String).join('|')
            const windowStart = toDate(params[5])
            if (this.appliedWindows.some(w => w.scope === scope && w.windowStart.getTime() === windowStart.getTime())) {
                throw new Error('duplicate key value violates unique constraint "affinity_applied_windows_pkey"')
            }
            this.appliedWindows.push({ scope, windowStart, windowEnd: toDate(params[6]) })
            return result([], 1)
        }
        if (sql.includes('FROM tenant')) {
            const tenantId = this.tenants.get(String(params[0]))
            return result(tenantId ? [{ tenant_id: tenantId, tenant_name: String(params[0]) }] : [])
        }
        if (sql.includes('jsonb_array_elements')) {
            const cohortId = this.cohorts.get(`${String(params[0])}|${String(params[1])}`)
            return result(cohortId ? [{ cohort_id: cohortId }] : [])
        }
        if (sql.includes('ANY($2::text[])')) {
            const ids = Array.isArray(params[1]) ? params[1].map(String) : []
            return result(ids.flatMap(id => {
                const profile = this.profiles.get(id)
                return profile && profile.tenantId === params[0] ? [{ profile_id: id, segments: profile.segments }] : []
            }))
        }
        if (sql.includes('lower(primary_email)')) {
            const key = String(params[1])
            for (const [id, profile] of this.profiles) {
                if (profile.tenantId !== params[0]) continue
                if (id === key || profile.primaryEmail?.toLowerCase() === key.toLowerCase() || profile.identities.includes(key)) {
                    return result([{
                        profile_id: id,
                        identities: profile.identities,
                        primary_email: profile.primaryEmail,
                        segments: profile.segments,
                    }])
                }
            }
            return result([])
        }

        if (sql.startsWith('INSERT INTO affinity_records')) {
            const key = recordKey(params)
            const prior = this.records.get(key)
            this.records.set(key, {
                tenant_id: String(params[0]),
                profile_id: String(params[1]),
                subject_id: String(params[2]),
                context_map_id: String(params[3]),
                context_stage_id: String(params[4]),
                model_id: String(params[5]),
                raw_score: Number(params[6]),
                interest_score: Number(params[7]),
                last_interaction_at: toDate(params[8]),
                predicted_user_event: prior?.predicted_user_event ?? null,
                prediction_probability: prior?.prediction_probability ?? null,
                next_best_action: prior?.next_best_action ?? null,
                nba_confidence: prior?.nba_confidence ?? null,
                updated_at: new Date(),
            })
            return result([], 1)
        }
        if (sql.startsWith('UPDATE affinity_records')) {
            const key = recordKey(params)
            const prior = this.records.get(key)
            if (!prior) return result([], 0)
            this.records.set(key, {
                ...prior,
                predicted_user_event: String(params[6]),
                prediction_probability: Number(params[7]),
                next_best_action: String(params[8]),
                nba_confidence: Number(params[9]),
                updated_at: new Date(),
            })
            return result([], 1)
        }
        if (sql.startsWith('DELETE FROM affinity_records')) {
            const threshold = Number(params[0])
            const now = toDate(params[1]).getTime()
            const halfLifeDays = Number(params[2])
            const k = Number(params[3])
            let deleted = 0
            for (const [key, row] of this.records) {
                const elapsedDays = Math.max(0, now - toDate(row.last_interaction_at).getTime()) / MS_PER_DAY
                const decayed = Number(row.raw_score) * Math.pow(0.5, elapsedDays / halfLifeDays)
                if (decayed / (decayed + k) >= threshold) continue
                if (params.length > 4 && row.tenant_id !== params[4]) continue
                this.records.delete(key)
                deleted++
            }
            return result([], deleted)
        }

        if (sql.includes('DISTINCT ON (profile_id)')) {
            const best = new Map<string, AffinityRow>()
            for (const row of this.rows()) {
                if (row.tenant_id !== params[0] || row.subject_id !== params[1]) continue
                if (Number(row.interest_score) < Number(params[2])) continue
                const current = best.get(row.profile_id)
                if (!current || Number(row.interest_score) > Number(current.interest_score)) best.set(row.profile_id, row)
            }
            return result([...best.values()]
                .sort((a, b) => Number(b.interest_score) - Number(a.interest_score) || a.profile_id.localeCompare(b.profile_id))
                .slice(0, Number(params[3]))
                .map(row => ({ profile_id: row.profile_id, interest_score: row.interest_score, raw_score: row.raw_score })))
        }
        if (sql.includes('interest_score >= $2')) {
            const page = /LIMIT (\d+) OFFSET (\d+)/.exec(sql)
            const limit = page ? Number(page[1]) : Infinity
            const offset = page ? Number(page[2]) : 0
            const rows = this.rows()
                .filter(row => row.tenant_id === params[0] && Number(row.interest_score) >= Number(params[1]))
                .filter(row => params.length < 3 || row.subject_id === params[2])
                .sort(byInterestDesc)
            return result(rows.slice(offset, offset + limit))
        }
        if (sql.includes('context_map_id = $4')) {
            const row = this.records.get(recordKey(params))
            return result(row ? [row] : [])
        }
        if (sql.includes('profile_id = $2')) {
            return result(this.rows()
                .filter(row => row.tenant_id === params[0] && row.profile_id === params[1])
                .sort(byInterestDesc))
        }

        throw new Error(`FakeDatabase: unhandled statement ${sql.slice(0, 80)}`)
    }

    /** Evaluates the event aggregation query over `events`, `metrics` and profile fingerprints. */
    private aggregate(params: unknown[]): QueryResultRow[] {
        const start = toDate(params[0]).getTime()
        const end = toDate(params[1]).getTime()
        const tenantId = params[2]
        const cohortId = String(params[3])
        const attribute = String(params[4])

        const groups = new Map<string, { profile_id: string; subject_id: string; incoming_score: number; last_event_time: Date }>()
        for (const event of this.events) {
            const at = event.createdAt.getTime()
            if (at < start || at >= end) continue
            const weight = this.metrics.get(event.eventType)
            if (weight === undefined) continue
            const subject = subjectOf(event.data, attribute)
            if (subject === null || subject === '') continue

            for (const [profileId, profile] of this.profiles) {
                if (profile.fingerprintId !== event.profileIdentifier || profile.tenantId !== tenantId) continue
                if (!profile.segments.some(segment => segment.id === cohortId)) continue

                const key = `${profileId}|${subject}`
                const group = groups.get(key)
                if (!group) {
                    groups.set(key, { profile_id: profileId, subject_id: subject, incoming_score: weight, last_event_time: event.createdAt })
                } else {
                    group.incoming_score += weight
                    if (at > group.last_event_time.getTime()) group.last_event_time = event.createdAt
                }
            }
        }
        return [...groups.values()].sort((a, b) =>
            a.profile_id.localeCompare(b.profile_id) || a.subject_id.localeCompare(b.subject_id))
    }
}
