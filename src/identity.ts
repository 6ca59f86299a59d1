/**
 * Identity Resolver: tenant and cohort display names → stable ids
 *
 * Cohort membership is denormalized onto profile records (cdp_profiles.segments
 * is a JSON list of { id, name }), so there is no cohort table to look a name
 * up in. The cohort id is found by scanning the tenant's profiles for an entry
 * with that name: O(profiles) in the worst case, which is why a batch run
 * resolves once and passes the ids down instead of resolving per row.
 */

import { NotFoundError, PersistenceError } from './errors.js'
import type { DatabaseClient } from './store/database.js'
import type { CohortRow, ProfileRow, ProfileSegmentsRow, TenantRow } from './types/database.js'
import { IdentityListSchema, SegmentListSchema, parseJsonColumn } from './types/schemas.js'

export interface ResolvedContext {
    tenantId: string
    tenantName: string
    cohortId: string
    cohortName: string
}

export interface ProfileSummary {
    profileId: string
    identities: string[]
    primaryEmail: string | null
    segments: string[]
}

/** Names of the cohorts (personas) a profile belongs to. */
export function segmentNames(raw: unknown): string[] {
    const segments = parseJsonColumn(raw, SegmentListSchema) ?? []
    return segments.flatMap(segment => segment.name ? [segment.name] : [])
}

export class IdentityResolver {
    // Tenant ids never change for a name; cache for the resolver's lifetime.
    private readonly tenantIds = new Map<string, string>()

    constructor(private readonly db: DatabaseClient) {}

    async resolveTenant(tenantName: string): Promise<string> {
        const cached = this.tenantIds.get(tenantName)
        if (cached) return cached

        const { rows } = await this.read('resolveTenant', () => this.db.query<TenantRow>(
            `SELECT tenant_id::text AS tenant_id, tenant_name
             FROM tenant
             WHERE tenant_name = $1
             ORDER BY created_at
             LIMIT 1`,
            [tenantName]
        ))
        if (rows.length === 0) {
            throw new NotFoundError('Tenant', tenantName)
        }

        const tenantId = rows[0].tenant_id
        this.tenantIds.set(tenantName, tenantId)
        return tenantId
    }

    async resolveCohort(tenantId: string, cohortName: string): Promise<string> {
        const { rows } = await this.read('resolveCohort', () => this.db.query<CohortRow>(
            `SELECT seg->>'id' AS cohort_id
             FROM cdp_profiles p
             CROSS JOIN LATERAL jsonb_array_elements(p.segments) AS seg
             WHERE p.tenant_id = $1
               AND jsonb_typeof(p.segments) = 'array'
               AND seg->>'name' = $2
               AND COALESCE(seg->>'id', '') <> ''
             LIMIT 1`,
            [tenantId, cohortName]
        ))
        if (rows.length === 0) {
            throw new NotFoundError('Cohort', cohortName)
        }
        return rows[0].cohort_id
    }

    /** Resolve both ids once for a run. Tenant first: a missing tenant never scans profiles. */
    async resolveContext(tenantName: string, cohortName: string): Promise<ResolvedContext> {
        const tenantId = await this.resolveTenant(tenantName)
        const cohortId = await this.resolveCohort(tenantId, cohortName)
        return { tenantId, tenantName, cohortId, cohortName }
    }

    /** Persona names for many profiles in one query. Unknown profiles map to []. */
    async loadPersonas(tenantId: string, profileIds: string[]): Promise<Map<string, string[]>> {
        const personas = new Map<string, string[]>()
        const unique = [...new Set(profileIds)]
        if (unique.length === 0) return personas

        const { rows } = await this.read('loadPersonas', () => this.db.query<ProfileSegmentsRow>(
            `SELECT profile_id, segments
             FROM cdp_profiles
             WHERE tenant_id = $1 AND profile_id = ANY($2::text[])`,
            [tenantId, unique]
        ))
        for (const id of unique) personas.set(id, [])
        for (const row of rows) personas.set(row.profile_id, segmentNames(row.segments))
        return personas
    }

    /** Find a profile by profile id, primary email or any of its identities. */
    async findProfile(tenantId: string, lookupKey: string): Promise<ProfileSummary | null> {
        const key = lookupKey.trim()
        if (!key) return null

        const { rows } = await this.read('findProfile', () => this.db.query<ProfileRow>(
            `SELECT profile_id, identities, primary_email, segments
             FROM cdp_profiles
             WHERE tenant_id = $1
               AND (profile_id = $2 OR lower(primary_email) = lower($2) OR identities ? $2)
             ORDER BY (profile_id = $2) DESC
             LIMIT 1`,
            [tenantId, key]
        ))
        if (rows.length === 0) return null

        const row = rows[0]
        return {
            profileId: row.profile_id,
            identities: parseJsonColumn(row.identities, IdentityListSchema) ?? [],
            primaryEmail: row.primary_email,
            segments: segmentNames(row.segments),
        }
    }

    private async read<T>(operation: string, query: () => Promise<T>): Promise<T> {
        try {
            return await query()
        } catch (err) {
            throw new PersistenceError(operation, err)
        }
    }
}
