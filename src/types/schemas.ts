/**
 * Zod Validation Schemas
 *
 * Runtime validation for values that cross a trust boundary: JSONB columns
 * synced from upstream systems (profile segments, identities) and HTTP
 * query/route params. `.safeParse()` everywhere so malformed upstream data
 * degrades to an empty value instead of failing a whole batch.
 *
 * Usage:
 *   const segments = parseJsonColumn(row.segments, SegmentListSchema) ?? []
 */

import { z } from 'zod'

// ═══════════════════════════════════════════════════════════════════════════
// 1. PROFILE COLUMNS: cdp_profiles.segments / cdp_profiles.identities
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One cohort membership denormalized onto a profile.
 * Expected: { "id": "seg_123", "name": "High-Frequency Actors", ... }
 * Extra keys from upstream are ignored.
 */
export const SegmentEntrySchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String).nullish(),
    name: z.string().nullish(),
})

/** Non-object entries are dropped rather than failing the whole list. */
export const SegmentListSchema = z.array(z.unknown()).transform(items =>
    items.flatMap(item => {
        const parsed = SegmentEntrySchema.safeParse(item)
        return parsed.success ? [parsed.data] : []
    })
)

export type SegmentList = z.infer<typeof SegmentListSchema>

/** Expected: ["crm:12345", "email:someone@example.com"] */
export const IdentityListSchema = z.array(z.unknown()).transform(items =>
    items.filter((item): item is string => typeof item === 'string' && item.length > 0)
)

/**
 * Parse a JSONB column that pg may hand back already decoded or, for text
 * columns, as a JSON string. Returns null when the value does not validate.
 */
export function parseJsonColumn<T extends z.ZodTypeAny>(
    raw: unknown,
    schema: T
): z.infer<T> | null {
    if (raw === null || raw === undefined) return null

    let value: unknown = raw
    if (typeof raw === 'string') {
        try {
            value = JSON.parse(raw)
        } catch (err) {
            console.warn('[schemas] JSON parse failed:', err instanceof Error ? err.message : err)
            return null
        }
    }

    const result = schema.safeParse(value)
    if (result.success) {
        return result.data
    }
    console.warn('[schemas] Zod validation failed:', result.error.issues)
    return null
}

// ═══════════════════════════════════════════════════════════════════════════
// 2. HTTP PARAMS: /recommendation/*
// ═══════════════════════════════════════════════════════════════════════════

export const InterestedQuerySchema = z.object({
    min_score: z.coerce.number().min(0).max(1).default(0.5),
})

export type InterestedQuery = z.infer<typeof InterestedQuerySchema>

export const SubjectParamsSchema = z.object({
    subjectId: z.string().trim().min(1),
})

export const ProfileParamsSchema = z.object({
    profileId: z.string().trim().min(1),
})

export const LookupParamsSchema = z.object({
    lookupKey: z.string().trim().min(1),
})

// ═══════════════════════════════════════════════════════════════════════════
// 3. CLI: batch window arguments
// ═══════════════════════════════════════════════════════════════════════════

export const IsoDateSchema = z.string().trim().min(1).transform((value, ctx) => {
    const date = new Date(value)
    if (Number.isNaN(date.getTime())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` })
        return z.NEVER
    }
    return date
})
