/**
 * Recommendation API: read-only REST endpoints over the affinity engine
 *
 * Registers under /recommendation/* on the Fastify server. Every response is
 * either a complete object or an explicit empty one; failures map to a safe
 * error body and never to a partial decision.
 *
 * Tenant comes from the `x-tenant-name` header, falling back to TARGET_TENANT.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import type { z } from 'zod'
import { ValidationError, isAppError } from '../errors.js'
import type { IdentityResolver } from '../identity.js'
import type { AffinityOrchestrator } from '../orchestrator/orchestrator.js'
import { safeError } from '../utils/safe-log.js'
import {
    InterestedQuerySchema,
    LookupParamsSchema,
    ProfileParamsSchema,
    SubjectParamsSchema,
} from '../types/schemas.js'

export interface RecommendationRouteDeps {
    orchestrator: AffinityOrchestrator
    resolver: IdentityResolver
    defaultTenant: string
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
    const result = schema.safeParse(value)
    if (!result.success) {
        throw new ValidationError(`Invalid ${what}`, result.error.issues)
    }
    return result.data
}

function tenantName(req: FastifyRequest, fallback: string): string {
    const header = req.headers['x-tenant-name']
    const value = Array.isArray(header) ? header[0] : header
    return value?.trim() || fallback
}

function sendError(req: FastifyRequest, reply: FastifyReply, err: unknown, label: string): FastifyReply {
    if (isAppError(err) && err.statusCode < 500) {
        return reply.code(err.statusCode).send(err.toSafeError())
    }
    req.log.error({ err: safeError(err) }, `${label} failed`)
    return reply.code(500).send({ code: 'INTERNAL_ERROR', message: `Failed to ${label}`, statusCode: 500 })
}

// ─── Routes ─────────────────────────────────────────────────────────────────

export async function registerRecommendationRoutes(
    server: FastifyInstance,
    deps: RecommendationRouteDeps
): Promise<void> {
    const { orchestrator, resolver, defaultTenant } = deps

    // 1. Audience: who is interested in this subject?
    server.get('/recommendation/interested/:subjectId', async (req, reply) => {
        try {
            const { subjectId } = parseOrThrow(SubjectParamsSchema, req.params, 'subject')
            const { min_score } = parseOrThrow(InterestedQuerySchema, req.query, 'query')
            const tenantId = await resolver.resolveTenant(tenantName(req, defaultTenant))
            return await orchestrator.findInterested(tenantId, subjectId, min_score)
        } catch (err) {
            return sendError(req, reply, err, 'find interested profiles')
        }
    })

    // 2. Next Best Action per subject (prescriptive)
    server.get('/recommendation/nba/:profileId', async (req, reply) => {
        try {
            const { profileId } = parseOrThrow(ProfileParamsSchema, req.params, 'profile')
            const tenantId = await resolver.resolveTenant(tenantName(req, defaultTenant))
            const nextBestActions = await orchestrator.getDecisions(tenantId, profileId)
            return { profileId, nextBestActions }
        } catch (err) {
            return sendError(req, reply, err, 'compute next best actions')
        }
    })

    // 3. Next Likely Action per subject (predictive)
    server.get('/recommendation/nla/:profileId', async (req, reply) => {
        try {
            const { profileId } = parseOrThrow(ProfileParamsSchema, req.params, 'profile')
            const tenantId = await resolver.resolveTenant(tenantName(req, defaultTenant))
            const nextLikelyActions = await orchestrator.getPredictions(tenantId, profileId)
            return { profileId, nextLikelyActions }
        } catch (err) {
            return sendError(req, reply, err, 'compute next likely actions')
        }
    })

    // 4. Profile 360: identity plus scores per subject
    server.get('/recommendation/profile-affinity/:lookupKey', async (req, reply) => {
        try {
            const { lookupKey } = parseOrThrow(LookupParamsSchema, req.params, 'lookup key')
            const tenantId = await resolver.resolveTenant(tenantName(req, defaultTenant))
            const affinity = await orchestrator.getProfileAffinity(tenantId, lookupKey)
            return affinity ?? {
                profileId: null,
                identities: [],
                primaryEmail: null,
                rawScores: {},
                interestScores: {},
                nextLikelyActions: {},
                segments: [],
            }
        } catch (err) {
            return sendError(req, reply, err, 'load profile affinity')
        }
    })
}
