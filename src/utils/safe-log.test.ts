import { afterEach, describe, expect, it, vi } from 'vitest'
import { PersistenceError } from '../errors.js'
import { safeError } from './safe-log.js'

describe('safeError', () => {
    afterEach(() => {
        vi.unstubAllEnvs()
    })

    it('passes errors through outside production', () => {
        vi.stubEnv('NODE_ENV', 'test')
        const err = new Error('boom')
        expect(safeError(err)).toBe(err)
    })

    it('keeps only name, message and code in production', () => {
        vi.stubEnv('NODE_ENV', 'production')
        const pgErr = Object.assign(new Error('duplicate key'), { code: '23505', detail: 'Key (profile_id)=(p1)' })

        expect(safeError(pgErr)).toEqual({ name: 'Error', message: 'duplicate key', code: '23505' })
        expect(safeError(new PersistenceError('upsert'))).toEqual({
            name: 'PersistenceError',
            message: 'Affinity store upsert failed',
            code: 'PERSISTENCE_ERROR',
        })
        expect(safeError({ reason: 'x' })).toBe('[non-Error thrown]')
    })
})
