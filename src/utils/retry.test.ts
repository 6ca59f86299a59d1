/**
 * Tests for the store retry utility
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { AggregationError, NotFoundError } from '../errors.js'
import { isRetryable, withRetry } from './retry.js'

describe('withRetry', () => {
    beforeEach(() => {
        vi.useFakeTimers()
        vi.spyOn(console, 'warn').mockImplementation(() => {})
    })

    afterEach(() => {
        vi.useRealTimers()
        vi.restoreAllMocks()
    })

    it('returns result immediately on success', async () => {
        const fn = vi.fn().mockResolvedValue('ok')
        const result = await withRetry(fn, 'test')
        expect(result).toBe('ok')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('retries an aggregation failure and succeeds on second attempt', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new AggregationError('query failed', new Error('ECONNRESET')))
            .mockResolvedValueOnce(['pair'])

        const promise = withRetry(fn, 'aggregate')
        await vi.runAllTimersAsync()

        expect(await promise).toEqual(['pair'])
        expect(fn).toHaveBeenCalledTimes(2)
        expect(console.warn).toHaveBeenCalledWith(
            '[retry] aggregate attempt 1/2 failed (AGGREGATION_ERROR), retrying in 500ms'
        )
    })

    it('gives up after maxRetries and rethrows the last error', async () => {
        const deadlock = Object.assign(new Error('deadlock detected'), { code: '40P01' })
        const fn = vi.fn().mockRejectedValue(deadlock)

        const promise = withRetry(fn, 'aggregate').catch(e => e)
        await vi.runAllTimersAsync()

        expect(await promise).toBe(deadlock)
        expect(fn).toHaveBeenCalledTimes(3) // 1 initial + 2 retries
    })

    it('does NOT retry a NotFoundError', async () => {
        const fn = vi.fn().mockRejectedValue(new NotFoundError('Tenant', 'ghost'))

        await expect(withRetry(fn, 'resolve')).rejects.toBeInstanceOf(NotFoundError)
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('caps the backoff at maxDelayMs', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new Error('ETIMEDOUT'))
            .mockRejectedValueOnce(new Error('ETIMEDOUT'))
            .mockResolvedValueOnce('ok')

        const promise = withRetry(fn, 'aggregate', { maxRetries: 2, baseDelayMs: 800, maxDelayMs: 1000 })
        await vi.runAllTimersAsync()

        expect(await promise).toBe('ok')
        expect(console.warn).toHaveBeenLastCalledWith(
            '[retry] aggregate attempt 2/2 failed (Error), retrying in 1000ms'
        )
    })
})

describe('isRetryable', () => {
    it('retries transient pg codes and network errors only', () => {
        expect(isRetryable(Object.assign(new Error('serialization'), { code: '40001' }))).toBe(true)
        expect(isRetryable(new Error('socket hang up'))).toBe(true)
        expect(isRetryable(Object.assign(new Error('syntax error'), { code: '42601' }))).toBe(false)
        expect(isRetryable('ECONNRESET')).toBe(false)
    })

    it('does not retry an aggregation error caused by bad SQL', () => {
        const cause = Object.assign(new Error('relation "event_metrics" does not exist'), { code: '42P01' })
        expect(isRetryable(new AggregationError('query failed', cause))).toBe(false)
    })
})
