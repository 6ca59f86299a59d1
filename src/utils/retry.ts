/**
 * Retry Utility
 *
 * Wraps store calls that are safe to repeat (event-store aggregation) with
 * exponential backoff. Retries on errors flagged `retryable`, on transient
 * PostgreSQL conditions (serialization failure, deadlock, connection loss,
 * shutdown) and on network-level errors (ECONNRESET, ETIMEDOUT).
 *
 * Config:
 *   maxRetries: 2  (3 total attempts)
 *   baseDelayMs: 500
 *   maxDelayMs: 5000
 *
 * Usage:
 *   const pairs = await withRetry(() => aggregator.aggregate(query), 'aggregate')
 */

import { isAppError } from '../errors.js'

// 40001 serialization_failure, 40P01 deadlock_detected, 57P01 admin_shutdown,
// 08xxx connection exceptions
const RETRYABLE_PG_CODES = new Set(['40001', '40P01', '57P01', '08000', '08003', '08006'])
const RETRYABLE_MESSAGES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'Connection terminated', 'socket hang up']

export interface RetryOptions {
    maxRetries?: number
    baseDelayMs?: number
    maxDelayMs?: number
}

function errorCode(err: unknown): string | undefined {
    if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
        return err.code
    }
    return undefined
}

export function isRetryable(err: unknown): boolean {
    if (isAppError(err)) {
        if (!err.retryable) return false
        // Retryable wrapper around a cause we know is permanent (bad SQL, missing table).
        const causeCode = errorCode(err.cause)
        return causeCode === undefined || !/^42/.test(causeCode)
    }
    const code = errorCode(err)
    if (code && RETRYABLE_PG_CODES.has(code)) return true
    if (err instanceof Error) {
        return RETRYABLE_MESSAGES.some(fragment => err.message.includes(fragment))
    }
    return false
}

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Retry an idempotent async call with exponential backoff.
 *
 * @param label Short label for log lines (e.g. 'aggregate')
 */
export async function withRetry<T>(fn: () => Promise<T>, label: string, options: RetryOptions = {}): Promise<T> {
    const maxRetries = options.maxRetries ?? 2
    const baseDelayMs = options.baseDelayMs ?? 500
    const maxDelayMs = options.maxDelayMs ?? 5000
    let lastErr: unknown

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
        try {
            return await fn()
        } catch (err) {
            lastErr = err

            if (attempt === maxRetries || !isRetryable(err)) {
                throw err
            }

            const waitMs = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs)
            console.warn(
                `[retry] ${label} attempt ${attempt + 1}/${maxRetries} failed` +
                ` (${errorCode(err) ?? (err instanceof Error ? err.name : 'error')}), retrying in ${waitMs}ms`
            )
            await delay(waitMs)
        }
    }

    throw lastErr
}
