/**
 * Error taxonomy for the affinity engine.
 *
 * Every error the engine raises on purpose extends AppError so the HTTP layer
 * and the CLI can map it to a status code and a safe message without leaking
 * query text or stack traces.
 */

export interface SafeErrorDetails {
  code: string
  message: string
  statusCode: number
}

export class AppError extends Error {
  readonly code: string
  readonly statusCode: number
  readonly isOperational: boolean
  readonly retryable: boolean

  constructor(message: string, code: string, statusCode = 500, options: { cause?: unknown; retryable?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'AppError'
    this.code = code
    this.statusCode = statusCode
    this.isOperational = true
    this.retryable = options.retryable ?? false
    Error.captureStackTrace(this, this.constructor)
  }

  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    }
  }
}

/** Tenant, cohort or profile could not be resolved. Not retried automatically. */
export class NotFoundError extends AppError {
  readonly resource: string

  constructor(resource: string, identifier: string) {
    super(`${resource} '${identifier}' not found`, 'NOT_FOUND', 404)
    this.name = 'NotFoundError'
    this.resource = resource
  }
}

export class ValidationError extends AppError {
  readonly details: unknown

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400)
    this.name = 'ValidationError'
    this.details = details
  }
}

/** Event store query failed. Aggregation precedes any write, so a retry is always safe. */
export class AggregationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'AGGREGATION_ERROR', 502, { cause, retryable: true })
    this.name = 'AggregationError'
  }
}

export class PersistenceError extends AppError {
  readonly operation: string

  constructor(operation: string, cause?: unknown) {
    super(`Affinity store ${operation} failed`, 'PERSISTENCE_ERROR', 500, { cause })
    this.name = 'PersistenceError'
    this.operation = operation
  }
}

/** Raised after the batch transaction has been rolled back. */
export class BatchFailure extends AppError {
  readonly tenantName: string

  constructor(tenantName: string, cause: unknown) {
    super(`Batch update for tenant '${tenantName}' failed and was rolled back`, 'BATCH_FAILURE', 500, { cause })
    this.name = 'BatchFailure'
    this.tenantName = tenantName
  }
}

export class BatchInProgressError extends AppError {
  constructor(tenantId: string) {
    super(`Another batch update is running for tenant ${tenantId}`, 'BATCH_IN_PROGRESS', 409)
    this.name = 'BatchInProgressError'
  }
}

/**
 * A score or predicted event fell outside every branch of a decision table.
 * This is a defect in the tables, never a condition to default around.
 */
export class DecisionTableGapError extends AppError {
  readonly table: 'predictive' | 'prescriptive'
  readonly input: unknown

  constructor(table: 'predictive' | 'prescriptive', input: unknown) {
    super(`No ${table} rule matches input ${JSON.stringify(input)}`, 'DECISION_TABLE_GAP', 500)
    this.name = 'DecisionTableGapError'
    this.table = table
    this.input = input
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}
