/**
 * Error values for log lines.
 * Outside production the error is logged as-is. In production only name,
 * message and an error code survive: pg errors carry query text, bind values
 * and stack traces that must not reach forwarded logs.
 */

export interface SafeLogEntry {
  name: string
  message: string
  code?: string
}

function codeOf(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined
}

export function safeError(error: unknown): unknown {
  if (process.env.NODE_ENV !== 'production') {
    return error
  }

  if (error instanceof Error) {
    const entry: SafeLogEntry = { name: error.name, message: error.message }
    const code = codeOf(error)
    if (code) entry.code = code
    return entry
  }

  return typeof error === 'string' ? error : '[non-Error thrown]'
}
