/**
 * PostgreSQL pools for the affinity store and the event store.
 *
 * The two stores may live in different databases (EVENT_DATABASE_URL), so
 * each gets its own pool. When both URLs match the event pool is the
 * affinity pool.
 */

import { Pool } from 'pg'
import type { PoolConfig, QueryResult, QueryResultRow } from 'pg'

/** Anything that can run a parameterized query: a Pool or a checked-out client. */
export interface DatabaseClient {
  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<T>>
}

export interface TransactionalClient extends DatabaseClient {
  release(err?: Error | boolean): void
}

export interface DatabasePool extends DatabaseClient {
  connect(): Promise<TransactionalClient>
  end(): Promise<void>
}

export interface DatabaseOptions {
  caCert?: string
  production?: boolean
  max?: number
}

let pool: Pool | null = null
let eventPool: Pool | null = null

function cleanConnectionString(databaseUrl: string): string {
  // sslmode in the URL overrides the explicit ssl option below; strip it.
  return databaseUrl.replace(/[?&]sslmode=[^&]*/g, '').replace(/\?$/, '')
}

export function buildPoolConfig(databaseUrl: string, options: DatabaseOptions = {}): PoolConfig {
  return {
    connectionString: cleanConnectionString(databaseUrl),
    max: options.max ?? 10,
    idleTimeoutMillis: 30000,
    ssl: options.production
      ? {
        ca: options.caCert ? Buffer.from(options.caCert, 'base64').toString() : undefined,
        rejectUnauthorized: !!options.caCert,
      }
      : {
        rejectUnauthorized: false,
      },
  }
}

export function initDatabase(databaseUrl: string, eventDatabaseUrl = databaseUrl, options: DatabaseOptions = {}): void {
  pool = new Pool(buildPoolConfig(databaseUrl, options))
  eventPool = eventDatabaseUrl === databaseUrl
    ? pool
    : new Pool(buildPoolConfig(eventDatabaseUrl, { ...options, max: options.max ?? 5 }))
}

export function getPool(): DatabasePool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.')
  }
  return pool
}

export function getEventPool(): DatabaseClient {
  if (!eventPool) {
    throw new Error('Event store not initialized. Call initDatabase() first.')
  }
  return eventPool
}

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * transaction back and is rethrown unchanged.
 */
export async function withTransaction<T>(
  db: DatabasePool,
  work: (client: DatabaseClient) => Promise<T>
): Promise<T> {
  const client = await db.connect()
  try {
    await client.query('BEGIN')
    const result = await work(client)
    await client.query('COMMIT')
    return result
  } catch (err) {
    try {
      await client.query('ROLLBACK')
    } catch (rollbackErr) {
      console.error('[db] Rollback failed:', rollbackErr)
    }
    throw err
  } finally {
    client.release()
  }
}

export async function closeDatabase(): Promise<void> {
  const closing: Promise<void>[] = []
  if (eventPool && eventPool !== pool) closing.push(eventPool.end())
  if (pool) closing.push(pool.end())
  await Promise.all(closing)
  pool = null
  eventPool = null
}
