import { PgEventAggregator } from '../affinity/aggregator.js'
import type { AppConfig } from '../config.js'
import { getEventPool, getPool } from '../store/database.js'
import { AffinityOrchestrator } from './orchestrator.js'

export { AffinityOrchestrator } from './orchestrator.js'
export type { BatchOptions, OrchestratorDeps } from './orchestrator.js'
export type { DecisionView, PredictionView, ProfileAffinity } from './types.js'

/** Wire the orchestrator to the pools opened by initDatabase(). */
export function createOrchestrator(config: Pick<AppConfig, 'halfLifeDays' | 'gcThreshold'>): AffinityOrchestrator {
  return new AffinityOrchestrator({
    pool: getPool(),
    aggregator: new PgEventAggregator(getEventPool()),
    halfLifeDays: config.halfLifeDays,
    gcThreshold: config.gcThreshold,
  })
}
