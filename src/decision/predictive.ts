/**
 * Predictive Engine (Next Likely Action)
 *
 * Deterministic table over (interest score, personas). Every score in [0, 1)
 * lands in exactly one tier; anything else is a table gap and throws.
 */

import { DecisionTableGapError } from '../errors.js'
import { DEFAULT_THRESHOLDS, HIGH_FREQUENCY_PERSONA, PREDICTION_PROBABILITY } from './constants.js'
import type { IntentTier, Prediction, PredictionThresholds } from './types.js'

function normalizePersona(name: string): string {
  return name.trim().toLowerCase()
}

export function hasPersona(personas: Iterable<string>, persona: string): boolean {
  const wanted = normalizePersona(persona)
  for (const name of personas) {
    if (normalizePersona(name) === wanted) return true
  }
  return false
}

export function classifyScore(score: number, thresholds: PredictionThresholds = DEFAULT_THRESHOLDS): IntentTier {
  if (!Number.isFinite(score) || score < 0 || score >= 1) {
    throw new DecisionTableGapError('predictive', { score })
  }
  if (score >= thresholds.hot) return 'hot'
  if (score >= thresholds.warm) return 'warm'
  return 'cold'
}

export function predictUserEvent(
  score: number,
  personas: Iterable<string> = [],
  thresholds: PredictionThresholds = DEFAULT_THRESHOLDS
): Prediction {
  const tier = classifyScore(score, thresholds)

  switch (tier) {
    case 'hot':
      if (hasPersona(personas, HIGH_FREQUENCY_PERSONA)) {
        return {
          predictedEvent: 'order-created',
          probability: score >= thresholds.peak
            ? PREDICTION_PROBABILITY.executionPeak
            : PREDICTION_PROBABILITY.execution,
        }
      }
      return { predictedEvent: 'subject-view', probability: PREDICTION_PROBABILITY.research }
    case 'warm':
      return {
        predictedEvent: 'watchlist-add',
        probability: score >= thresholds.warmUpper
          ? PREDICTION_PROBABILITY.monitoringHigh
          : PREDICTION_PROBABILITY.monitoring,
      }
    case 'cold':
      return { predictedEvent: 'ignore-content', probability: PREDICTION_PROBABILITY.disengagement }
    default: {
      const unreachable: never = tier
      throw new DecisionTableGapError('predictive', { score, tier: unreachable })
    }
  }
}
