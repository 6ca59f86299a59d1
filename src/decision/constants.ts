import type { PredictionThresholds } from './types.js'

/** Persona that tips hot interest toward execution rather than research. */
export const HIGH_FREQUENCY_PERSONA = 'High-Frequency Actors'

/**
 * Canonical score bands. Earlier rule tables drifted between 0.1, 0.3 and
 * 0.5 boundaries; these are the only ones in use.
 */
export const DEFAULT_THRESHOLDS: PredictionThresholds = {
  hot: 0.5,
  warm: 0.1,
  peak: 0.9,
  warmUpper: 0.3,
}

export const PREDICTION_PROBABILITY = {
  executionPeak: 0.95,
  execution: 0.9,
  research: 0.85,
  monitoringHigh: 0.7,
  monitoring: 0.6,
  disengagement: 0.9,
} as const

export const PRESCRIPTION_CONFIDENCE = {
  strongNudge: 0.95,
  supportingContent: 0.85,
  watchlistSuggestion: 0.6,
  wait: 0,
} as const
