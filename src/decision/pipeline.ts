import { predictUserEvent } from './predictive.js'
import { recommendSystemAction } from './prescriptive.js'
import type { Decision, PredictionThresholds } from './types.js'

/** Predict what the profile will do, then prescribe what the system should do. */
export function decide(score: number, personas: Iterable<string>, thresholds?: PredictionThresholds): Decision {
  const prediction = predictUserEvent(score, personas, thresholds)
  const prescription = recommendSystemAction(prediction.predictedEvent, score)
  return { ...prediction, ...prescription }
}
