/**
 * Prescriptive Engine (Next Best Action)
 *
 * Maps a predicted user event onto the system's intervention. Persona plays
 * no part here; it already shaped the prediction.
 */

import { DecisionTableGapError } from '../errors.js'
import { PRESCRIPTION_CONFIDENCE } from './constants.js'
import type { PredictedEvent, Prescription } from './types.js'

export function recommendSystemAction(predictedEvent: PredictedEvent, score: number): Prescription {
  switch (predictedEvent) {
    case 'order-created':
      return {
        action: 'STRONG_INTENT_NUDGE',
        channel: 'PUSH_NOTIFICATION',
        confidence: PRESCRIPTION_CONFIDENCE.strongNudge,
        reason: 'High intent detected. Nudge to execute.',
      }
    case 'subject-view':
      return {
        action: 'SEND_SUPPORTING_CONTENT',
        channel: 'EMAIL_DIGEST',
        confidence: PRESCRIPTION_CONFIDENCE.supportingContent,
        reason: 'Interested but still researching. Send supporting content.',
      }
    case 'watchlist-add':
      return {
        action: 'WATCHLIST_SUGGESTION',
        channel: 'IN_APP_BANNER',
        confidence: PRESCRIPTION_CONFIDENCE.watchlistSuggestion,
        reason: 'In consideration. Suggest monitoring.',
      }
    case 'ignore-content':
      return {
        action: 'WAIT',
        channel: 'NONE',
        confidence: PRESCRIPTION_CONFIDENCE.wait,
        reason: `Score (${score.toFixed(2)}) is too low for intervention.`,
      }
    default: {
      const unreachable: never = predictedEvent
      throw new DecisionTableGapError('prescriptive', { predictedEvent: unreachable })
    }
  }
}
