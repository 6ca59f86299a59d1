/**
 * Decision types for the two-stage pipeline:
 *   Predictive (Next Likely Action) → Prescriptive (Next Best Action)
 */

export const PREDICTED_EVENTS = ['order-created', 'subject-view', 'watchlist-add', 'ignore-content'] as const

export type PredictedEvent = typeof PREDICTED_EVENTS[number]

/** Interest band a score falls into. */
export type IntentTier = 'hot' | 'warm' | 'cold'

export type SystemAction =
  | 'STRONG_INTENT_NUDGE'      // execution is imminent: push to act
  | 'SEND_SUPPORTING_CONTENT'  // researching: send material, async
  | 'WATCHLIST_SUGGESTION'     // monitoring: lightweight in-product hint
  | 'WAIT'                     // explicit pass, not an error

export type DeliveryChannel = 'PUSH_NOTIFICATION' | 'EMAIL_DIGEST' | 'IN_APP_BANNER' | 'NONE'

export interface Prediction {
  predictedEvent: PredictedEvent
  probability: number
}

export interface Prescription {
  action: SystemAction
  channel: DeliveryChannel
  confidence: number
  reason: string
}

export interface Decision extends Prediction, Prescription {}

export interface PredictionThresholds {
  /** score >= hot: execution or research */
  hot: number
  /** warm <= score < hot: monitoring */
  warm: number
  /** hot scores at or above this get the boosted execution probability */
  peak: number
  /** warm scores at or above this get the higher monitoring probability */
  warmUpper: number
}
