import type { DeliveryChannel, PredictedEvent, SystemAction } from '../decision/types.js'

/** Next Best Action for one subject, as served by the read path. */
export interface DecisionView {
  action: SystemAction
  channel: DeliveryChannel
  confidence: number
  reason: string
}

/** Next Likely Action for one subject. */
export interface PredictionView {
  predictedEvent: PredictedEvent
  probability: number
}

export interface ProfileAffinity {
  profileId: string
  identities: string[]
  primaryEmail: string | null
  rawScores: Record<string, number>
  interestScores: Record<string, number>
  nextLikelyActions: Record<string, PredictedEvent>
  segments: string[]
}
