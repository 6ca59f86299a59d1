import type { ScoringContext } from './types.js'

/** Raw points at which interest reaches 0.5. Shared by every subject so scores compare. */
export const SCORING_K_FACTOR = 100

export const DECAY_HALF_LIFE_DAYS = 7

export const MS_PER_DAY = 1000 * 60 * 60 * 24

/** Records whose interest score decays below this are removed by the garbage collector. */
export const GC_SCORE_THRESHOLD = 0.05

export const AUDIENCE_PAGE_SIZE = 50

// raw / (raw + K) rounds to exactly 1 for very large raw scores; cap just below it.
export const MAX_INTEREST_SCORE = 1 - Number.EPSILON

export const DEFAULT_SCORING_CONTEXT: ScoringContext = {
  contextMapId: 'default',
  contextStageId: 'default',
  modelId: 'interest-decay-v1',
}
