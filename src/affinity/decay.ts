import { DECAY_HALF_LIFE_DAYS, MAX_INTEREST_SCORE, MS_PER_DAY, SCORING_K_FACTOR } from './constants.js'

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0
}

/** Whole and fractional days from `from` to `to`. Out-of-order timestamps clamp to zero. */
export function elapsedDays(from: Date, to: Date): number {
  const ageMs = to.getTime() - from.getTime()
  if (!Number.isFinite(ageMs)) return 0
  return Math.max(0, ageMs) / MS_PER_DAY
}

export function decayFactor(days: number, halfLifeDays = DECAY_HALF_LIFE_DAYS): number {
  if (!(halfLifeDays > 0)) {
    throw new RangeError(`halfLifeDays must be positive, got ${halfLifeDays}`)
  }
  return Math.pow(0.5, nonNegative(days) / halfLifeDays)
}

/** Project a raw score forward in time with no new points. */
export function decayRawScore(rawScore: number, from: Date, to: Date, halfLifeDays = DECAY_HALF_LIFE_DAYS): number {
  return nonNegative(rawScore) * decayFactor(elapsedDays(from, to), halfLifeDays)
}

/**
 * Fold an incoming aggregate into a prior raw score. With no prior record the
 * new raw score is the incoming score.
 */
export function computeNewRaw(
  priorRaw: number | null,
  priorTime: Date | null,
  incomingScore: number,
  incomingTime: Date,
  halfLifeDays = DECAY_HALF_LIFE_DAYS
): number {
  const incoming = nonNegative(incomingScore)
  if (priorRaw === null || priorTime === null) return incoming
  return decayRawScore(priorRaw, priorTime, incomingTime, halfLifeDays) + incoming
}

/** Map a raw score onto [0, 1) with diminishing returns: raw / (raw + K). */
export function normalizeInterest(rawScore: number, k = SCORING_K_FACTOR): number {
  const raw = nonNegative(rawScore)
  if (raw === 0) return 0
  return Math.min(raw / (raw + k), MAX_INTEREST_SCORE)
}
