/**
 * Weighted aggregate confidence over the four stage roles.
 */

import { STAGE_ROLES } from '../../core/types.js'
import type { ConfidenceWeights } from '../../core/types.js'
import type { ConfidenceBreakdown } from './types.js'

export const DEFAULT_CONFIDENCE_WEIGHTS: ConfidenceWeights = Object.freeze({
  triage: 0.15,
  research: 0.2,
  fix: 0.35,
  review: 0.3,
})

/** Allowed drift of the weight sum from 1 */
export const WEIGHT_SUM_TOLERANCE = 1e-6

export function weightsSumToOne(weights: ConfidenceWeights): boolean {
  const sum = STAGE_ROLES.reduce((acc, role) => acc + weights[role], 0)
  return Math.abs(sum - 1) <= WEIGHT_SUM_TOLERANCE
}

/**
 * Σ weight × confidence over the canonical roles, rounded to two decimals.
 * A role missing from the breakdown contributes 0.
 *
 * Rounds to nearest on a ×100 scale with ties going down (`0.795 → 0.79`).
 * The epsilon keeps a tie that computes as 79.5000001 on the lower side.
 */
export function computeAggregateConfidence(weights: ConfidenceWeights, breakdown: ConfidenceBreakdown): number {
  let total = 0
  for (const role of STAGE_ROLES) {
    total += weights[role] * (breakdown[role] ?? 0)
  }
  return Math.max(0, Math.ceil(total * 100 - 0.5 - 1e-9) / 100)
}
