/**
 * Normalization of agent payloads.
 *
 * Agents drift in how they shape their answers: confidence arrives as a
 * number, a numeric string or `{ overall: n }`; file lists come under
 * `files_changed` or `files_modified`; verdicts come in several spellings.
 * The schemas below accept that union and emit one canonical shape, so
 * nothing past the agent boundary sees the variants.
 */

import { z } from 'zod'
import { isPlainObject } from '../../utils/helpers.js'
import type { StructuredPayload } from '../result-extractor/result-extractor.js'
import type { FixPayload, ResearchPayload, ReviewPayload, ReviewVerdict, TriagePayload } from './types.js'

/** Confidence used when the agent reports none, or nothing usable */
export const DEFAULT_CONFIDENCE = 0.5

// ---------------------------------------------------------------------------
// Scalar coercions
// ---------------------------------------------------------------------------

/**
 * Resolve a confidence value to a number in [0, 1].
 *
 * Idempotent: `normalizeConfidence(normalizeConfidence(x)) === normalizeConfidence(x)`,
 * and `0.7` and `{ overall: 0.7 }` both resolve to `0.7`.
 */
export function normalizeConfidence(value: unknown, fallback = DEFAULT_CONFIDENCE): number {
  let numeric: number | null = null
  if (typeof value === 'number') {
    numeric = value
  } else if (typeof value === 'string' && value.trim() !== '') {
    numeric = Number(value)
  } else if (isPlainObject(value) && 'overall' in value) {
    return normalizeConfidence(value.overall, fallback)
  }

  if (numeric === null || !Number.isFinite(numeric)) return fallback
  return Math.min(1, Math.max(0, numeric))
}

/**
 * Flatten a value into display text. Objects with a `description` use it;
 * other objects become `key: value` pairs.
 */
function toText(val: unknown): string {
  if (val === undefined || val === null) return ''
  if (typeof val === 'string') return val
  if (isPlainObject(val)) {
    if (typeof val.description === 'string') return val.description
    return Object.entries(val)
      .map(([k, v]) => `${k}: ${typeof v === 'string' ? v : JSON.stringify(v)}`)
      .join(', ')
  }
  if (Array.isArray(val)) return val.map(toText).join(', ')
  return String(val)
}

function toStringList(val: unknown): string[] {
  if (val === undefined || val === null) return []
  const items = Array.isArray(val) ? val : [val]
  return items.map(toText).map((s) => s.trim()).filter((s) => s !== '')
}

const VERDICT_ALIASES: Record<string, ReviewVerdict> = {
  APPROVE: 'APPROVE',
  APPROVED: 'APPROVE',
  LGTM: 'APPROVE',
  REQUEST_CHANGES: 'REQUEST_CHANGES',
  CHANGES_REQUESTED: 'REQUEST_CHANGES',
  NEEDS_CHANGES: 'REQUEST_CHANGES',
  BLOCK: 'BLOCK',
  BLOCKED: 'BLOCK',
  REJECT: 'BLOCK',
}

/** Uppercase a label and turn spaces and hyphens into underscores */
function toLabel(val: unknown): unknown {
  return typeof val === 'string' ? val.trim().toUpperCase().replace(/[\s-]+/g, '_') : val
}

// ---------------------------------------------------------------------------
// Field schemas
// ---------------------------------------------------------------------------

const confidenceField = z.preprocess((val) => normalizeConfidence(val), z.number().min(0).max(1))

const textField = z.preprocess(toText, z.string())

const stringListField = z.preprocess(toStringList, z.array(z.string()))

const fixAppliedField = z.preprocess((val) => {
  if (typeof val === 'boolean') return val
  if (val === 'true') return true
  if (val === 'false') return false
  return null
}, z.boolean().nullable())

const verdictField = z.preprocess((val) => {
  const label = toLabel(val)
  return typeof label === 'string' ? (VERDICT_ALIASES[label] ?? label) : label
}, z.enum(['APPROVE', 'REQUEST_CHANGES', 'BLOCK']))

// ---------------------------------------------------------------------------
// Stage schemas
// ---------------------------------------------------------------------------

export const TriageResultSchema = z.object({
  classification: z.preprocess(toLabel, z.string().min(1)),
  confidence: confidenceField,
  summary: textField,
  reasoning: textField,
  risks: stringListField,
  suggested_approach: textField,
  questions_if_unclear: stringListField,
})

export const ResearchResultSchema = z.object({
  root_cause: textField,
  proposed_fix: textField,
  affected_areas: stringListField,
  files_analyzed: stringListField,
  test_strategy: textField,
  patterns_to_follow: stringListField,
  summary: textField,
  confidence: confidenceField,
})

export const FixResultSchema = z.object({
  confidence: confidenceField,
  files_changed: stringListField,
  files_modified: stringListField,
  summary: textField,
  tests_added: stringListField,
  caveats: stringListField,
  testing_notes: stringListField,
  fix_applied: fixAppliedField,
})

export const ReviewResultSchema = z.object({
  verdict: verdictField,
  confidence: confidenceField,
  concerns: stringListField,
  suggestions: stringListField,
  summary: textField,
})

// ---------------------------------------------------------------------------
// Normalizers
// ---------------------------------------------------------------------------

/** Returns null when the classification is missing or not a string */
export function normalizeTriage(raw: StructuredPayload): TriagePayload | null {
  const parsed = TriageResultSchema.safeParse(raw)
  if (!parsed.success) return null
  return { ...parsed.data, full_analysis: raw }
}

export function normalizeResearch(raw: StructuredPayload): ResearchPayload | null {
  const parsed = ResearchResultSchema.safeParse(raw)
  if (!parsed.success) return null
  return { ...parsed.data, full_analysis: raw }
}

/** Merges `files_changed` and `files_modified` into one ordered, de-duplicated list */
export function normalizeFix(raw: StructuredPayload): FixPayload | null {
  const parsed = FixResultSchema.safeParse(raw)
  if (!parsed.success) return null
  const { files_changed, files_modified, ...rest } = parsed.data
  return {
    ...rest,
    files_changed: [...new Set([...files_changed, ...files_modified])],
    full_result: raw,
  }
}

/** Returns null when the verdict cannot be mapped to APPROVE, REQUEST_CHANGES or BLOCK */
export function normalizeReview(raw: StructuredPayload): ReviewPayload | null {
  const parsed = ReviewResultSchema.safeParse(raw)
  if (!parsed.success) return null
  return { ...parsed.data, full_review: raw }
}
