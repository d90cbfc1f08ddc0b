/**
 * Zod validation schemas for the autofix configuration.
 *
 * Sections:
 *  - repository settings (top-level keys)
 *  - agent process settings
 *  - per-stage timeouts
 *  - pipeline loop and confidence weights
 *  - triage and issue-quality thresholds
 */

import { z } from 'zod'
import { STAGE_ROLES } from '../../core/types.js'
import { WEIGHT_SUM_TOLERANCE } from '../pipeline/confidence.js'

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

const unitInterval = z.number().min(0).max(1)

/** `owner/name` */
const RepoSlugSchema = z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'expected owner/name')

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const AgentSettingsSchema = z
  .object({
    /** Agent CLI binary, resolved through PATH */
    binary: z.string().min(1),
    model: z.string().min(1).optional(),
  })
  .strict()

export type AgentSettings = z.infer<typeof AgentSettingsSchema>

/** Per-stage wall-clock bounds, in seconds */
export const TimeoutsSchema = z
  .object({
    triage: z.number().positive(),
    research: z.number().positive(),
    fix: z.number().positive(),
    review: z.number().positive(),
  })
  .strict()

export type TimeoutSettings = z.infer<typeof TimeoutsSchema>

export const WeightsSchema = z
  .object({
    triage: unitInterval,
    research: unitInterval,
    fix: unitInterval,
    review: unitInterval,
  })
  .strict()

export const PipelineSettingsSchema = z
  .object({
    max_iterations: z.number().int().min(1).max(10),
    weights: WeightsSchema,
  })
  .strict()

export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>

export const TriageSettingsSchema = z
  .object({
    min_confidence: unitInterval,
  })
  .strict()

export const IssueQualitySchema = z
  .object({
    /** Bodies shorter than this are treated as too vague to attempt */
    min_body_chars: z.number().int().min(0),
    min_words: z.number().int().min(0),
  })
  .strict()

export type IssueQualitySettings = z.infer<typeof IssueQualitySchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

const AutofixConfigObjectSchema = z
  .object({
    /** Repository checkout the agents work in */
    project_dir: z.string().min(1),
    repo: RepoSlugSchema.optional(),
    base_branch: z.string().min(1),
    remote: z.string().min(1),
    /** Work branches are `<branch_prefix><issue number>` */
    branch_prefix: z.string().min(1),
    runs_dir: z.string().min(1),
    prompts_dir: z.string().min(1),
    log_level: LogLevelSchema,
    agent: AgentSettingsSchema,
    timeouts: TimeoutsSchema,
    pipeline: PipelineSettingsSchema,
    triage: TriageSettingsSchema,
    issue_quality: IssueQualitySchema,
  })
  .strict()

export const AutofixConfigSchema = AutofixConfigObjectSchema.superRefine((config, ctx) => {
  const weights = config.pipeline.weights
  const sum = STAGE_ROLES.reduce((acc, role) => acc + weights[role], 0)
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['pipeline', 'weights'],
      message: `weights must sum to 1 (got ${String(Math.round(sum * 1e6) / 1e6)})`,
    })
  }
})

export type AutofixConfig = z.infer<typeof AutofixConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env and CLI overlays before merging)
// ---------------------------------------------------------------------------

export const PartialAutofixConfigSchema = AutofixConfigObjectSchema.extend({
  agent: AgentSettingsSchema.partial(),
  timeouts: TimeoutsSchema.partial(),
  pipeline: PipelineSettingsSchema.extend({ weights: WeightsSchema.partial() }).partial(),
  triage: TriageSettingsSchema.partial(),
  issue_quality: IssueQualitySchema.partial(),
})
  .strict()
  .partial()

export type PartialAutofixConfig = z.infer<typeof PartialAutofixConfigSchema>
