/**
 * Types for the pipeline state machine and its persisted snapshot.
 */

import { z } from 'zod'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { ConfidenceWeights, Issue, PipelineStatus, StageRole } from '../../core/types.js'
import type { StageAgents } from '../agents/index.js'
import type { AgentState, DiffSource, FixPayload, StageStates } from '../agents/types.js'
import type { PromptLibrary } from '../prompts/prompt-library.js'
import type { RunStore } from './run-store.js'

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export type ConfidenceBreakdown = Partial<Record<StageRole, number>>

/**
 * The persisted view of one pipeline run (`pipeline.state.json`).
 *
 * `completed_at` is set iff the status is terminal; `aggregate_confidence`
 * iff the status is SUCCESS.
 */
export interface PipelineSnapshot {
  status: PipelineStatus
  issue_number: number
  /** Artifact name of the agent in flight, or null between stages */
  current_agent: string | null
  /** Stage markers in completion order, e.g. `fix`, `review:skipped`, `fix-revision-2` */
  agents_completed: string[]
  failure_reason: string | null
  /** Fix attempts made so far */
  iterations: number
  aggregate_confidence: number | null
  confidence_breakdown: ConfidenceBreakdown
  started_at: string
  completed_at: string | null
  duration_seconds?: number
}

const stageConfidence = z.number().min(0).max(1).optional()

/** Validates a snapshot read back from disk */
export const PipelineSnapshotSchema = z.object({
  status: z.enum(['RUNNING', 'SUCCESS', 'SKIPPED', 'FAILED', 'BLOCKED']),
  issue_number: z.number().int(),
  current_agent: z.string().nullable(),
  agents_completed: z.array(z.string()),
  failure_reason: z.string().nullable(),
  iterations: z.number().int().nonnegative(),
  aggregate_confidence: z.number().nullable(),
  confidence_breakdown: z.object({
    triage: stageConfidence,
    research: stageConfidence,
    fix: stageConfidence,
    review: stageConfidence,
  }),
  started_at: z.string(),
  completed_at: z.string().nullable(),
  duration_seconds: z.number().optional(),
})

// ---------------------------------------------------------------------------
// Configuration and dependencies
// ---------------------------------------------------------------------------

export interface PipelineConfig {
  weights: ConfidenceWeights
  /** Upper bound on fix-review iterations (>= 1) */
  maxIterations: number
  /** Repository checkout the agents work in */
  workingDir: string
  promptsDir: string
  /** Per-stage wall-clock bound in milliseconds */
  timeouts: Readonly<Record<StageRole, number>>
}

export interface PipelineDeps {
  agents: StageAgents
  store: RunStore
  diffSource: DiffSource
  config: PipelineConfig
  /** Defaults to a library over `config.promptsDir` */
  prompts?: PromptLibrary
  eventBus?: TypedEventBus
  now?: () => Date
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export interface PipelineResult {
  /** The terminal snapshot, as written to disk */
  snapshot: Readonly<PipelineSnapshot>
  /** Latest state per role; the fix entry is the most recent revision */
  agentStates: StageStates
  /** Every revision attempt (iterations >= 2), in order */
  revisions: ReadonlyArray<AgentState<FixPayload>>
}

export interface Pipeline {
  /**
   * Drive one issue through triage, research and the fix-review loop.
   * Stage failures become a terminal status; only infrastructure errors
   * (such as a failed state write) reject.
   */
  run(issue: Issue): Promise<PipelineResult>
}
