/**
 * Core types shared across the pipeline, agents and the run coordinator.
 */

/** Canonical stage roles, in pipeline order */
export const STAGE_ROLES = ['triage', 'research', 'fix', 'review'] as const

/** One named step in the pipeline */
export type StageRole = (typeof STAGE_ROLES)[number]

/** Outcome of a single agent attempt */
export type AgentStatus = 'SUCCESS' | 'SKIPPED' | 'FAILED'

/** Overall status of a pipeline run */
export type PipelineStatus = 'RUNNING' | 'SUCCESS' | 'SKIPPED' | 'FAILED' | 'BLOCKED'

/** Pipeline statuses that end a run */
export type TerminalPipelineStatus = Exclude<PipelineStatus, 'RUNNING'>

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/**
 * An issue as fetched from the tracker. Immutable once captured; persisted
 * as `issue.json` at the start of each run.
 */
export interface Issue {
  readonly number: number
  readonly title: string
  readonly body: string
  readonly labels: readonly string[]
  readonly url: string
}

/** Per-role stage weights used for aggregate confidence */
export type ConfidenceWeights = Readonly<Record<StageRole, number>>
