/**
 * PipelineEvents: the typed map of all events emitted on the event bus.
 *
 * Event naming convention: {scope}:{action} (e.g. "stage:start", "issue:done").
 */

import type { AgentStatus, PipelineStatus, StageRole, TerminalPipelineStatus } from './types.js'

export interface PipelineEvents {
  // -------------------------------------------------------------------------
  // Pipeline lifecycle
  // -------------------------------------------------------------------------

  /** A pipeline run started for an issue */
  'pipeline:start': {
    issueNumber: number
    runDir: string
    maxIterations: number
  }

  /** A pipeline run reached a terminal status */
  'pipeline:complete': {
    issueNumber: number
    status: TerminalPipelineStatus
    failureReason: string | null
    aggregateConfidence: number | null
    /** Number of fix attempts made */
    iterations: number
    durationMs: number
  }

  // -------------------------------------------------------------------------
  // Stage lifecycle
  // -------------------------------------------------------------------------

  /** An agent is about to be invoked */
  'stage:start': {
    issueNumber: number
    role: StageRole
    /** Artifact name, e.g. `fix-revision-2` */
    agent: string
    iteration: number
  }

  /** An agent returned its state */
  'stage:complete': {
    issueNumber: number
    role: StageRole
    agent: string
    iteration: number
    status: AgentStatus
    confidence: number
    error: string | null
  }

  // -------------------------------------------------------------------------
  // Run coordinator
  // -------------------------------------------------------------------------

  /** The coordinator began working on an issue */
  'issue:start': {
    issueNumber: number
    index: number
    total: number
  }

  /** The coordinator finished an issue, including post-run actions */
  'issue:done': {
    issueNumber: number
    outcome: Exclude<PipelineStatus, 'RUNNING' | 'BLOCKED'>
    detail: string
    changeRequestUrl?: string
  }
}
