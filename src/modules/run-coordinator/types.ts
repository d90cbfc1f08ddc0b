/**
 * Types for the run coordinator: the per-issue workflow around the pipeline.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { Issue, TerminalPipelineStatus } from '../../core/types.js'
import type { AutofixConfig } from '../config/config-schema.js'
import type { GitClient } from '../git/git-client.js'
import type { IssueTracker } from '../issue-tracker/types.js'
import type { Pipeline } from '../pipeline/types.js'
import type { RunStore } from '../pipeline/run-store.js'

/** Final outcome of one issue, after post-run actions */
export type IssueOutcomeStatus = 'SUCCESS' | 'SKIPPED' | 'FAILED'

export interface IssueOutcome {
  issueNumber: number
  status: IssueOutcomeStatus
  /** Short human-readable explanation */
  detail: string
  /** Set once the run directory exists */
  runDir?: string
  /** Terminal pipeline status, when the pipeline ran to completion */
  pipelineStatus?: TerminalPipelineStatus
  changeRequestUrl?: string
}

export interface BatchSummary {
  success: number[]
  skipped: number[]
  failed: number[]
  outcomes: IssueOutcome[]
}

/** A fresh run directory and a pipeline writing into it */
export interface PreparedRun {
  store: RunStore
  pipeline: Pipeline
}

export type PipelineFactory = (issue: Issue) => Promise<PreparedRun>

export interface RunCoordinatorDeps {
  config: AutofixConfig
  git: GitClient
  tracker: IssueTracker
  pipelineFactory: PipelineFactory
  eventBus?: TypedEventBus
}

export interface RunCoordinator {
  /**
   * Fetch, gate, prepare, run and publish one issue.
   * Rejects only when the pipeline itself throws; git state is cleaned first.
   */
  processIssue(issueNumber: number): Promise<IssueOutcome>
  /** Process issues in order. A rejected issue counts as failed. */
  processBatch(issueNumbers: readonly number[]): Promise<BatchSummary>
}
