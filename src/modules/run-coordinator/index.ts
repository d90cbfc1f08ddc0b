export { createRunCoordinator, RunCoordinatorImpl, isVagueIssue, branchNameFor, COMMIT_EXCLUDES } from './run-coordinator-impl.js'
export { createPipelineFactory, toPipelineConfig } from './pipeline-factory.js'
export type { PipelineFactoryOptions } from './pipeline-factory.js'
export * from './comments.js'
export type {
  BatchSummary,
  IssueOutcome,
  IssueOutcomeStatus,
  PipelineFactory,
  PreparedRun,
  RunCoordinator,
  RunCoordinatorDeps,
} from './types.js'
