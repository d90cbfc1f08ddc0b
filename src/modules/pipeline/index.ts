export { PipelineImpl, createPipeline, stageMarker } from './pipeline-impl.js'
export {
  DEFAULT_CONFIDENCE_WEIGHTS,
  WEIGHT_SUM_TOLERANCE,
  computeAggregateConfidence,
  weightsSumToOne,
} from './confidence.js'
export {
  FileRunStore,
  ISSUE_FILE,
  PIPELINE_STATE_FILE,
  createRunStore,
  findLatestRunDir,
  readPipelineSnapshot,
  runDirName,
  writeJsonAtomic,
} from './run-store.js'
export type { RunStore } from './run-store.js'
export { PipelineSnapshotSchema } from './types.js'
export type {
  ConfidenceBreakdown,
  Pipeline,
  PipelineConfig,
  PipelineDeps,
  PipelineResult,
  PipelineSnapshot,
} from './types.js'
