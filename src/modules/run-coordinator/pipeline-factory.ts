/**
 * Builds the per-issue pipeline from the loaded configuration: one agent
 * runner for the whole batch, a fresh run directory per issue.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { STAGE_ROLES } from '../../core/types.js'
import type { StageRole } from '../../core/types.js'
import { createClaudeAdapter } from '../../adapters/claude-adapter.js'
import { createAgentRunner } from '../agent-runner/agent-runner-impl.js'
import type { AgentRunner } from '../agent-runner/types.js'
import { createStageAgents } from '../agents/index.js'
import type { AutofixConfig } from '../config/config-schema.js'
import type { GitClient } from '../git/git-client.js'
import { createPipeline } from '../pipeline/pipeline-impl.js'
import { createRunStore } from '../pipeline/run-store.js'
import type { PipelineConfig } from '../pipeline/types.js'
import { createPromptLibrary } from '../prompts/prompt-library.js'
import type { PipelineFactory } from './types.js'

export interface PipelineFactoryOptions {
  config: AutofixConfig
  git: GitClient
  eventBus?: TypedEventBus
  /** Defaults to a runner over the configured agent binary and model */
  runner?: AgentRunner
  now?: () => Date
}

export function toPipelineConfig(config: AutofixConfig): PipelineConfig {
  const timeouts: Record<StageRole, number> = { triage: 0, research: 0, fix: 0, review: 0 }
  for (const role of STAGE_ROLES) {
    timeouts[role] = config.timeouts[role] * 1000
  }
  return {
    weights: config.pipeline.weights,
    maxIterations: config.pipeline.max_iterations,
    workingDir: config.project_dir,
    promptsDir: config.prompts_dir,
    timeouts,
  }
}

export function createPipelineFactory(options: PipelineFactoryOptions): PipelineFactory {
  const { config, git, eventBus } = options
  const now = options.now ?? (() => new Date())
  const runner =
    options.runner ??
    createAgentRunner({
      adapter: createClaudeAdapter({ binary: config.agent.binary }),
      model: config.agent.model,
    })
  const agents = createStageAgents(runner, {
    triageMinConfidence: config.triage.min_confidence,
    maxIterations: config.pipeline.max_iterations,
  })
  const pipelineConfig = toPipelineConfig(config)
  // Templates are cached across issues
  const prompts = createPromptLibrary(config.prompts_dir)
  const baseRef = `${config.remote}/${config.base_branch}`

  return async (issue) => {
    const store = await createRunStore(config.runs_dir, issue.number, now())
    const pipeline = createPipeline({
      agents,
      store,
      diffSource: { getWorkingDiff: () => git.getWorkingDiff(baseRef) },
      config: pipelineConfig,
      prompts,
      eventBus,
      now,
    })
    return { store, pipeline }
  }
}
