/**
 * PipelineImpl: the triage → research → fix/review state machine.
 *
 * The only place stage outcomes are mapped to a pipeline status. Every
 * transition rewrites `pipeline.state.json` before the next stage starts, and
 * exactly one terminal snapshot is written per run.
 */

import type pino from 'pino'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Issue, StageRole, TerminalPipelineStatus } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { StageAgents } from '../agents/index.js'
import type { Agent, AgentContext, AgentState, DiffSource, FixPayload, StagePayloads } from '../agents/types.js'
import { createPromptLibrary } from '../prompts/prompt-library.js'
import type { PromptLibrary } from '../prompts/prompt-library.js'
import { computeAggregateConfidence } from './confidence.js'
import type { RunStore } from './run-store.js'
import type { Pipeline, PipelineConfig, PipelineDeps, PipelineResult, PipelineSnapshot } from './types.js'

type MutableStageStates = { -readonly [R in StageRole]?: AgentState<StagePayloads[R]> }

/** Mutable bookkeeping for one `run()` call */
interface RunState {
  issue: Issue
  snapshot: PipelineSnapshot
  states: MutableStageStates
  revisions: AgentState<FixPayload>[]
  startedMs: number
}

export class PipelineImpl implements Pipeline {
  private readonly _agents: StageAgents
  private readonly _store: RunStore
  private readonly _diffSource: DiffSource
  private readonly _config: PipelineConfig
  private readonly _prompts: PromptLibrary
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => Date
  private readonly _logger: pino.Logger

  constructor(deps: PipelineDeps) {
    this._agents = deps.agents
    this._store = deps.store
    this._diffSource = deps.diffSource
    this._config = deps.config
    this._prompts = deps.prompts ?? createPromptLibrary(deps.config.promptsDir)
    this._eventBus = deps.eventBus
    this._now = deps.now ?? (() => new Date())
    this._logger = createLogger('pipeline')
  }

  async run(issue: Issue): Promise<PipelineResult> {
    const started = this._now()
    const run: RunState = {
      issue,
      snapshot: {
        status: 'RUNNING',
        issue_number: issue.number,
        current_agent: null,
        agents_completed: [],
        failure_reason: null,
        iterations: 0,
        aggregate_confidence: null,
        confidence_breakdown: {},
        started_at: started.toISOString(),
        completed_at: null,
      },
      states: {},
      revisions: [],
      startedMs: started.getTime(),
    }

    await this._store.writePipelineState(run.snapshot)
    this._eventBus?.emit('pipeline:start', {
      issueNumber: issue.number,
      runDir: this._store.runDir,
      maxIterations: this._config.maxIterations,
    })
    this._logger.info({ issue: issue.number, runDir: this._store.runDir }, 'Pipeline started')

    // -- Pre-fix stages -------------------------------------------------------

    const triage = await this._runStage(run, this._agents.triage, 1)
    if (triage.status === 'FAILED') {
      return this._finish(run, 'FAILED', triage.error)
    }
    if (triage.status === 'SKIPPED') {
      return this._finish(run, 'SKIPPED', `Issue classified as: ${triage.payload.classification}`)
    }

    const research = await this._runStage(run, this._agents.research, 1)
    if (research.status === 'FAILED') {
      return this._finish(run, 'FAILED', research.error)
    }
    if (research.status === 'SKIPPED') {
      return this._finish(run, 'FAILED', 'research failed')
    }

    // -- Fix-review loop --------------------------------------------------------

    const maxIterations = this._config.maxIterations
    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      run.snapshot.iterations = iteration

      const fixAgent = iteration === 1 ? this._agents.fix : this._agents.createRevision(iteration)
      const fix = await this._runStage(run, fixAgent, iteration)
      if (iteration > 1) run.revisions.push(fix)

      if (fix.status === 'FAILED') {
        return this._finish(run, 'FAILED', fix.error)
      }
      if (fix.status === 'SKIPPED') {
        return iteration === 1
          ? this._finish(run, 'SKIPPED', 'Fix agent made no changes')
          : this._finish(run, 'BLOCKED', `Revision ${String(iteration)} applied no fix`)
      }

      const review = await this._runStage(run, this._agents.review, iteration)
      if (review.status === 'SUCCESS') {
        return this._finishSuccess(run)
      }
      if (review.status === 'FAILED') {
        return this._finish(run, 'FAILED', review.error)
      }

      const verdict = review.payload.verdict
      if (verdict === 'BLOCK') {
        return this._finish(run, 'BLOCKED', 'Review verdict: BLOCK')
      }
      this._logger.info({ iteration, maxIterations, verdict }, 'Review requested changes')
    }

    return this._finish(
      run,
      'BLOCKED',
      `Review still requested changes after ${String(maxIterations)} iterations`
    )
  }

  // ---------------------------------------------------------------------------
  // Stage execution
  // ---------------------------------------------------------------------------

  private async _runStage<R extends StageRole>(
    run: RunState,
    agent: Agent<R>,
    iteration: number
  ): Promise<AgentState<StagePayloads[R]>> {
    const { issue, snapshot } = run

    snapshot.current_agent = agent.name
    await this._store.writePipelineState(snapshot)
    this._eventBus?.emit('stage:start', { issueNumber: issue.number, role: agent.role, agent: agent.name, iteration })

    const state = await agent.execute(this._buildContext(run, agent.role, iteration))

    const states: { -readonly [K in R]?: AgentState<StagePayloads[K]> } = run.states
    states[agent.role] = state
    await this._store.writeAgentState(agent.role, state)
    if (agent.name !== agent.role) {
      await this._store.writeAgentState(agent.name, state)
    }

    snapshot.current_agent = null
    snapshot.agents_completed.push(stageMarker(agent.name, state))
    snapshot.confidence_breakdown[agent.role] = state.confidence
    await this._store.writePipelineState(snapshot)

    this._eventBus?.emit('stage:complete', {
      issueNumber: issue.number,
      role: agent.role,
      agent: agent.name,
      iteration,
      status: state.status,
      confidence: state.confidence,
      error: state.error ?? null,
    })
    return state
  }

  private _buildContext(run: RunState, role: StageRole, iteration: number): AgentContext {
    return {
      issue: run.issue,
      iteration,
      previousStates: { ...run.states },
      config: {
        workingDir: this._config.workingDir,
        timeoutMs: this._config.timeouts[role],
        promptsDir: this._config.promptsDir,
      },
      prompts: this._prompts,
      artifacts: this._store,
      diffSource: this._diffSource,
    }
  }

  // ---------------------------------------------------------------------------
  // Terminal transitions
  // ---------------------------------------------------------------------------

  private _finishSuccess(run: RunState): Promise<PipelineResult> {
    run.snapshot.aggregate_confidence = computeAggregateConfidence(
      this._config.weights,
      run.snapshot.confidence_breakdown
    )
    return this._finish(run, 'SUCCESS', null)
  }

  private async _finish(
    run: RunState,
    status: TerminalPipelineStatus,
    failureReason: string | null
  ): Promise<PipelineResult> {
    const { snapshot } = run
    const completed = this._now()
    const durationMs = completed.getTime() - run.startedMs

    snapshot.status = status
    snapshot.failure_reason = failureReason
    snapshot.current_agent = null
    snapshot.completed_at = completed.toISOString()
    snapshot.duration_seconds = Math.round(durationMs / 10) / 100
    await this._store.writePipelineState(snapshot)

    const logFields: Record<string, unknown> = {
      issue: snapshot.issue_number,
      status,
      durationMs,
    }
    if (snapshot.iterations > 1) logFields.iterations = snapshot.iterations
    if (failureReason !== null) logFields.reason = failureReason
    if (snapshot.aggregate_confidence !== null) logFields.confidence = snapshot.aggregate_confidence
    this._logger.info(logFields, 'Pipeline finished')

    this._eventBus?.emit('pipeline:complete', {
      issueNumber: snapshot.issue_number,
      status,
      failureReason,
      aggregateConfidence: snapshot.aggregate_confidence,
      iterations: snapshot.iterations,
      durationMs,
    })

    return {
      snapshot: Object.freeze(structuredClone(snapshot)),
      agentStates: { ...run.states },
      revisions: [...run.revisions],
    }
  }
}

/** `name` on success, `name:failed` / `name:skipped` otherwise */
export function stageMarker(name: string, state: AgentState<unknown>): string {
  if (state.status === 'SUCCESS') return name
  return `${name}:${state.status.toLowerCase()}`
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  return new PipelineImpl(deps)
}
