/**
 * BaseAgent: shared prepare-prompt / invoke-process / build-state flow for
 * every stage agent.
 *
 * Subclasses implement `run()`, which returns a stage outcome or throws.
 * `execute()` converts anything thrown (timeouts, process failures, missing
 * templates) into a FAILED state, so no stage error crosses into the pipeline.
 */

import type pino from 'pino'
import { StageProcessError, StageTimeoutError } from '../../core/errors.js'
import type { Issue, StageRole } from '../../core/types.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import type { AgentRunner } from '../agent-runner/types.js'
import type { PromptName, PromptVars } from '../prompts/prompt-library.js'
import type { Agent, AgentContext, AgentState, StagePayloads } from './types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What a subclass reports back from `run()` */
export type StageOutcome<P> =
  | { status: 'SUCCESS' | 'SKIPPED'; payload: P }
  | { status: 'FAILED'; error: string }

// ---------------------------------------------------------------------------
// Prompt helpers
// ---------------------------------------------------------------------------

/** Placeholders every template can use */
export function issueVars(issue: Issue): PromptVars {
  return {
    issue_number: String(issue.number),
    issue_title: issue.title,
    issue_body: issue.body.trim() !== '' ? issue.body : '(no description provided)',
    issue_labels: issue.labels.length > 0 ? issue.labels.join(', ') : 'none',
    issue_url: issue.url,
  }
}

/** Render a list as markdown bullets */
export function formatList(items: readonly string[], empty = '- (none)'): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : empty
}

// ---------------------------------------------------------------------------
// BaseAgent
// ---------------------------------------------------------------------------

export abstract class BaseAgent<R extends StageRole> implements Agent<R> {
  readonly role: R
  readonly name: string
  protected readonly _runner: AgentRunner
  protected readonly _logger: pino.Logger

  constructor(role: R, runner: AgentRunner, name: string = role) {
    this.role = role
    this.name = name
    this._runner = runner
    this._logger = createLogger(`agent:${name}`)
  }

  async execute(context: AgentContext): Promise<AgentState<StagePayloads[R]>> {
    const startedAt = new Date().toISOString()
    let outcome: StageOutcome<StagePayloads[R]>

    try {
      outcome = await this.run(context)
    } catch (err) {
      const message = maskSecrets(err instanceof Error ? err.message : String(err))
      this._logger.error({ issue: context.issue.number, error: message }, 'Stage failed')
      outcome = { status: 'FAILED', error: message }
    }

    return this._buildState(outcome, startedAt)
  }

  /**
   * Stage-specific work. May throw; `execute()` records the error.
   */
  protected abstract run(context: AgentContext): Promise<StageOutcome<StagePayloads[R]>>

  /**
   * Render and record the prompt, then run the agent process.
   *
   * @returns Captured stdout of a successful run
   * @throws StageTimeoutError when the process exceeds the stage timeout
   * @throws StageProcessError when the process exits non-zero or cannot start
   */
  protected async invoke(context: AgentContext, template: PromptName, vars: PromptVars): Promise<string> {
    const prompt = await context.prompts.render(template, vars)
    await context.artifacts.writePrompt(this.name, prompt)

    const { timeoutMs, workingDir } = context.config
    this._logger.info({ issue: context.issue.number, timeoutMs }, 'Running agent')

    const result = await this._runner.run({
      prompt,
      cwd: workingDir,
      timeoutMs,
      logFile: context.artifacts.logPath(this.name),
      label: this.name,
    })

    if (result.timedOut) {
      throw new StageTimeoutError(this.name, timeoutMs)
    }
    if (!result.success) {
      throw new StageProcessError(this.name, result.error, result.exitCode)
    }
    return result.output
  }

  private _buildState(
    outcome: StageOutcome<StagePayloads[R]>,
    startedAt: string
  ): AgentState<StagePayloads[R]> {
    const base = {
      agent: this.name,
      role: this.role,
      started_at: startedAt,
      completed_at: new Date().toISOString(),
    }

    if (outcome.status === 'FAILED') {
      const failed: AgentState<StagePayloads[R]> = {
        ...base,
        status: 'FAILED',
        payload: null,
        error: outcome.error,
        confidence: 0,
      }
      return Object.freeze(failed)
    }

    const completed: AgentState<StagePayloads[R]> = {
      ...base,
      status: outcome.status,
      payload: Object.freeze(outcome.payload),
      confidence: outcome.payload.confidence,
    }
    return Object.freeze(completed)
  }
}
