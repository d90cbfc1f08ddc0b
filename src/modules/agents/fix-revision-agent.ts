/**
 * FixRevisionAgent: addresses review feedback on iteration N >= 2.
 */

import type { AgentRunner } from '../agent-runner/types.js'
import { truncateText } from '../../utils/helpers.js'
import { BaseAgent, formatList, issueVars } from './base-agent.js'
import type { StageOutcome } from './base-agent.js'
import { parseFixOutput } from './fix-agent.js'
import type { AgentContext, FixPayload } from './types.js'

/** Diffs embedded in prompts are cut to this many characters */
export const MAX_DIFF_CHARS = 50_000

export function revisionName(iteration: number): string {
  return `fix-revision-${iteration}`
}

export class FixRevisionAgent extends BaseAgent<'fix'> {
  readonly iteration: number
  private readonly _maxIterations: number

  constructor(runner: AgentRunner, iteration: number, maxIterations: number) {
    super('fix', runner, revisionName(iteration))
    this.iteration = iteration
    this._maxIterations = maxIterations
  }

  protected override async run(context: AgentContext): Promise<StageOutcome<FixPayload>> {
    const { research, fix, review } = context.previousStates
    if (research === undefined || research.status !== 'SUCCESS') {
      return { status: 'FAILED', error: 'Research did not complete successfully' }
    }
    if (fix === undefined || fix.status === 'FAILED') {
      return { status: 'FAILED', error: 'No previous fix to revise' }
    }
    if (review === undefined || review.status === 'FAILED') {
      return { status: 'FAILED', error: 'No previous review to address' }
    }

    const diff = await context.diffSource.getWorkingDiff()
    const previousFiles = fix.payload.files_changed

    const output = await this.invoke(context, 'fix-revision', {
      ...issueVars(context.issue),
      iteration: String(this.iteration),
      max_iterations: String(this._maxIterations),
      root_cause: research.payload.root_cause !== '' ? research.payload.root_cause : 'Unknown',
      patterns_to_follow: formatList(research.payload.patterns_to_follow),
      review_verdict: review.payload.verdict,
      review_confidence: review.payload.confidence.toFixed(2),
      review_concerns: formatList(review.payload.concerns),
      review_suggestions: formatList(review.payload.suggestions),
      previous_files: formatList(previousFiles),
      current_diff: diff.trim() !== '' ? truncateText(diff, MAX_DIFF_CHARS) : '(no changes detected)',
    })

    const { payload, extracted } = parseFixOutput(output)
    if (!extracted) {
      this._logger.warn({ issue: context.issue.number }, 'Could not extract structured revision result')
    }

    if (payload.files_changed.length > 0) {
      return { status: 'SUCCESS', payload }
    }

    if (payload.fix_applied === false) {
      this._logger.info({ iteration: this.iteration }, 'Revision reported no fix applied')
      return { status: 'SKIPPED', payload }
    }

    // Edits may have landed on files the previous attempt already touched
    return { status: 'SUCCESS', payload: { ...payload, files_changed: [...previousFiles] } }
  }
}
