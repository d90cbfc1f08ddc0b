/**
 * ReviewAgent: judges the current change set. There is no default verdict:
 * an answer that cannot be read is a failure.
 */

import type { AgentRunner } from '../agent-runner/types.js'
import { extractFirstMatching } from '../result-extractor/result-extractor.js'
import { truncateText } from '../../utils/helpers.js'
import { BaseAgent, formatList, issueVars } from './base-agent.js'
import type { StageOutcome } from './base-agent.js'
import { MAX_DIFF_CHARS } from './fix-revision-agent.js'
import { normalizeReview } from './normalize.js'
import type { AgentContext, ReviewPayload } from './types.js'

export const REVIEW_RESULT_FIELDS = ['verdict'] as const

export class ReviewAgent extends BaseAgent<'review'> {
  constructor(runner: AgentRunner) {
    super('review', runner)
  }

  protected override async run(context: AgentContext): Promise<StageOutcome<ReviewPayload>> {
    const { research, fix } = context.previousStates
    if (fix === undefined || fix.status !== 'SUCCESS') {
      return { status: 'FAILED', error: 'Fix did not complete successfully' }
    }

    const diff = await context.diffSource.getWorkingDiff()
    const rootCause = research?.status === 'SUCCESS' ? research.payload.root_cause : ''

    const output = await this.invoke(context, 'review', {
      ...issueVars(context.issue),
      iteration: String(context.iteration),
      root_cause: rootCause !== '' ? rootCause : 'Unknown',
      fix_summary: fix.payload.summary !== '' ? fix.payload.summary : '(no summary)',
      files_changed: formatList(fix.payload.files_changed),
      current_diff: diff.trim() !== '' ? truncateText(diff, MAX_DIFF_CHARS) : '(no changes detected)',
    })

    const match = extractFirstMatching(output, REVIEW_RESULT_FIELDS)
    if (match === null) {
      return { status: 'FAILED', error: 'Could not extract review verdict' }
    }
    const payload = normalizeReview(match.payload)
    if (payload === null) {
      return { status: 'FAILED', error: `Unrecognized review verdict: ${JSON.stringify(match.payload.verdict)}` }
    }

    this._logger.info({ verdict: payload.verdict, confidence: payload.confidence }, 'Review complete')
    return { status: payload.verdict === 'APPROVE' ? 'SUCCESS' : 'SKIPPED', payload }
  }
}
