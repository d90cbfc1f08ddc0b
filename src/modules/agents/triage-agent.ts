/**
 * TriageAgent: classifies an issue as actionable or not.
 *
 * SUCCESS only for FIXABLE_CODE / FIXABLE_CONFIG at or above the confidence
 * threshold. Everything else is SKIPPED with the classification in the payload.
 */

import type { AgentRunner } from '../agent-runner/types.js'
import { extractFirstMatching } from '../result-extractor/result-extractor.js'
import { BaseAgent, issueVars } from './base-agent.js'
import type { StageOutcome } from './base-agent.js'
import { normalizeTriage } from './normalize.js'
import { ACTIONABLE_CLASSIFICATIONS } from './types.js'
import type { AgentContext, TriagePayload } from './types.js'

/** Marker fields accepted as a triage answer, by preference */
export const TRIAGE_RESULT_FIELDS = ['classification'] as const

export const DEFAULT_TRIAGE_MIN_CONFIDENCE = 0.6

/**
 * Payload used when no classification can be extracted: ask for clarification
 * at low confidence, which skips the issue.
 */
export function defaultTriagePayload(): TriagePayload {
  return {
    classification: 'NEEDS_CLARIFICATION',
    confidence: 0.3,
    summary: 'Could not extract structured triage result',
    reasoning: 'Agent output did not contain a parseable classification',
    risks: ['Unknown issue structure'],
    suggested_approach: '',
    questions_if_unclear: [],
    full_analysis: {},
  }
}

export function isActionableClassification(classification: string): boolean {
  return ACTIONABLE_CLASSIFICATIONS.some((c) => c === classification)
}

export interface TriageAgentOptions {
  minConfidence?: number
}

export class TriageAgent extends BaseAgent<'triage'> {
  private readonly _minConfidence: number

  constructor(runner: AgentRunner, options: TriageAgentOptions = {}) {
    super('triage', runner)
    this._minConfidence = options.minConfidence ?? DEFAULT_TRIAGE_MIN_CONFIDENCE
  }

  protected override async run(context: AgentContext): Promise<StageOutcome<TriagePayload>> {
    const output = await this.invoke(context, 'triage', issueVars(context.issue))

    const match = extractFirstMatching(output, TRIAGE_RESULT_FIELDS)
    let payload = match !== null ? normalizeTriage(match.payload) : null
    if (payload === null) {
      this._logger.warn({ issue: context.issue.number }, 'Could not extract structured triage result')
      payload = defaultTriagePayload()
    }

    const { classification, confidence } = payload
    if (isActionableClassification(classification) && confidence >= this._minConfidence) {
      this._logger.info({ classification, confidence }, 'Issue is actionable')
      return { status: 'SUCCESS', payload }
    }

    this._logger.info(
      { classification, confidence, minConfidence: this._minConfidence },
      'Issue is not actionable'
    )
    return { status: 'SKIPPED', payload }
  }
}
