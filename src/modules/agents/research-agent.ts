/**
 * ResearchAgent: finds the root cause and plans the fix. Has no skip
 * semantics: it either produces findings or fails.
 */

import type { AgentRunner } from '../agent-runner/types.js'
import { extractFirstMatching } from '../result-extractor/result-extractor.js'
import { BaseAgent, issueVars } from './base-agent.js'
import type { StageOutcome } from './base-agent.js'
import { normalizeResearch } from './normalize.js'
import type { AgentContext, ResearchPayload } from './types.js'

export const RESEARCH_RESULT_FIELDS = ['root_cause', 'proposed_fix', 'files_analyzed'] as const

/** Below this, findings are used but flagged in the log */
const LOW_CONFIDENCE_WARNING = 0.4

export function defaultResearchPayload(): ResearchPayload {
  return {
    root_cause: 'Unknown',
    proposed_fix: '',
    affected_areas: [],
    files_analyzed: [],
    test_strategy: '',
    patterns_to_follow: [],
    summary: 'Research completed but no structured output',
    confidence: 0.3,
    full_analysis: {},
  }
}

export class ResearchAgent extends BaseAgent<'research'> {
  constructor(runner: AgentRunner) {
    super('research', runner)
  }

  protected override async run(context: AgentContext): Promise<StageOutcome<ResearchPayload>> {
    const triage = context.previousStates.triage
    if (triage === undefined || triage.status !== 'SUCCESS') {
      return { status: 'FAILED', error: 'Triage did not complete successfully' }
    }

    const output = await this.invoke(context, 'research', {
      ...issueVars(context.issue),
      triage_classification: triage.payload.classification,
      triage_summary: triage.payload.summary,
      triage_approach: triage.payload.suggested_approach !== '' ? triage.payload.suggested_approach : 'none given',
    })

    const match = extractFirstMatching(output, RESEARCH_RESULT_FIELDS)
    let payload = match !== null ? normalizeResearch(match.payload) : null
    if (payload === null) {
      this._logger.warn({ issue: context.issue.number }, 'Could not extract structured research result')
      payload = defaultResearchPayload()
    }

    if (payload.confidence < LOW_CONFIDENCE_WARNING) {
      this._logger.warn({ confidence: payload.confidence }, 'Low research confidence')
    }

    return { status: 'SUCCESS', payload }
  }
}
