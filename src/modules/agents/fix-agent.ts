/**
 * FixAgent: applies the first fix attempt in the working tree.
 */

import type { AgentRunner } from '../agent-runner/types.js'
import { extractFirstMatching } from '../result-extractor/result-extractor.js'
import { BaseAgent, formatList, issueVars } from './base-agent.js'
import type { StageOutcome } from './base-agent.js'
import { normalizeFix } from './normalize.js'
import type { AgentContext, FixPayload, ResearchPayload } from './types.js'

export const FIX_RESULT_FIELDS = ['fix_applied', 'files_modified', 'files_changed'] as const

export function defaultFixPayload(): FixPayload {
  return {
    confidence: 0.5,
    files_changed: [],
    summary: 'Fix completed but no structured output',
    tests_added: [],
    caveats: [],
    testing_notes: [],
    fix_applied: null,
    full_result: {},
  }
}

/**
 * Extract and normalize a fix answer, falling back to the default payload.
 * Shared with the revision agent.
 */
export function parseFixOutput(output: string): { payload: FixPayload; extracted: boolean } {
  const match = extractFirstMatching(output, FIX_RESULT_FIELDS)
  const payload = match !== null ? normalizeFix(match.payload) : null
  return payload !== null ? { payload, extracted: true } : { payload: defaultFixPayload(), extracted: false }
}

/** Research findings rendered as the markdown block the fix prompts embed */
export function formatResearchContext(research: Readonly<ResearchPayload>): string {
  return [
    '### Root Cause',
    research.root_cause !== '' ? research.root_cause : 'Unknown',
    '',
    '### Proposed Fix',
    research.proposed_fix !== '' ? research.proposed_fix : '(none proposed)',
    '',
    '### Affected Areas',
    formatList(research.affected_areas),
    '',
    '### Test Strategy',
    research.test_strategy !== '' ? research.test_strategy : '(none given)',
    '',
    '### Files Analyzed',
    formatList(research.files_analyzed),
    '',
    '### Patterns to Follow',
    formatList(research.patterns_to_follow),
  ].join('\n')
}

export class FixAgent extends BaseAgent<'fix'> {
  constructor(runner: AgentRunner) {
    super('fix', runner)
  }

  protected override async run(context: AgentContext): Promise<StageOutcome<FixPayload>> {
    const research = context.previousStates.research
    if (research === undefined || research.status !== 'SUCCESS') {
      return { status: 'FAILED', error: 'Research did not complete successfully' }
    }

    const output = await this.invoke(context, 'fix', {
      ...issueVars(context.issue),
      research_context: formatResearchContext(research.payload),
    })

    const { payload, extracted } = parseFixOutput(output)
    if (!extracted) {
      this._logger.warn({ issue: context.issue.number }, 'Could not extract structured fix result')
    }

    if (payload.files_changed.length === 0) {
      this._logger.info({ issue: context.issue.number }, 'Fix agent made no changes')
      return {
        status: 'SKIPPED',
        payload: { ...payload, summary: payload.summary !== '' ? payload.summary : 'No changes made' },
      }
    }

    this._logger.info({ files: payload.files_changed.length, confidence: payload.confidence }, 'Fix applied')
    return { status: 'SUCCESS', payload }
  }
}
