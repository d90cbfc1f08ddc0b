/**
 * Issue comments and change-request text posted by the run coordinator.
 */

import type { TriagePayload } from '../agents/types.js'
import type { ConfidenceBreakdown } from '../pipeline/types.js'

const ANALYSIS_HEADER = '**Auto-Fix Analysis Complete**'

function bullets(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`)
}

/** Whole-number percentage, e.g. 0.815 → "82%" */
export function formatPercent(value: number): string {
  return `${String(Math.round(value * 100))}%`
}

// ---------------------------------------------------------------------------
// Change request
// ---------------------------------------------------------------------------

export type ConfidenceLabel = 'high-confidence' | 'medium-confidence' | 'low-confidence'

export function confidenceLabel(aggregate: number): ConfidenceLabel {
  if (aggregate >= 0.8) return 'high-confidence'
  if (aggregate >= 0.6) return 'medium-confidence'
  return 'low-confidence'
}

export function changeRequestTitle(issueTitle: string): string {
  return `fix: ${issueTitle}`
}

export function commitMessage(issueNumber: number, issueTitle: string): string {
  return `fix: ${issueTitle}\n\nFixes #${String(issueNumber)}`
}

export function buildChangeRequestBody(
  issueNumber: number,
  aggregate: number,
  breakdown: ConfidenceBreakdown
): string {
  return [
    '## Summary',
    `Auto-generated fix for issue #${String(issueNumber)}`,
    '',
    '## Confidence',
    `- Aggregate: ${String(aggregate)}`,
    `- Breakdown: ${JSON.stringify(breakdown, null, 2)}`,
    '',
    '## Test Plan',
    '- [ ] Review the changes',
    '- [ ] Run tests',
    '- [ ] Verify fix addresses the issue',
    '',
  ].join('\n')
}

// ---------------------------------------------------------------------------
// Issue comments
// ---------------------------------------------------------------------------

export const VAGUE_ISSUE_COMMENT = [
  'I attempted to auto-fix this issue, but the description is unclear or lacks sufficient detail to determine what needs to be fixed.',
  '',
  'Please provide more information:',
  '- What is the current behavior?',
  '- What is the expected behavior?',
  '- Steps to reproduce (if applicable)',
  '- Any relevant error messages or screenshots',
].join('\n')

export interface SuccessCommentInput {
  changeRequestUrl: string
  filesChanged: readonly string[]
  rootCause: string
  caveats: readonly string[]
  testingNotes: readonly string[]
  confidence: number
}

/** Files are capped at 5, caveats and testing notes at 3 each */
export function buildSuccessComment(input: SuccessCommentInput): string {
  const files =
    input.filesChanged.length > 0
      ? input.filesChanged
          .slice(0, 5)
          .map((file) => `\`${file}\``)
          .join(', ')
      : 'See PR'

  const lines = ['**Automated Fix Created**', '', `**PR:** ${input.changeRequestUrl}`, '', `**Files changed:** ${files}`]
  if (input.rootCause !== '') {
    lines.push('', `**Root cause:** ${input.rootCause}`)
  }
  if (input.caveats.length > 0) {
    lines.push('', '**Caveats:**', ...bullets(input.caveats.slice(0, 3)))
  }
  if (input.testingNotes.length > 0) {
    lines.push('', '**Testing notes:**', ...bullets(input.testingNotes.slice(0, 3)))
  }
  lines.push('', `**Confidence:** ${formatPercent(input.confidence)}`, '', 'Please review the PR before merging.')
  return lines.join('\n')
}

export function buildNoCommitsComment(aggregate: number | null): string {
  return `Pipeline completed but no code changes were made.\n\nAggregate confidence: ${aggregate === null ? 'n/a' : String(aggregate)}`
}

export function buildFixNoChangesComment(triageSummary: string, researchSummary: string): string {
  const lines = [
    ANALYSIS_HEADER,
    '',
    'The issue was analyzed and deemed fixable, but the fix agent was unable to make any code changes.',
  ]
  if (triageSummary !== '') lines.push('', '## Triage Analysis', triageSummary)
  if (researchSummary !== '') lines.push('', '## Research Findings', researchSummary)
  lines.push(
    '',
    '## Next Steps',
    '- A human developer should review this issue',
    '- The automated analysis above may provide useful context',
    '- Consider if the issue requires architectural changes beyond simple fixes'
  )
  return lines.join('\n')
}

const SKIP_INTROS: Readonly<Record<string, string>> = {
  NEEDS_HUMAN: 'This issue requires human review due to its complexity or risk level.',
  NEEDS_CLARIFICATION: 'This issue needs more information before it can be addressed.',
  OUT_OF_SCOPE: 'This issue is outside the scope of automated fixes.',
  DUPLICATE: 'This issue appears to be a duplicate of an existing issue.',
}

const DEFAULT_SKIP_INTRO = 'This issue was analyzed but cannot be auto-fixed.'

/**
 * Explain why triage declined the issue. `triage` is null when no triage
 * payload survived.
 */
export function buildSkipComment(triage: Readonly<TriagePayload> | null): string {
  const classification = triage?.classification ?? ''
  const intro = SKIP_INTROS[classification] ?? DEFAULT_SKIP_INTRO
  const lines = [ANALYSIS_HEADER, '', intro, '', `**Classification:** \`${classification}\``]
  if (triage === null) return lines.join('\n')

  lines.push('', '## Analysis Summary', '', `**Summary:** ${triage.summary}`, '', `**Reasoning:** ${triage.reasoning}`)

  switch (classification) {
    case 'NEEDS_HUMAN':
      if (triage.risks.length > 0) lines.push('', '**Risks:**', ...bullets(triage.risks))
      if (triage.suggested_approach !== '') lines.push('', `**Suggested Approach:** ${triage.suggested_approach}`)
      if (triage.questions_if_unclear.length > 0) {
        lines.push('', '**Questions for Clarification:**', ...bullets(triage.questions_if_unclear))
      }
      break
    case 'NEEDS_CLARIFICATION':
      if (triage.questions_if_unclear.length > 0) {
        lines.push('', '**Please provide clarification on:**', ...bullets(triage.questions_if_unclear))
      }
      break
    case 'OUT_OF_SCOPE':
      lines.push(
        '',
        '**Why this is out of scope:** This issue does not appear to be a bug or configuration issue that can be addressed through code changes. It may be a feature request, documentation issue, or external dependency problem.'
      )
      break
    case 'DUPLICATE':
      lines.push(
        '',
        '**Note:** This issue appears to be a duplicate. Please check for related issues that may already address this problem.'
      )
      break
  }
  return lines.join('\n')
}
