/**
 * Tests for comments.ts: change-request text and issue comments
 */

import { describe, it, expect } from 'vitest'
import {
  buildChangeRequestBody,
  buildFixNoChangesComment,
  buildNoCommitsComment,
  buildSkipComment,
  buildSuccessComment,
  commitMessage,
  confidenceLabel,
  formatPercent,
} from '../comments.js'
import { triagePayload } from '../../agents/__tests__/fakes.js'

describe('confidenceLabel', () => {
  it.each([
    [0.95, 'high-confidence'],
    [0.8, 'high-confidence'],
    [0.79, 'medium-confidence'],
    [0.6, 'medium-confidence'],
    [0.59, 'low-confidence'],
    [0, 'low-confidence'],
  ])('labels %s as %s', (aggregate, label) => {
    expect(confidenceLabel(aggregate)).toBe(label)
  })
})

describe('formatPercent', () => {
  it('rounds to a whole percentage', () => {
    expect(formatPercent(0.79)).toBe('79%')
    expect(formatPercent(1)).toBe('100%')
    expect(formatPercent(0.456)).toBe('46%')
  })
})

describe('commitMessage', () => {
  it('references the issue', () => {
    expect(commitMessage(42, 'Crash on empty config')).toBe('fix: Crash on empty config\n\nFixes #42')
  })
})

describe('buildChangeRequestBody', () => {
  it('shows the aggregate, the breakdown and a test plan', () => {
    const body = buildChangeRequestBody(42, 0.79, { triage: 0.9, fix: 0.7 })

    expect(body).toBe(
      [
        '## Summary',
        'Auto-generated fix for issue #42',
        '',
        '## Confidence',
        '- Aggregate: 0.79',
        '- Breakdown: {\n  "triage": 0.9,\n  "fix": 0.7\n}',
        '',
        '## Test Plan',
        '- [ ] Review the changes',
        '- [ ] Run tests',
        '- [ ] Verify fix addresses the issue',
        '',
      ].join('\n')
    )
  })
})

describe('buildSuccessComment', () => {
  it('caps files at five and notes at three', () => {
    const comment = buildSuccessComment({
      changeRequestUrl: 'https://example.test/acme/widgets/pull/7',
      filesChanged: ['a.ts', 'b.ts', 'c.ts', 'd.ts', 'e.ts', 'f.ts'],
      rootCause: 'Null document',
      caveats: ['c1', 'c2', 'c3', 'c4'],
      testingNotes: ['run the suite'],
      confidence: 0.816,
    })

    expect(comment).toBe(
      [
        '**Automated Fix Created**',
        '',
        '**PR:** https://example.test/acme/widgets/pull/7',
        '',
        '**Files changed:** `a.ts`, `b.ts`, `c.ts`, `d.ts`, `e.ts`',
        '',
        '**Root cause:** Null document',
        '',
        '**Caveats:**',
        '- c1',
        '- c2',
        '- c3',
        '',
        '**Testing notes:**',
        '- run the suite',
        '',
        '**Confidence:** 82%',
        '',
        'Please review the PR before merging.',
      ].join('\n')
    )
  })

  it('points at the PR when no files are known and omits empty sections', () => {
    const comment = buildSuccessComment({
      changeRequestUrl: 'https://example.test/pull/1',
      filesChanged: [],
      rootCause: '',
      caveats: [],
      testingNotes: [],
      confidence: 0.6,
    })

    expect(comment).toBe(
      [
        '**Automated Fix Created**',
        '',
        '**PR:** https://example.test/pull/1',
        '',
        '**Files changed:** See PR',
        '',
        '**Confidence:** 60%',
        '',
        'Please review the PR before merging.',
      ].join('\n')
    )
  })
})

describe('buildNoCommitsComment', () => {
  it('reports the aggregate confidence', () => {
    expect(buildNoCommitsComment(0.81)).toBe(
      'Pipeline completed but no code changes were made.\n\nAggregate confidence: 0.81'
    )
  })
})

describe('buildFixNoChangesComment', () => {
  it('includes the analysis that exists', () => {
    expect(buildFixNoChangesComment('Loader crash', '')).toBe(
      [
        '**Auto-Fix Analysis Complete**',
        '',
        'The issue was analyzed and deemed fixable, but the fix agent was unable to make any code changes.',
        '',
        '## Triage Analysis',
        'Loader crash',
        '',
        '## Next Steps',
        '- A human developer should review this issue',
        '- The automated analysis above may provide useful context',
        '- Consider if the issue requires architectural changes beyond simple fixes',
      ].join('\n')
    )
  })
})

describe('buildSkipComment', () => {
  it('lists risks, approach and questions for NEEDS_HUMAN', () => {
    const comment = buildSkipComment(
      triagePayload({
        classification: 'NEEDS_HUMAN',
        summary: 'Touches billing',
        reasoning: 'High blast radius',
        risks: ['Charges customers twice'],
        suggested_approach: 'Pair with the billing owner',
        questions_if_unclear: ['Which invoices are affected?'],
      })
    )

    expect(comment).toBe(
      [
        '**Auto-Fix Analysis Complete**',
        '',
        'This issue requires human review due to its complexity or risk level.',
        '',
        '**Classification:** `NEEDS_HUMAN`',
        '',
        '## Analysis Summary',
        '',
        '**Summary:** Touches billing',
        '',
        '**Reasoning:** High blast radius',
        '',
        '**Risks:**',
        '- Charges customers twice',
        '',
        '**Suggested Approach:** Pair with the billing owner',
        '',
        '**Questions for Clarification:**',
        '- Which invoices are affected?',
      ].join('\n')
    )
  })

  it('asks for clarification for NEEDS_CLARIFICATION', () => {
    const comment = buildSkipComment(
      triagePayload({
        classification: 'NEEDS_CLARIFICATION',
        summary: 's',
        reasoning: 'r',
        questions_if_unclear: ['Which version?'],
      })
    )

    expect(comment.endsWith('**Please provide clarification on:**\n- Which version?')).toBe(true)
    expect(comment).toContain('This issue needs more information before it can be addressed.')
  })

  it('adds the fixed note for DUPLICATE', () => {
    const comment = buildSkipComment(triagePayload({ classification: 'DUPLICATE', summary: 's', reasoning: 'r' }))

    expect(comment.split('\n').at(-1)).toBe(
      '**Note:** This issue appears to be a duplicate. Please check for related issues that may already address this problem.'
    )
  })

  it('falls back to the generic intro for other classifications', () => {
    const comment = buildSkipComment(triagePayload({ classification: 'FIXABLE_CODE', confidence: 0.4 }))

    expect(comment.split('\n')[2]).toBe('This issue was analyzed but cannot be auto-fixed.')
    expect(comment.split('\n')[4]).toBe('**Classification:** `FIXABLE_CODE`')
  })

  it('omits the analysis when there is no triage payload', () => {
    expect(buildSkipComment(null)).toBe(
      [
        '**Auto-Fix Analysis Complete**',
        '',
        'This issue was analyzed but cannot be auto-fixed.',
        '',
        '**Classification:** ``',
      ].join('\n')
    )
  })
})
