/**
 * Tests for the batch summary formatter. Run snapshots are covered through
 * the status command tests.
 */

import { describe, it, expect } from 'vitest'
import { renderBatchSummaryHuman, renderRunStatusHuman } from '../status-formatter.js'

describe('renderBatchSummaryHuman', () => {
  it('lists only the non-empty buckets', () => {
    const text = renderBatchSummaryHuman(
      { success: [1, 4], skipped: [], failed: [9], outcomes: [] },
      '/proj/.autofix/runs'
    )

    expect(text).toBe(
      [
        '',
        'Summary',
        '  Completed (2): 1, 4',
        '  Failed (1): 9',
        '',
        'Total: 3 issues processed',
        'Run logs: /proj/.autofix/runs',
      ].join('\n')
    )
  })

  it('uses the singular for one issue', () => {
    const text = renderBatchSummaryHuman({ success: [], skipped: [2], failed: [], outcomes: [] }, '/r')

    expect(text.split('\n')).toContain('Total: 1 issue processed')
    expect(text.split('\n')).toContain('  Skipped (1): 2')
  })
})

describe('renderRunStatusHuman', () => {
  it('marks an empty run with dashes', () => {
    const text = renderRunStatusHuman('/r/x', {
      status: 'RUNNING',
      issue_number: 1,
      current_agent: 'triage',
      agents_completed: [],
      failure_reason: null,
      iterations: 0,
      aggregate_confidence: null,
      confidence_breakdown: {},
      started_at: '2026-03-01T00:00:00.000Z',
      completed_at: null,
    })

    expect(text.split('\n')).toEqual([
      'Run /r/x',
      'Issue #1  Status: RUNNING',
      'Current agent: triage',
      'Completed: -',
      'Iterations: 0',
      'Aggregate confidence: n/a',
      'Confidence breakdown: -',
      'Started: 2026-03-01T00:00:00.000Z',
    ])
  })
})
