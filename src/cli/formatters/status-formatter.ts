/**
 * Human-readable formatters for `autofix status` and the `autofix run`
 * batch summary.
 */

import { STAGE_ROLES } from '../../core/types.js'
import type { PipelineSnapshot } from '../../modules/pipeline/types.js'
import type { BatchSummary } from '../../modules/run-coordinator/types.js'

// ---------------------------------------------------------------------------
// renderRunStatusHuman
// ---------------------------------------------------------------------------

/**
 * Render a persisted pipeline snapshot.
 *
 * Output lines:
 *  - Run directory, issue and status
 *  - Current agent and completed stage markers
 *  - Iterations, failure reason, aggregate and per-stage confidence
 *  - Start and completion times
 */
export function renderRunStatusHuman(runDir: string, snapshot: PipelineSnapshot): string {
  const lines: string[] = []

  lines.push(`Run ${runDir}`)
  lines.push(`Issue #${String(snapshot.issue_number)}  Status: ${snapshot.status}`)
  lines.push(`Current agent: ${snapshot.current_agent ?? '-'}`)
  lines.push(
    `Completed: ${snapshot.agents_completed.length > 0 ? snapshot.agents_completed.join(', ') : '-'}`
  )
  lines.push(`Iterations: ${String(snapshot.iterations)}`)
  if (snapshot.failure_reason !== null) {
    lines.push(`Failure reason: ${snapshot.failure_reason}`)
  }
  lines.push(
    `Aggregate confidence: ${snapshot.aggregate_confidence !== null ? snapshot.aggregate_confidence.toFixed(2) : 'n/a'}`
  )

  const breakdown = STAGE_ROLES.flatMap((role) => {
    const value = snapshot.confidence_breakdown[role]
    return value !== undefined ? [`${role} ${value.toFixed(2)}`] : []
  })
  lines.push(`Confidence breakdown: ${breakdown.length > 0 ? breakdown.join('  ') : '-'}`)

  let timing = `Started: ${snapshot.started_at}`
  if (snapshot.completed_at !== null) {
    timing += `  Completed: ${snapshot.completed_at}`
  }
  if (snapshot.duration_seconds !== undefined) {
    timing += `  (${snapshot.duration_seconds.toFixed(1)}s)`
  }
  lines.push(timing)

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// renderBatchSummaryHuman
// ---------------------------------------------------------------------------

/**
 * Only non-empty buckets are listed.
 */
export function renderBatchSummaryHuman(summary: BatchSummary, runsDir: string): string {
  const total = summary.success.length + summary.skipped.length + summary.failed.length
  const lines = ['', 'Summary']
  const buckets: Array<[string, number[]]> = [
    ['Completed', summary.success],
    ['Skipped', summary.skipped],
    ['Failed', summary.failed],
  ]
  for (const [label, numbers] of buckets) {
    if (numbers.length > 0) {
      lines.push(`  ${label} (${String(numbers.length)}): ${numbers.join(', ')}`)
    }
  }
  lines.push('', `Total: ${String(total)} issue${total === 1 ? '' : 's'} processed`, `Run logs: ${runsDir}`)
  return lines.join('\n')
}
