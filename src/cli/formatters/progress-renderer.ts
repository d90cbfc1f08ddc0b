/**
 * Human-readable progress renderer for `autofix run`.
 *
 * Consumes event bus events and appends one compact line per step, similar
 * to `docker build` output. Lines are appended, never redrawn, so the output
 * reads the same in a terminal and in a CI log.
 *
 * Color is used only on a TTY and respects `NO_COLOR` (https://no-color.org/).
 * Raw pino logs go to stderr and are not this renderer's concern.
 */

import type { Writable } from 'node:stream'
import { formatDuration } from '../../utils/helpers.js'
import type { BusEvent } from './streaming.js'

// ---------------------------------------------------------------------------
// ANSI helpers
// ---------------------------------------------------------------------------

const ANSI_RESET = '\x1b[0m'
const ANSI_YELLOW = '\x1b[33m'
const ANSI_GREEN = '\x1b[32m'
const ANSI_RED = '\x1b[31m'
const ANSI_DIM = '\x1b[2m'

function isTTYStream(stream: Writable): boolean {
  return 'isTTY' in stream && stream.isTTY === true
}

// ---------------------------------------------------------------------------
// ProgressRenderer
// ---------------------------------------------------------------------------

export interface ProgressRenderer {
  /** Feed one event; the renderer writes whatever line it warrants */
  render(event: BusEvent): void
}

function statusColor(status: string): string {
  switch (status) {
    case 'SUCCESS':
      return ANSI_GREEN
    case 'SKIPPED':
      return ANSI_YELLOW
    default:
      return ANSI_RED
  }
}

/**
 * @param stream - Where progress goes (e.g. `process.stdout`)
 * @param isTTY  - Override for TTY detection (useful in tests)
 */
export function createProgressRenderer(stream: Writable, isTTY?: boolean): ProgressRenderer {
  const tty = isTTY ?? isTTYStream(stream)
  const color = tty && process.env.NO_COLOR === undefined

  function write(line: string): void {
    stream.write(line + '\n')
  }

  function colorize(text: string, ansiCode: string): string {
    return color ? `${ansiCode}${text}${ANSI_RESET}` : text
  }

  return {
    render(event: BusEvent): void {
      switch (event.type) {
        case 'issue:start': {
          const { issueNumber, index, total } = event.payload
          write(`[${String(index)}/${String(total)}] Issue #${String(issueNumber)}`)
          break
        }
        case 'pipeline:start':
          write(colorize(`  run dir ${event.payload.runDir}`, ANSI_DIM))
          break
        case 'stage:start':
          write(`  → ${event.payload.agent}`)
          break
        case 'stage:complete': {
          const { agent, status, confidence, error } = event.payload
          const detail = error !== null ? `: ${error}` : ` (${confidence.toFixed(2)})`
          write(`  ${colorize(status.padEnd(7), statusColor(status))} ${agent}${detail}`)
          break
        }
        case 'pipeline:complete': {
          const { status, failureReason, aggregateConfidence, iterations, durationMs } = event.payload
          const parts = [`pipeline ${status} in ${formatDuration(durationMs)}`]
          if (aggregateConfidence !== null) parts.push(`aggregate ${aggregateConfidence.toFixed(2)}`)
          if (iterations > 1) parts.push(`${String(iterations)} iterations`)
          if (failureReason !== null) parts.push(failureReason)
          write(`  ${colorize(parts.join(', '), statusColor(status))}`)
          break
        }
        case 'issue:done': {
          const { issueNumber, outcome, detail } = event.payload
          write(colorize(`  #${String(issueNumber)} ${outcome}: ${detail}`, statusColor(outcome)))
          break
        }
      }
    },
  }
}
