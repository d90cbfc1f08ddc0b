/**
 * Unit tests for TypedEventBus and PipelineEvents type safety.
 *
 * Covers:
 *  - Emit/subscribe with correct payload type
 *  - Unsubscribe removes handler
 *  - Multiple handlers for same event all invoked, in order
 *  - Event dispatch is synchronous
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { PipelineEvents } from '../event-bus.types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeHandler<K extends keyof PipelineEvents>(
  _event: K
): (payload: PipelineEvents[K]) => void {
  return vi.fn()
}

const STAGE_START: PipelineEvents['stage:start'] = {
  issueNumber: 42,
  role: 'fix',
  agent: 'fix-revision-2',
  iteration: 2,
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl unit tests
// ---------------------------------------------------------------------------

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes handler with the exact payload emitted', () => {
    const handler = makeHandler('stage:start')
    bus.on('stage:start', handler)

    bus.emit('stage:start', STAGE_START)

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith(STAGE_START)
  })

  it('does not invoke handler for a different event', () => {
    const handler = makeHandler('stage:complete')
    bus.on('stage:complete', handler)

    bus.emit('stage:start', STAGE_START)

    expect(handler).not.toHaveBeenCalled()
  })

  it('off() removes only the given handler', () => {
    const removed = makeHandler('issue:start')
    const kept = makeHandler('issue:start')
    bus.on('issue:start', removed)
    bus.on('issue:start', kept)

    bus.off('issue:start', removed)
    bus.emit('issue:start', { issueNumber: 1, index: 1, total: 1 })

    expect(removed).not.toHaveBeenCalled()
    expect(kept).toHaveBeenCalledOnce()
  })

  it('invokes handlers in registration order', () => {
    const order: string[] = []
    bus.on('issue:done', () => order.push('first'))
    bus.on('issue:done', () => order.push('second'))

    bus.emit('issue:done', { issueNumber: 3, outcome: 'FAILED', detail: 'No code changes to push' })

    expect(order).toEqual(['first', 'second'])
  })

  it('dispatches synchronously, before emit() returns', () => {
    let called = false
    bus.on('pipeline:start', () => {
      called = true
    })

    bus.emit('pipeline:start', { issueNumber: 9, runDir: '/runs/x', maxIterations: 2 })

    expect(called).toBe(true)
  })

  it('emit() with no handlers is a no-op', () => {
    expect(() =>
      bus.emit('pipeline:complete', {
        issueNumber: 9,
        status: 'BLOCKED',
        failureReason: 'Max iterations (2) reached without approval',
        aggregateConfidence: null,
        iterations: 2,
        durationMs: 1200,
      })
    ).not.toThrow()
  })
})

describe('createEventBus', () => {
  it('returns a working bus', () => {
    const bus = createEventBus()
    const handler = makeHandler('stage:start')
    bus.on('stage:start', handler)

    bus.emit('stage:start', STAGE_START)

    expect(bus).toBeInstanceOf(TypedEventBusImpl)
    expect(handler).toHaveBeenCalledWith(STAGE_START)
  })
})
