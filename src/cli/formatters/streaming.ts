/**
 * NDJSON event output for `autofix run --output-format json` and
 * `autofix status --output-format json`.
 *
 * Each line follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { Writable } from 'node:stream'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { PipelineEvents } from '../../core/event-bus.types.js'

// ---------------------------------------------------------------------------
// emitEvent
// ---------------------------------------------------------------------------

/**
 * Write a single NDJSON event.
 *
 * @param event - Event name (e.g. "stage:complete", "run:summary")
 */
export function emitEvent(event: string, data: object, stream: Writable = process.stdout): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  stream.write(line + '\n')
}

// ---------------------------------------------------------------------------
// Event bus bridge
// ---------------------------------------------------------------------------

/** One event bus emission, tagged with its name */
export type BusEvent = {
  [K in keyof PipelineEvents]: { type: K; payload: PipelineEvents[K] }
}[keyof PipelineEvents]

/**
 * Pass every bus event to `handler`, in emission order.
 */
export function forwardEvents(bus: TypedEventBus, handler: (event: BusEvent) => void): void {
  bus.on('issue:start', (payload) => handler({ type: 'issue:start', payload }))
  bus.on('pipeline:start', (payload) => handler({ type: 'pipeline:start', payload }))
  bus.on('stage:start', (payload) => handler({ type: 'stage:start', payload }))
  bus.on('stage:complete', (payload) => handler({ type: 'stage:complete', payload }))
  bus.on('pipeline:complete', (payload) => handler({ type: 'pipeline:complete', payload }))
  bus.on('issue:done', (payload) => handler({ type: 'issue:done', payload }))
}

/**
 * Stream every bus event as an NDJSON line.
 */
export function attachNdjsonStream(bus: TypedEventBus, stream: Writable = process.stdout): void {
  forwardEvents(bus, (event) => emitEvent(event.type, event.payload, stream))
}
