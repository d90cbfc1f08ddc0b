/**
 * TypedEventBus: typed internal pub/sub between the pipeline, the run
 * coordinator and the CLI progress reporter.
 *
 * Built on top of Node.js EventEmitter. Dispatch is synchronous: handlers run
 * before emit() returns.
 */

import { EventEmitter } from 'node:events'
import type { PipelineEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus. Event names and payload types are enforced
 * by the `PipelineEvents` map.
 */
export interface TypedEventBus {
  emit<K extends keyof PipelineEvents>(event: K, payload: PipelineEvents[K]): void

  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void

  /** Unsubscribe a handler. Unknown handlers are ignored. */
  off<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('stage:complete', ({ agent, status }) => {
 *   console.log(`${agent} finished: ${status}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(50)
  }

  emit<K extends keyof PipelineEvents>(event: K, payload: PipelineEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
