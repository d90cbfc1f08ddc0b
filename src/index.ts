/**
 * issue-autofix - Main module exports
 * Public API surface for embedding the pipeline
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { PipelineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Agent adapter
export type { AgentAdapter, AdapterOptions, SpawnCommand } from './adapters/types.js'
export { ClaudeCodeAdapter, createClaudeAdapter } from './adapters/claude-adapter.js'
export type { ClaudeAdapterOptions } from './adapters/claude-adapter.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/agent-runner/index.js'
export * from './modules/result-extractor/index.js'
export * from './modules/prompts/index.js'
export * from './modules/agents/index.js'
export * from './modules/pipeline/index.js'
export * from './modules/git/index.js'
export * from './modules/issue-tracker/index.js'
export * from './modules/run-coordinator/index.js'
