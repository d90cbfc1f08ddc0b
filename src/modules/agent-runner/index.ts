export { AgentRunnerImpl, createAgentRunner } from './agent-runner-impl.js'
export { DEFAULT_AGENT_TIMEOUT_MS, DEFAULT_KILL_GRACE_MS } from './types.js'
export type { AgentRunner, AgentRunRequest, AgentRunResult, AgentRunnerConfig } from './types.js'
