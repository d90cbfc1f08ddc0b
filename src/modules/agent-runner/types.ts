/**
 * Types for the agent runner: one blocking invocation of an agent CLI.
 */

import type { AgentAdapter } from '../../adapters/types.js'

/** Default wall-clock bound when a stage does not set its own */
export const DEFAULT_AGENT_TIMEOUT_MS = 600_000

export const DEFAULT_KILL_GRACE_MS = 5_000

export interface AgentRunRequest {
  prompt: string
  /** Working directory of the agent process */
  cwd: string
  timeoutMs: number
  /** Captured stdout is written here once the process ends, whatever the outcome */
  logFile?: string
  /** Stage name used in logs */
  label: string
}

export interface AgentRunResult {
  /** True only for a zero exit within the time bound */
  success: boolean
  /** Captured stdout */
  output: string
  /** Captured stderr (or a synthesized message) when the run did not succeed */
  error: string
  /** Null when the process never started or was killed by a signal */
  exitCode: number | null
  timedOut: boolean
  durationMs: number
}

/**
 * Runs an agent process to completion. Never rejects: every failure mode is
 * reported through the result.
 */
export interface AgentRunner {
  run(request: AgentRunRequest): Promise<AgentRunResult>
}

export interface AgentRunnerConfig {
  adapter: AgentAdapter
  model?: string
  additionalFlags?: string[]
  /** Wait between SIGTERM and SIGKILL for a timed-out process (default: 5s) */
  killGraceMs?: number
}
