/**
 * Type definitions for agent CLI adapters
 */

/**
 * A spawn command descriptor used to invoke a CLI agent.
 * Contains all information needed to execute an agent process.
 */
export interface SpawnCommand {
  /** The binary to execute (e.g., "claude") */
  binary: string
  /** Arguments to pass to the binary */
  args: string[]
  /** Optional environment variable overrides */
  env?: Record<string, string>
  /** Environment variables to remove from the inherited environment */
  unsetEnvKeys?: string[]
  /** Working directory for the process */
  cwd: string
}

/**
 * Options passed to the adapter for each invocation.
 */
export interface AdapterOptions {
  /** Repository checkout the agent works in */
  cwd: string
  /** Optional model identifier override */
  model?: string
  /** Optional additional CLI flags to append */
  additionalFlags?: string[]
}

/**
 * Builds the command line for one agent CLI.
 */
export interface AgentAdapter {
  readonly id: string
  readonly displayName: string
  buildCommand(prompt: string, options: AdapterOptions): SpawnCommand
}
