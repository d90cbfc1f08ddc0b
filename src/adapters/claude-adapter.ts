/**
 * Claude Code adapter
 *
 * Binary: `claude` (configurable)
 * Output format: newline-delimited stream events via `--output-format stream-json`
 */

import type { AdapterOptions, AgentAdapter, SpawnCommand } from './types.js'

/** Environment markers set by a parent Claude session; a child must not inherit them */
const NESTED_SESSION_ENV_KEYS = ['CLAUDECODE', 'CLAUDE_CODE_ENTRYPOINT']

export interface ClaudeAdapterOptions {
  /** Path or name of the CLI binary */
  binary?: string
}

/**
 * Adapter for the Claude Code CLI agent running headless.
 */
export class ClaudeCodeAdapter implements AgentAdapter {
  readonly id = 'claude-code'
  readonly displayName = 'Claude Code'
  private readonly _binary: string

  constructor(options: ClaudeAdapterOptions = {}) {
    this._binary = options.binary ?? 'claude'
  }

  /**
   * Build the spawn command for one stage.
   * Uses: `claude --dangerously-skip-permissions --verbose --output-format stream-json [--model M] -p <prompt>`
   */
  buildCommand(prompt: string, options: AdapterOptions): SpawnCommand {
    // --dangerously-skip-permissions: headless runs cannot answer permission prompts.
    // --verbose is required by the CLI when combining -p with stream-json.
    const args = [
      '--dangerously-skip-permissions',
      '--verbose',
      '--output-format',
      'stream-json',
    ]

    if (options.model !== undefined) {
      args.push('--model', options.model)
    }

    if (options.additionalFlags && options.additionalFlags.length > 0) {
      args.push(...options.additionalFlags)
    }

    args.push('-p', prompt)

    return {
      binary: this._binary,
      args,
      unsetEnvKeys: [...NESTED_SESSION_ENV_KEYS],
      cwd: options.cwd,
    }
  }
}

export function createClaudeAdapter(options: ClaudeAdapterOptions = {}): ClaudeCodeAdapter {
  return new ClaudeCodeAdapter(options)
}
