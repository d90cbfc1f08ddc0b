/**
 * Run a short-lived CLI (git, gh) to completion and capture its output.
 *
 * Never rejects: a spawn failure is reported as exit code 1 with the error
 * message in stderr, so callers decide which failures matter.
 */

import { spawn } from 'node:child_process'
import { createLogger } from './logger.js'

const logger = createLogger('spawn')

export interface SpawnCommandOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export interface CommandResult {
  /** Raw stdout; callers trim where whitespace is not significant */
  stdout: string
  stderr: string
  code: number
}

export function spawnCommand(
  binary: string,
  args: string[],
  options: SpawnCommandOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve) => {
    logger.debug({ binary, args, cwd: options.cwd }, 'spawnCommand')

    const proc = spawn(binary, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let settled = false

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf-8')
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf-8')
    })

    proc.on('close', (code: number | null) => {
      if (settled) return
      settled = true
      resolve({ stdout, stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err: Error) => {
      if (settled) return
      settled = true
      resolve({ stdout: '', stderr: err.message, code: 1 })
    })
  })
}
