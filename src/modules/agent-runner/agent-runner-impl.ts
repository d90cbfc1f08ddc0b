/**
 * AgentRunnerImpl: spawns the agent CLI, collects its output and enforces the
 * stage timeout.
 *
 * - Uses child_process.spawn, not exec: transcripts can be large
 * - Prompt goes on the command line; stdin is closed
 * - On timeout the process gets SIGTERM, then SIGKILL after a grace period;
 *   the run resolves once the process has closed
 */

import { spawn } from 'node:child_process'
import { writeFile } from 'node:fs/promises'
import type { SpawnCommand } from '../../adapters/types.js'
import { createLogger } from '../../utils/logger.js'
import { DEFAULT_KILL_GRACE_MS } from './types.js'
import type { AgentRunRequest, AgentRunResult, AgentRunner, AgentRunnerConfig } from './types.js'

const logger = createLogger('agent-runner')

// ---------------------------------------------------------------------------
// AgentRunnerImpl
// ---------------------------------------------------------------------------

export class AgentRunnerImpl implements AgentRunner {
  private readonly _config: AgentRunnerConfig

  constructor(config: AgentRunnerConfig) {
    this._config = config
  }

  async run(request: AgentRunRequest): Promise<AgentRunResult> {
    const cmd = this._config.adapter.buildCommand(request.prompt, {
      cwd: request.cwd,
      ...(this._config.model !== undefined ? { model: this._config.model } : {}),
      ...(this._config.additionalFlags !== undefined
        ? { additionalFlags: this._config.additionalFlags }
        : {}),
    })

    logger.debug(
      { label: request.label, binary: cmd.binary, cwd: cmd.cwd, timeoutMs: request.timeoutMs },
      'Starting agent process'
    )

    const result = await this._spawn(cmd, request)

    if (request.logFile !== undefined) {
      await this._writeLog(request.logFile, result.output)
    }

    if (result.success) {
      logger.debug({ label: request.label, durationMs: result.durationMs }, 'Agent process completed')
    } else {
      logger.warn(
        {
          label: request.label,
          exitCode: result.exitCode,
          timedOut: result.timedOut,
          durationMs: result.durationMs,
        },
        'Agent process did not succeed'
      )
    }

    return result
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private _spawn(cmd: SpawnCommand, request: AgentRunRequest): Promise<AgentRunResult> {
    return new Promise((resolve) => {
      const env: NodeJS.ProcessEnv = { ...process.env, ...cmd.env }
      for (const key of cmd.unsetEnvKeys ?? []) {
        delete env[key]
      }

      const startedAt = Date.now()
      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      let settled = false
      let timedOut = false
      const timers: Array<ReturnType<typeof setTimeout>> = []
      const graceMs = this._config.killGraceMs ?? DEFAULT_KILL_GRACE_MS
      const timeoutError = `${request.label} timed out after ${String(request.timeoutMs)}ms`

      const finish = (partial: Omit<AgentRunResult, 'output' | 'durationMs'>): void => {
        if (settled) return
        settled = true
        for (const timer of timers) clearTimeout(timer)
        resolve({
          ...partial,
          output: Buffer.concat(stdoutChunks).toString('utf-8'),
          durationMs: Date.now() - startedAt,
        })
      }

      const finishTimedOut = (): void => {
        finish({ success: false, error: timeoutError, exitCode: null, timedOut: true })
      }

      const proc = spawn(cmd.binary, cmd.args, {
        cwd: cmd.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      // Timeout: SIGTERM, SIGKILL after the grace period, then stop waiting
      // after a second grace period. The run settles on 'close' in between.
      timers.push(
        setTimeout(() => {
          timedOut = true
          proc.kill('SIGTERM')
          timers.push(
            setTimeout(() => {
              logger.warn({ label: request.label, pid: proc.pid }, 'Agent ignored SIGTERM; sending SIGKILL')
              proc.kill('SIGKILL')
              timers.push(
                setTimeout(() => {
                  logger.error({ label: request.label, pid: proc.pid }, 'Agent did not exit after SIGKILL')
                  finishTimedOut()
                }, graceMs)
              )
            }, graceMs)
          )
        }, request.timeoutMs)
      )

      proc.on('error', (err) => {
        finish({
          success: false,
          error: `Failed to start ${cmd.binary}: ${err.message}`,
          exitCode: null,
          timedOut: false,
        })
      })

      proc.on('close', (exitCode) => {
        if (timedOut) {
          finishTimedOut()
          return
        }
        const stderr = Buffer.concat(stderrChunks).toString('utf-8').trim()
        if (exitCode === 0) {
          finish({ success: true, error: '', exitCode, timedOut: false })
          return
        }
        finish({
          success: false,
          error: stderr !== '' ? stderr : `Process exited with code ${String(exitCode ?? 'null')}`,
          exitCode,
          timedOut: false,
        })
      })
    })
  }

  private async _writeLog(logFile: string, output: string): Promise<void> {
    try {
      await writeFile(logFile, output, 'utf-8')
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      logger.warn({ logFile, error: message }, 'Could not write agent log')
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createAgentRunner(config: AgentRunnerConfig): AgentRunner {
  return new AgentRunnerImpl(config)
}
