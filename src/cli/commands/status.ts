/**
 * `autofix status` command
 *
 * Displays the persisted pipeline state of the latest run, or of a given run
 * directory.
 *
 * Usage:
 *   autofix status                           Show the most recent run
 *   autofix status <runDir>                  Show a specific run
 *   autofix status --output-format json      Single NDJSON snapshot
 *
 * Exit codes:
 *   0 - Snapshot displayed
 *   1 - System error (unexpected exception)
 *   2 - Usage error (no run found, unreadable state, bad config)
 */

import type { Command } from 'commander'
import { resolve } from 'node:path'
import { ConfigError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { findLatestRunDir, readPipelineSnapshot } from '../../modules/pipeline/run-store.js'
import { createLogger } from '../../utils/logger.js'
import { renderRunStatusHuman } from '../formatters/status-formatter.js'
import { emitEvent } from '../formatters/streaming.js'
import { parseOutputFormat } from './run.js'
import type { OutputFormat } from './run.js'

const logger = createLogger('status-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const STATUS_EXIT_SUCCESS = 0
export const STATUS_EXIT_ERROR = 1
export const STATUS_EXIT_NOT_FOUND = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StatusActionOptions {
  /** Explicit run directory; the latest run under runs_dir otherwise */
  runDir?: string
  outputFormat: OutputFormat
  configPath?: string
  projectDir?: string
  runsDir?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
}

// ---------------------------------------------------------------------------
// runStatusAction: testable core logic
// ---------------------------------------------------------------------------

async function resolveRunDir(options: StatusActionOptions): Promise<string | null> {
  const cwd = options.cwd ?? process.cwd()
  if (options.runDir !== undefined) return resolve(cwd, options.runDir)

  const configSystem = createConfigSystem({
    configPath: options.configPath,
    cliOverrides: {
      ...(options.projectDir !== undefined && { project_dir: options.projectDir }),
      ...(options.runsDir !== undefined && { runs_dir: options.runsDir }),
    },
    env: options.env,
    cwd,
  })
  await configSystem.load()
  const runsDir = configSystem.getConfig().runs_dir
  const latest = await findLatestRunDir(runsDir)
  if (latest === null) {
    process.stderr.write(`Error: No runs found in ${runsDir}\n`)
  }
  return latest
}

/**
 * Core action for the status command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  try {
    const runDir = await resolveRunDir(options)
    if (runDir === null) return STATUS_EXIT_NOT_FOUND

    const snapshot = await readPipelineSnapshot(runDir)
    if (snapshot === null) {
      process.stderr.write(`Error: No readable pipeline state in ${runDir}\n`)
      return STATUS_EXIT_NOT_FOUND
    }

    if (options.outputFormat === 'json') {
      emitEvent('status:snapshot', { runDir, ...snapshot })
    } else {
      process.stdout.write(renderRunStatusHuman(runDir, snapshot) + '\n')
    }
    return STATUS_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return STATUS_EXIT_NOT_FOUND
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runStatusAction failed')
    return STATUS_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// registerStatusCommand
// ---------------------------------------------------------------------------

/**
 * Register the `autofix status` command with the CLI program.
 *
 * @param _version - Current package version (unused)
 */
export function registerStatusCommand(program: Command, _version = '0.0.0'): void {
  program
    .command('status [runDir]')
    .description('Show the pipeline state of the latest (or a given) run')
    .option('--config <path>', 'Config file (default: <project-dir>/.autofix/config.yaml)')
    .option('--project-dir <dir>', 'Repository checkout whose runs to inspect')
    .option('--runs-dir <dir>', 'Where run artifacts are written')
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON)', 'human')
    .action(
      async (
        runDir: string | undefined,
        opts: { config?: string; projectDir?: string; runsDir?: string; outputFormat: string }
      ) => {
        const outputFormat = parseOutputFormat(opts.outputFormat)
        if (outputFormat === null) {
          process.stderr.write(`Error: Invalid --output-format: ${opts.outputFormat}\n`)
          process.exitCode = STATUS_EXIT_NOT_FOUND
          return
        }

        process.exitCode = await runStatusAction({
          ...(runDir !== undefined && { runDir }),
          outputFormat,
          configPath: opts.config,
          projectDir: opts.projectDir,
          runsDir: opts.runsDir,
        })
      }
    )
}
