/**
 * `autofix run` command
 *
 * Drives each issue through triage, research and the fix-review loop, then
 * publishes a draft change request or explains on the issue why not.
 *
 * Usage:
 *   autofix run 42                           Process one issue
 *   autofix run 42 57 63 --base-branch dev   Process several, in order
 *   autofix run 42 --output-format json      NDJSON events plus a summary line
 *
 * Exit codes:
 *   0 - Every issue succeeded or was skipped
 *   1 - At least one issue failed, or a system error occurred
 *   2 - Usage or configuration error
 */

import type { Command } from 'commander'
import { ConfigError } from '../../core/errors.js'
import { createEventBus } from '../../core/event-bus.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { LogLevelSchema } from '../../modules/config/config-schema.js'
import type { AutofixConfig, PartialAutofixConfig } from '../../modules/config/config-schema.js'
import { createGitClient } from '../../modules/git/git-client.js'
import { createIssueTracker } from '../../modules/issue-tracker/github-issue-tracker.js'
import { createPipelineFactory } from '../../modules/run-coordinator/pipeline-factory.js'
import { createRunCoordinator } from '../../modules/run-coordinator/run-coordinator-impl.js'
import type { BatchSummary } from '../../modules/run-coordinator/types.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'
import { renderBatchSummaryHuman } from '../formatters/status-formatter.js'
import { createProgressRenderer } from '../formatters/progress-renderer.js'
import { attachNdjsonStream, emitEvent, forwardEvents } from '../formatters/streaming.js'
import { maskSecrets } from '../utils/masking.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_FAILED = 1
export const RUN_EXIT_USAGE = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OutputFormat = 'human' | 'json'

export interface RunActionOptions {
  /** Issue numbers as typed on the command line */
  issues: string[]
  outputFormat: OutputFormat
  configPath?: string
  projectDir?: string
  repo?: string
  baseBranch?: string
  maxIterations?: string
  runsDir?: string
  logLevel?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Positive integer from its decimal form, or null */
export function parsePositiveInt(raw: string): number | null {
  if (!/^\d+$/.test(raw.trim())) return null
  const value = parseInt(raw, 10)
  return value > 0 ? value : null
}

class UsageError extends Error {}

/** Map CLI flags onto config keys; flags that were not given stay unset */
export function buildCliOverrides(options: RunActionOptions): PartialAutofixConfig {
  const overrides: PartialAutofixConfig = {}
  if (options.projectDir !== undefined) overrides.project_dir = options.projectDir
  if (options.repo !== undefined) overrides.repo = options.repo
  if (options.baseBranch !== undefined) overrides.base_branch = options.baseBranch
  if (options.runsDir !== undefined) overrides.runs_dir = options.runsDir
  if (options.maxIterations !== undefined) {
    const maxIterations = parsePositiveInt(options.maxIterations)
    if (maxIterations === null) {
      throw new UsageError(`Invalid --max-iterations: ${options.maxIterations}`)
    }
    overrides.pipeline = { max_iterations: maxIterations }
  }
  if (options.logLevel !== undefined) {
    const level = LogLevelSchema.safeParse(options.logLevel)
    if (!level.success) {
      throw new UsageError(`Invalid --log-level: ${options.logLevel}`)
    }
    overrides.log_level = level.data
  }
  return overrides
}

// ---------------------------------------------------------------------------
// runRunAction: testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the run command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runRunAction(options: RunActionOptions): Promise<number> {
  const { outputFormat } = options

  // Validate arguments before touching config or git
  const issueNumbers: number[] = []
  for (const raw of options.issues) {
    const issueNumber = parsePositiveInt(raw)
    if (issueNumber === null) {
      process.stderr.write(`Error: Invalid issue number: ${raw}\n`)
      return RUN_EXIT_USAGE
    }
    issueNumbers.push(issueNumber)
  }

  let config: AutofixConfig
  try {
    const configSystem = createConfigSystem({
      configPath: options.configPath,
      cliOverrides: buildCliOverrides(options),
      env: options.env,
      cwd: options.cwd,
    })
    await configSystem.load()
    config = configSystem.getConfig()
  } catch (err) {
    if (err instanceof UsageError || err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return RUN_EXIT_USAGE
    }
    throw err
  }

  setLogLevel(config.log_level)

  const eventBus = createEventBus()
  if (outputFormat === 'json') {
    attachNdjsonStream(eventBus)
  } else {
    const renderer = createProgressRenderer(process.stdout)
    forwardEvents(eventBus, (event) => renderer.render(event))
    const plural = issueNumbers.length === 1 ? '' : 's'
    process.stdout.write(`autofix: ${String(issueNumbers.length)} issue${plural} in ${config.project_dir}\n`)
  }

  const git = createGitClient(config.project_dir)
  const coordinator = createRunCoordinator({
    config,
    git,
    tracker: createIssueTracker({ repo: config.repo, cwd: config.project_dir }),
    pipelineFactory: createPipelineFactory({ config, git, eventBus }),
    eventBus,
  })

  let summary: BatchSummary
  try {
    summary = await coordinator.processBatch(issueNumbers)
  } catch (err) {
    const message = maskSecrets(err instanceof Error ? err.message : String(err))
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runRunAction failed')
    return RUN_EXIT_FAILED
  }

  if (outputFormat === 'json') {
    emitEvent('run:summary', {
      success: summary.success,
      skipped: summary.skipped,
      failed: summary.failed,
      total: issueNumbers.length,
      runsDir: config.runs_dir,
    })
  } else {
    process.stdout.write(renderBatchSummaryHuman(summary, config.runs_dir) + '\n')
  }

  return summary.failed.length > 0 ? RUN_EXIT_FAILED : RUN_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

/** Reads `--output-format`; null when it is neither human nor json */
export function parseOutputFormat(raw: string): OutputFormat | null {
  return raw === 'human' || raw === 'json' ? raw : null
}

/**
 * Register the `autofix run` command with the CLI program.
 *
 * @param _version - Current package version (unused)
 */
export function registerRunCommand(program: Command, _version = '0.0.0'): void {
  program
    .command('run <issues...>')
    .description('Triage, fix and review the given issues, opening draft pull requests')
    .option('--config <path>', 'Config file (default: <project-dir>/.autofix/config.yaml)')
    .option('--project-dir <dir>', 'Repository checkout to work in')
    .option('--repo <owner/name>', 'Repository on the issue tracker')
    .option('--base-branch <branch>', 'Branch to fix against')
    .option('--max-iterations <n>', 'Upper bound on fix-review iterations')
    .option('--runs-dir <dir>', 'Where run artifacts are written')
    .option('--log-level <level>', 'Log level for stderr diagnostics')
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON)', 'human')
    .action(
      async (
        issues: string[],
        opts: {
          config?: string
          projectDir?: string
          repo?: string
          baseBranch?: string
          maxIterations?: string
          runsDir?: string
          logLevel?: string
          outputFormat: string
        }
      ) => {
        const outputFormat = parseOutputFormat(opts.outputFormat)
        if (outputFormat === null) {
          process.stderr.write(`Error: Invalid --output-format: ${opts.outputFormat}\n`)
          process.exitCode = RUN_EXIT_USAGE
          return
        }

        process.exitCode = await runRunAction({
          issues,
          outputFormat,
          configPath: opts.config,
          projectDir: opts.projectDir,
          repo: opts.repo,
          baseBranch: opts.baseBranch,
          maxIterations: opts.maxIterations,
          runsDir: opts.runsDir,
          logLevel: opts.logLevel,
        })
      }
    )
}
