/**
 * RunCoordinator: takes one issue from the tracker to a draft change request
 * (or an explanatory comment), with the pipeline in the middle.
 *
 * Per issue:
 *   fetch → vague-issue gate → run directory → git preparation → pipeline
 *   → publish (SUCCESS) | explain and clean up (SKIPPED) | clean up (FAILED, BLOCKED)
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { GitError, IssueTrackerError } from '../../core/errors.js'
import type { Issue } from '../../core/types.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import type { AutofixConfig } from '../config/config-schema.js'
import type { GitClient } from '../git/git-client.js'
import type { IssueTracker } from '../issue-tracker/types.js'
import type { PipelineResult } from '../pipeline/types.js'
import {
  VAGUE_ISSUE_COMMENT,
  buildChangeRequestBody,
  buildFixNoChangesComment,
  buildNoCommitsComment,
  buildSkipComment,
  buildSuccessComment,
  changeRequestTitle,
  commitMessage,
  confidenceLabel,
} from './comments.js'
import type {
  BatchSummary,
  IssueOutcome,
  PipelineFactory,
  RunCoordinator,
  RunCoordinatorDeps,
} from './types.js'

const logger = createLogger('run-coordinator')

/** Never committed, whatever the agents leave in the tree */
export const COMMIT_EXCLUDES: readonly string[] = ['.env', '*.env']

function errorMessage(err: unknown): string {
  return maskSecrets(err instanceof Error ? err.message : String(err))
}

/**
 * True when the body is too thin to act on: fewer than `minChars`
 * characters or fewer than `minWords` words, after trimming.
 */
export function isVagueIssue(body: string, minChars: number, minWords: number): boolean {
  const trimmed = body.trim()
  const words = trimmed === '' ? 0 : trimmed.split(/\s+/).length
  return trimmed.length < minChars || words < minWords
}

export function branchNameFor(prefix: string, issueNumber: number): string {
  return `${prefix}${String(issueNumber)}`
}

// ---------------------------------------------------------------------------
// RunCoordinatorImpl
// ---------------------------------------------------------------------------

export class RunCoordinatorImpl implements RunCoordinator {
  private readonly _config: AutofixConfig
  private readonly _git: GitClient
  private readonly _tracker: IssueTracker
  private readonly _pipelineFactory: PipelineFactory
  private readonly _eventBus: TypedEventBus | undefined

  constructor(deps: RunCoordinatorDeps) {
    this._config = deps.config
    this._git = deps.git
    this._tracker = deps.tracker
    this._pipelineFactory = deps.pipelineFactory
    this._eventBus = deps.eventBus
  }

  processIssue(issueNumber: number): Promise<IssueOutcome> {
    return this._process(issueNumber, 1, 1)
  }

  async processBatch(issueNumbers: readonly number[]): Promise<BatchSummary> {
    const summary: BatchSummary = { success: [], skipped: [], failed: [], outcomes: [] }

    for (const [i, issueNumber] of issueNumbers.entries()) {
      let outcome: IssueOutcome
      try {
        outcome = await this._process(issueNumber, i + 1, issueNumbers.length)
      } catch (err) {
        const detail = `Unexpected error: ${errorMessage(err)}`
        logger.error({ issueNumber, err }, 'Unexpected error processing issue')
        outcome = { issueNumber, status: 'FAILED', detail }
        this._eventBus?.emit('issue:done', { issueNumber, outcome: 'FAILED', detail })
      }

      summary.outcomes.push(outcome)
      if (outcome.status === 'SUCCESS') summary.success.push(issueNumber)
      else if (outcome.status === 'SKIPPED') summary.skipped.push(issueNumber)
      else summary.failed.push(issueNumber)
    }

    return summary
  }

  // -------------------------------------------------------------------------
  // Per-issue workflow
  // -------------------------------------------------------------------------

  private async _process(issueNumber: number, index: number, total: number): Promise<IssueOutcome> {
    this._eventBus?.emit('issue:start', { issueNumber, index, total })
    const outcome = await this._run(issueNumber)
    this._eventBus?.emit('issue:done', {
      issueNumber,
      outcome: outcome.status,
      detail: outcome.detail,
      ...(outcome.changeRequestUrl !== undefined ? { changeRequestUrl: outcome.changeRequestUrl } : {}),
    })
    return outcome
  }

  private async _run(issueNumber: number): Promise<IssueOutcome> {
    const config = this._config
    const branch = branchNameFor(config.branch_prefix, issueNumber)

    // 1. Fetch
    let issue: Issue
    try {
      issue = await this._tracker.fetchIssue(issueNumber)
    } catch (err) {
      const detail = `Failed to fetch issue: ${errorMessage(err)}`
      logger.error({ issueNumber }, detail)
      return { issueNumber, status: 'FAILED', detail }
    }
    logger.info({ issueNumber, title: issue.title, labels: issue.labels }, 'Fetched issue')

    // 2. Vague-issue gate
    const quality = config.issue_quality
    if (isVagueIssue(issue.body, quality.min_body_chars, quality.min_words)) {
      logger.warn({ issueNumber }, 'Issue description too vague, asking for details')
      await this._retireBranch(branch)
      await this._comment(issueNumber, VAGUE_ISSUE_COMMENT)
      return { issueNumber, status: 'SKIPPED', detail: 'Issue description too vague' }
    }

    // 3. Run directory
    const { store, pipeline } = await this._pipelineFactory(issue)
    await store.writeIssue(issue)
    const runDir = store.runDir

    // 4. Git preparation
    try {
      if (await this._git.isDirty()) {
        const detail = 'Working tree has uncommitted changes'
        logger.error({ issueNumber, projectDir: config.project_dir }, detail)
        return { issueNumber, status: 'FAILED', detail, runDir }
      }
      await this._git.syncToRemote(config.remote, config.base_branch)
      const existing = await this._tracker.findOpenChangeRequest(branch)
      if (existing !== null) {
        logger.warn({ issueNumber, changeRequest: existing.number }, 'Closing existing change request')
        await this._tracker.closeChangeRequest(existing.number)
      }
      await this._git.deleteBranch(branch)
      await this._git.deleteRemoteBranch(branch, config.remote)
      await this._git.createBranch(branch)
      logger.info({ issueNumber, branch }, 'Created branch')
    } catch (err) {
      if (!(err instanceof GitError) && !(err instanceof IssueTrackerError)) throw err
      const detail = `Git preparation failed: ${errorMessage(err)}`
      logger.error({ issueNumber }, detail)
      return { issueNumber, status: 'FAILED', detail, runDir }
    }

    // 5. Pipeline
    let result: PipelineResult
    try {
      result = await pipeline.run(issue)
    } catch (err) {
      logger.error({ issueNumber, err }, 'Pipeline threw, cleaning up')
      await this._cleanup(branch)
      throw err
    }

    // 6. Outcome
    const { snapshot } = result
    const pipelineStatus = snapshot.status
    switch (pipelineStatus) {
      case 'SUCCESS':
        return { ...(await this._publish(issue, branch, result)), runDir, pipelineStatus }
      case 'SKIPPED': {
        await this._cleanup(branch)
        await this._explainSkip(issue, result)
        const detail = snapshot.failure_reason ?? 'Skipped'
        logger.warn({ issueNumber, reason: detail }, 'Pipeline skipped')
        return { issueNumber, status: 'SKIPPED', detail, runDir, pipelineStatus }
      }
      case 'RUNNING':
        await this._cleanup(branch)
        throw new Error(`Pipeline for issue #${String(issueNumber)} returned without a terminal status`)
      case 'FAILED':
      case 'BLOCKED': {
        await this._cleanup(branch)
        const detail = snapshot.failure_reason ?? pipelineStatus
        logger.error({ issueNumber, status: pipelineStatus, reason: detail }, 'Pipeline did not succeed')
        return { issueNumber, status: 'FAILED', detail, runDir, pipelineStatus }
      }
    }
  }

  // -------------------------------------------------------------------------
  // SUCCESS
  // -------------------------------------------------------------------------

  private async _publish(issue: Issue, branch: string, result: PipelineResult): Promise<IssueOutcome> {
    const config = this._config
    const issueNumber = issue.number
    const aggregate = result.snapshot.aggregate_confidence

    try {
      if (await this._git.hasChanges()) {
        await this._git.stageAll(COMMIT_EXCLUDES)
        await this._git.commit(commitMessage(issueNumber, issue.title))
      }

      if (!(await this._git.hasUnpushedCommits(config.remote, branch))) {
        logger.warn({ issueNumber }, 'No commits to push')
        await this._comment(issueNumber, buildNoCommitsComment(aggregate))
        return { issueNumber, status: 'SKIPPED', detail: 'No code changes to push' }
      }

      await this._git.push(config.remote, branch)

      const confidence = aggregate ?? 0
      const changeRequest = await this._tracker.createChangeRequest({
        title: changeRequestTitle(issue.title),
        body: buildChangeRequestBody(issueNumber, confidence, result.snapshot.confidence_breakdown),
        head: branch,
        base: config.base_branch,
        draft: true,
        labels: [confidenceLabel(confidence)],
      })
      logger.info({ issueNumber, url: changeRequest.url }, 'Created change request')

      const fix = result.agentStates.fix
      const research = result.agentStates.research
      const fixPayload = fix !== undefined && fix.status !== 'FAILED' ? fix.payload : null
      await this._comment(
        issueNumber,
        buildSuccessComment({
          changeRequestUrl: changeRequest.url,
          filesChanged: fixPayload?.files_changed ?? [],
          rootCause: research !== undefined && research.status !== 'FAILED' ? research.payload.root_cause : '',
          caveats: fixPayload?.caveats ?? [],
          testingNotes: fixPayload?.testing_notes ?? [],
          confidence,
        })
      )

      return {
        issueNumber,
        status: 'SUCCESS',
        detail: `Created ${changeRequest.url}`,
        changeRequestUrl: changeRequest.url,
      }
    } catch (err) {
      if (!(err instanceof GitError) && !(err instanceof IssueTrackerError)) throw err
      const detail = `Failed to create change request: ${errorMessage(err)}`
      logger.error({ issueNumber }, detail)
      return { issueNumber, status: 'FAILED', detail }
    }
  }

  // -------------------------------------------------------------------------
  // SKIPPED
  // -------------------------------------------------------------------------

  private async _explainSkip(issue: Issue, result: PipelineResult): Promise<void> {
    const { triage, research, fix } = result.agentStates
    const triagePayload = triage !== undefined && triage.status !== 'FAILED' ? triage.payload : null

    if (fix?.status === 'SKIPPED') {
      const researchSummary = research !== undefined && research.status !== 'FAILED' ? research.payload.summary : ''
      await this._comment(issue.number, buildFixNoChangesComment(triagePayload?.summary ?? '', researchSummary))
      return
    }
    await this._comment(issue.number, buildSkipComment(triagePayload))
  }

  // -------------------------------------------------------------------------
  // Best-effort helpers
  // -------------------------------------------------------------------------

  /** Post a comment; failures are logged, never raised */
  private async _comment(issueNumber: number, body: string): Promise<void> {
    try {
      await this._tracker.postComment(issueNumber, body)
    } catch (err) {
      logger.warn({ issueNumber, error: errorMessage(err) }, 'Failed to comment on issue')
    }
  }

  /** Close the branch's change request and delete the branch locally and remotely */
  private async _retireBranch(branch: string): Promise<void> {
    try {
      const existing = await this._tracker.findOpenChangeRequest(branch)
      if (existing !== null) await this._tracker.closeChangeRequest(existing.number)
    } catch (err) {
      logger.warn({ branch, error: errorMessage(err) }, 'Could not close existing change request')
    }
    await this._git.deleteBranch(branch)
    await this._git.deleteRemoteBranch(branch, this._config.remote)
  }

  /** Discard agent edits and return to the base branch */
  private async _cleanup(branch: string): Promise<void> {
    const steps: Array<[string, () => Promise<unknown>]> = [
      ['discard changes', () => this._git.discardChanges()],
      ['checkout base branch', () => this._git.checkout(this._config.base_branch)],
      ['delete branch', () => this._git.deleteBranch(branch)],
    ]
    for (const [step, action] of steps) {
      try {
        await action()
      } catch (err) {
        logger.warn({ branch, step, error: errorMessage(err) }, 'Git cleanup step failed')
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createRunCoordinator(deps: RunCoordinatorDeps): RunCoordinator {
  return new RunCoordinatorImpl(deps)
}
