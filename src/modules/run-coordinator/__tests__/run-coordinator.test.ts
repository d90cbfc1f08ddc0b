/**
 * Tests for RunCoordinatorImpl
 *
 * Git, the issue tracker and the pipeline are faked behind their interfaces;
 * the assertions cover which calls happen, in what order, and the outcome.
 */

import { describe, it, expect, vi } from 'vitest'
import { createEventBus } from '../../../core/event-bus.js'
import type { PipelineEvents } from '../../../core/event-bus.types.js'
import { GitError, IssueTrackerError } from '../../../core/errors.js'
import type { Issue, TerminalPipelineStatus } from '../../../core/types.js'
import type { StageStates } from '../../agents/types.js'
import type { AutofixConfig } from '../../config/config-schema.js'
import { DEFAULT_CONFIG } from '../../config/defaults.js'
import type { GitClient } from '../../git/git-client.js'
import type { IssueTracker } from '../../issue-tracker/types.js'
import type { RunStore } from '../../pipeline/run-store.js'
import type { Pipeline, PipelineResult, PipelineSnapshot } from '../../pipeline/types.js'
import {
  TEST_ISSUE,
  completedState,
  fixPayload,
  researchPayload,
  reviewPayload,
  triagePayload,
} from '../../agents/__tests__/fakes.js'
import { VAGUE_ISSUE_COMMENT, buildSkipComment } from '../comments.js'
import { createRunCoordinator, isVagueIssue } from '../run-coordinator-impl.js'
import type { PipelineFactory } from '../types.js'

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

const CONFIG: AutofixConfig = { ...DEFAULT_CONFIG, project_dir: '/repo', runs_dir: '/runs' }
const BRANCH = 'autofix-42'
const PR_URL = 'https://example.test/acme/widgets/pull/7'

function fakeGit(overrides: Partial<GitClient> = {}) {
  const calls: string[] = []
  const record =
    <T>(name: string, value: T) =>
    (...args: unknown[]): Promise<T> => {
      calls.push(`${name}(${args.map((a) => JSON.stringify(a)).join(', ')})`)
      return Promise.resolve(value)
    }
  const git: GitClient = {
    repoPath: CONFIG.project_dir,
    isDirty: vi.fn(record('isDirty', false)),
    syncToRemote: vi.fn(record('syncToRemote', undefined)),
    createBranch: vi.fn(record('createBranch', undefined)),
    deleteBranch: vi.fn(record('deleteBranch', true)),
    deleteRemoteBranch: vi.fn(record('deleteRemoteBranch', true)),
    hasChanges: vi.fn(record('hasChanges', true)),
    hasUnpushedCommits: vi.fn(record('hasUnpushedCommits', true)),
    stageAll: vi.fn(record('stageAll', undefined)),
    commit: vi.fn(record('commit', undefined)),
    push: vi.fn(record('push', undefined)),
    discardChanges: vi.fn(record('discardChanges', undefined)),
    checkout: vi.fn(record('checkout', undefined)),
    getWorkingDiff: vi.fn(record('getWorkingDiff', '')),
    ...overrides,
  }
  return { git, calls }
}

function fakeTracker(overrides: Partial<IssueTracker> = {}) {
  const comments: Array<{ issueNumber: number; body: string }> = []
  const tracker: IssueTracker = {
    fetchIssue: vi.fn(() => Promise.resolve(TEST_ISSUE)),
    postComment: vi.fn((issueNumber: number, body: string) => {
      comments.push({ issueNumber, body })
      return Promise.resolve()
    }),
    findOpenChangeRequest: vi.fn(() => Promise.resolve(null)),
    closeChangeRequest: vi.fn(() => Promise.resolve()),
    createChangeRequest: vi.fn(() => Promise.resolve({ number: 7, url: PR_URL, headBranch: BRANCH })),
    ...overrides,
  }
  return { tracker, comments }
}

function memoryStore(): RunStore & { issues: Issue[] } {
  const issues: Issue[] = []
  return {
    runDir: '/runs/test',
    issues,
    writeIssue: (issue) => {
      issues.push(issue)
      return Promise.resolve()
    },
    writePipelineState: () => Promise.resolve(),
    writeAgentState: () => Promise.resolve(),
    writePrompt: () => Promise.resolve(),
    logPath: (name) => `/runs/test/${name}.log`,
    readPipelineState: () => Promise.resolve(null),
  }
}

function pipelineResult(
  status: TerminalPipelineStatus,
  agentStates: StageStates,
  extra: Partial<PipelineSnapshot> = {}
): PipelineResult {
  return {
    snapshot: {
      status,
      issue_number: 42,
      current_agent: null,
      agents_completed: [],
      failure_reason: null,
      iterations: 1,
      aggregate_confidence: status === 'SUCCESS' ? 0.81 : null,
      confidence_breakdown: { triage: 0.9, research: 0.8, fix: 0.7, review: 0.9 },
      started_at: '2026-01-01T00:00:00.000Z',
      completed_at: '2026-01-01T00:05:00.000Z',
      ...extra,
    },
    agentStates,
    revisions: [],
  }
}

function successResult(extra: Partial<PipelineSnapshot> = {}): PipelineResult {
  return pipelineResult(
    'SUCCESS',
    {
      triage: completedState('triage', 'triage', triagePayload()),
      research: completedState('research', 'research', researchPayload()),
      fix: completedState('fix', 'fix', fixPayload({ caveats: ['Only covers YAML'] })),
      review: completedState('review', 'review', reviewPayload({ verdict: 'APPROVE', confidence: 0.9 })),
    },
    extra
  )
}

function harness(options: {
  result?: PipelineResult | Error
  git?: Partial<GitClient>
  tracker?: Partial<IssueTracker>
} = {}) {
  const { git, calls } = fakeGit(options.git)
  const { tracker, comments } = fakeTracker(options.tracker)
  const store = memoryStore()
  const outcome = options.result ?? successResult()
  const pipeline: Pipeline = {
    run: vi.fn(() => (outcome instanceof Error ? Promise.reject(outcome) : Promise.resolve(outcome))),
  }
  const pipelineFactory = vi.fn<PipelineFactory>(() => Promise.resolve({ store, pipeline }))
  const eventBus = createEventBus()
  const coordinator = createRunCoordinator({ config: CONFIG, git, tracker, pipelineFactory, eventBus })
  return { coordinator, git, calls, tracker, comments, store, pipeline, pipelineFactory, eventBus }
}

const CLEANUP_CALLS = ['discardChanges()', 'checkout("main")', `deleteBranch("${BRANCH}")`]

// ---------------------------------------------------------------------------
// isVagueIssue
// ---------------------------------------------------------------------------

describe('isVagueIssue', () => {
  it('flags short or wordless bodies', () => {
    expect(isVagueIssue('', 50, 10)).toBe(true)
    expect(isVagueIssue('It is broken.', 50, 10)).toBe(true)
    // 60 characters but a single word
    expect(isVagueIssue('x'.repeat(60), 50, 10)).toBe(true)
    expect(isVagueIssue(TEST_ISSUE.body, 50, 10)).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// processIssue
// ---------------------------------------------------------------------------

describe('RunCoordinatorImpl.processIssue', () => {
  it('commits, pushes and opens a labelled draft change request on success', async () => {
    const h = harness()

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome).toEqual({
      issueNumber: 42,
      status: 'SUCCESS',
      detail: `Created ${PR_URL}`,
      changeRequestUrl: PR_URL,
      runDir: '/runs/test',
      pipelineStatus: 'SUCCESS',
    })
    expect(h.store.issues).toEqual([TEST_ISSUE])
    expect(h.calls).toEqual([
      'isDirty()',
      'syncToRemote("origin", "main")',
      `deleteBranch("${BRANCH}")`,
      `deleteRemoteBranch("${BRANCH}", "origin")`,
      `createBranch("${BRANCH}")`,
      'hasChanges()',
      'stageAll([".env","*.env"])',
      'commit("fix: Crash when config file is empty\\n\\nFixes #42")',
      `hasUnpushedCommits("origin", "${BRANCH}")`,
      `push("origin", "${BRANCH}")`,
    ])
    expect(h.tracker.createChangeRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        title: 'fix: Crash when config file is empty',
        head: BRANCH,
        base: 'main',
        draft: true,
        labels: ['high-confidence'],
      })
    )
    expect(h.comments).toHaveLength(1)
    expect(h.comments[0]?.body).toBe(
      [
        '**Automated Fix Created**',
        '',
        `**PR:** ${PR_URL}`,
        '',
        '**Files changed:** `src/config.ts`',
        '',
        '**Root cause:** loadConfig dereferences the parsed YAML without a null check',
        '',
        '**Caveats:**',
        '- Only covers YAML',
        '',
        '**Confidence:** 81%',
        '',
        'Please review the PR before merging.',
      ].join('\n')
    )
  })

  it('skips the commit when the agents already committed', async () => {
    const h = harness({ git: { hasChanges: vi.fn(() => Promise.resolve(false)) } })

    await h.coordinator.processIssue(42)

    expect(h.git.commit).not.toHaveBeenCalled()
    expect(h.git.push).toHaveBeenCalledWith('origin', BRANCH)
  })

  it('labels a mid-range aggregate as medium confidence', async () => {
    const h = harness({ result: successResult({ aggregate_confidence: 0.7 }) })

    await h.coordinator.processIssue(42)

    expect(h.tracker.createChangeRequest).toHaveBeenCalledWith(
      expect.objectContaining({ labels: ['medium-confidence'] })
    )
  })

  it('comments and skips when there is nothing to push', async () => {
    const h = harness({
      git: {
        hasChanges: vi.fn(() => Promise.resolve(false)),
        hasUnpushedCommits: vi.fn(() => Promise.resolve(false)),
      },
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome.status).toBe('SKIPPED')
    expect(outcome.detail).toBe('No code changes to push')
    expect(h.git.push).not.toHaveBeenCalled()
    expect(h.tracker.createChangeRequest).not.toHaveBeenCalled()
    expect(h.comments).toEqual([
      {
        issueNumber: 42,
        body: 'Pipeline completed but no code changes were made.\n\nAggregate confidence: 0.81',
      },
    ])
  })

  it('closes a change request left open from an earlier run', async () => {
    const h = harness({
      tracker: {
        findOpenChangeRequest: vi.fn(() => Promise.resolve({ number: 3, url: 'u', headBranch: BRANCH })),
      },
    })

    await h.coordinator.processIssue(42)

    expect(h.tracker.findOpenChangeRequest).toHaveBeenCalledWith(BRANCH)
    expect(h.tracker.closeChangeRequest).toHaveBeenCalledWith(3)
  })

  it('asks for details on a vague issue without running the pipeline', async () => {
    const h = harness({
      tracker: {
        fetchIssue: vi.fn(() => Promise.resolve({ ...TEST_ISSUE, body: 'It is broken.' })),
        findOpenChangeRequest: vi.fn(() => Promise.resolve({ number: 5, url: 'u', headBranch: BRANCH })),
      },
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome).toEqual({ issueNumber: 42, status: 'SKIPPED', detail: 'Issue description too vague' })
    expect(h.pipelineFactory).not.toHaveBeenCalled()
    expect(h.tracker.closeChangeRequest).toHaveBeenCalledWith(5)
    expect(h.calls).toEqual([`deleteBranch("${BRANCH}")`, `deleteRemoteBranch("${BRANCH}", "origin")`])
    expect(h.comments).toEqual([{ issueNumber: 42, body: VAGUE_ISSUE_COMMENT }])
  })

  it('fails when the issue cannot be fetched', async () => {
    const h = harness({
      tracker: { fetchIssue: vi.fn(() => Promise.reject(new IssueTrackerError('gh issue view failed: not found'))) },
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome).toEqual({
      issueNumber: 42,
      status: 'FAILED',
      detail: 'Failed to fetch issue: gh issue view failed: not found',
    })
    expect(h.pipelineFactory).not.toHaveBeenCalled()
  })

  it('refuses to run on a dirty working tree', async () => {
    const h = harness({ git: { isDirty: vi.fn(() => Promise.resolve(true)) } })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome).toEqual({
      issueNumber: 42,
      status: 'FAILED',
      detail: 'Working tree has uncommitted changes',
      runDir: '/runs/test',
    })
    expect(h.git.syncToRemote).not.toHaveBeenCalled()
    expect(h.pipeline.run).not.toHaveBeenCalled()
  })

  it('fails when git preparation fails', async () => {
    const h = harness({
      git: { syncToRemote: vi.fn(() => Promise.reject(new GitError('git fetch failed: no remote'))) },
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome.status).toBe('FAILED')
    expect(outcome.detail).toBe('Git preparation failed: git fetch failed: no remote')
    expect(h.pipeline.run).not.toHaveBeenCalled()
  })

  it('explains a triage skip and cleans up', async () => {
    const triage = triagePayload({
      classification: 'OUT_OF_SCOPE',
      confidence: 0.85,
      summary: 'Feature request',
      reasoning: 'Asks for a new export format',
    })
    const h = harness({
      result: pipelineResult(
        'SKIPPED',
        { triage: completedState('triage', 'triage', triage, 'SKIPPED') },
        { failure_reason: 'Triage classification: OUT_OF_SCOPE' }
      ),
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome).toEqual({
      issueNumber: 42,
      status: 'SKIPPED',
      detail: 'Triage classification: OUT_OF_SCOPE',
      runDir: '/runs/test',
      pipelineStatus: 'SKIPPED',
    })
    expect(h.calls.slice(-3)).toEqual(CLEANUP_CALLS)
    expect(h.comments).toEqual([{ issueNumber: 42, body: buildSkipComment(triage) }])
  })

  it('reports a fix that changed nothing with the analysis so far', async () => {
    const h = harness({
      result: pipelineResult('SKIPPED', {
        triage: completedState('triage', 'triage', triagePayload()),
        research: completedState('research', 'research', researchPayload()),
        fix: completedState('fix', 'fix', fixPayload({ files_changed: [], summary: '' }), 'SKIPPED'),
      }),
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome.status).toBe('SKIPPED')
    expect(outcome.detail).toBe('Skipped')
    expect(h.comments[0]?.body).toBe(
      [
        '**Auto-Fix Analysis Complete**',
        '',
        'The issue was analyzed and deemed fixable, but the fix agent was unable to make any code changes.',
        '',
        '## Triage Analysis',
        'Empty config crashes loader',
        '',
        '## Research Findings',
        'Null document not handled',
        '',
        '## Next Steps',
        '- A human developer should review this issue',
        '- The automated analysis above may provide useful context',
        '- Consider if the issue requires architectural changes beyond simple fixes',
      ].join('\n')
    )
  })

  it('cleans up and fails a blocked run without commenting', async () => {
    const h = harness({
      result: pipelineResult('BLOCKED', {}, { failure_reason: 'Review blocked the fix', iterations: 3 }),
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome).toEqual({
      issueNumber: 42,
      status: 'FAILED',
      detail: 'Review blocked the fix',
      runDir: '/runs/test',
      pipelineStatus: 'BLOCKED',
    })
    expect(h.calls.slice(-3)).toEqual(CLEANUP_CALLS)
    expect(h.comments).toEqual([])
  })

  it('cleans up and rethrows when the pipeline throws', async () => {
    const h = harness({ result: new Error('disk full') })

    await expect(h.coordinator.processIssue(42)).rejects.toThrow('disk full')
    expect(h.calls.slice(-3)).toEqual(CLEANUP_CALLS)
  })

  it('keeps going when a cleanup step fails', async () => {
    const h = harness({
      result: pipelineResult('FAILED', {}, { failure_reason: 'fix timed out' }),
      git: { discardChanges: vi.fn(() => Promise.reject(new GitError('git checkout failed: locked'))) },
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome.status).toBe('FAILED')
    expect(h.git.checkout).toHaveBeenCalledWith('main')
    expect(h.git.deleteBranch).toHaveBeenLastCalledWith(BRANCH)
  })

  it('treats a comment failure as a warning', async () => {
    const h = harness({
      result: pipelineResult('SKIPPED', {
        triage: completedState('triage', 'triage', triagePayload({ classification: 'DUPLICATE' }), 'SKIPPED'),
      }),
      tracker: { postComment: vi.fn(() => Promise.reject(new IssueTrackerError('gh issue comment failed'))) },
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome.status).toBe('SKIPPED')
  })

  it('fails when the change request cannot be created', async () => {
    const h = harness({
      tracker: {
        createChangeRequest: vi.fn(() => Promise.reject(new IssueTrackerError('gh pr create failed: no access'))),
      },
    })

    const outcome = await h.coordinator.processIssue(42)

    expect(outcome).toEqual({
      issueNumber: 42,
      status: 'FAILED',
      detail: 'Failed to create change request: gh pr create failed: no access',
      runDir: '/runs/test',
      pipelineStatus: 'SUCCESS',
    })
    expect(h.comments).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// processBatch
// ---------------------------------------------------------------------------

describe('RunCoordinatorImpl.processBatch', () => {
  it('buckets outcomes and counts a thrown issue as failed', async () => {
    const issues: Record<number, Issue> = {
      1: { ...TEST_ISSUE, number: 1 },
      2: { ...TEST_ISSUE, number: 2, body: 'Broken.' },
    }
    const h = harness({
      tracker: {
        fetchIssue: vi.fn((n: number) => {
          const issue = issues[n]
          return issue !== undefined ? Promise.resolve(issue) : Promise.reject(new IssueTrackerError('missing'))
        }),
      },
    })
    vi.mocked(h.pipeline.run).mockRejectedValueOnce(new Error('state write failed'))

    const started: Array<PipelineEvents['issue:start']> = []
    const done: Array<PipelineEvents['issue:done']> = []
    h.eventBus.on('issue:start', (e) => started.push(e))
    h.eventBus.on('issue:done', (e) => done.push(e))

    const summary = await h.coordinator.processBatch([1, 2, 3])

    expect(summary.success).toEqual([])
    expect(summary.skipped).toEqual([2])
    expect(summary.failed).toEqual([1, 3])
    expect(summary.outcomes.map((o) => o.detail)).toEqual([
      'Unexpected error: state write failed',
      'Issue description too vague',
      'Failed to fetch issue: missing',
    ])
    expect(started).toEqual([
      { issueNumber: 1, index: 1, total: 3 },
      { issueNumber: 2, index: 2, total: 3 },
      { issueNumber: 3, index: 3, total: 3 },
    ])
    expect(done.map((e) => [e.issueNumber, e.outcome])).toEqual([
      [1, 'FAILED'],
      [2, 'SKIPPED'],
      [3, 'FAILED'],
    ])
  })
})
