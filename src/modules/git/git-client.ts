/**
 * GitClient: the version-control operations the run coordinator needs, run
 * as `git` subprocesses in the project directory.
 *
 * Methods marked best effort log and return false instead of throwing;
 * everything else throws GitError on a non-zero exit.
 */

import { GitError } from '../../core/errors.js'
import { spawnCommand } from '../../utils/spawn-command.js'
import type { CommandResult } from '../../utils/spawn-command.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('git')

// ---------------------------------------------------------------------------
// GitClient interface
// ---------------------------------------------------------------------------

export interface GitClient {
  readonly repoPath: string
  /** Any staged, unstaged or untracked entry in `git status` */
  isDirty(): Promise<boolean>
  /** fetch, force checkout, hard reset to `<remote>/<branch>` */
  syncToRemote(remote: string, branch: string): Promise<void>
  createBranch(name: string): Promise<void>
  /** Best effort */
  deleteBranch(name: string): Promise<boolean>
  /** Best effort */
  deleteRemoteBranch(name: string, remote: string): Promise<boolean>
  /** Staged, unstaged or untracked (non-ignored) changes exist */
  hasChanges(): Promise<boolean>
  /** True when the remote branch is missing or HEAD is ahead of it */
  hasUnpushedCommits(remote: string, branch: string): Promise<boolean>
  /** `git add .` minus the given pathspec exclusions */
  stageAll(excludes: readonly string[]): Promise<void>
  commit(message: string): Promise<void>
  push(remote: string, branch: string): Promise<void>
  /** Revert tracked edits and remove untracked files */
  discardChanges(): Promise<void>
  checkout(branch: string): Promise<void>
  /**
   * `diff HEAD` plus new-file diffs for untracked files, or `diff <baseRef>`
   * when both are empty
   */
  getWorkingDiff(baseRef: string): Promise<string>
}

// ---------------------------------------------------------------------------
// GitClientImpl
// ---------------------------------------------------------------------------

export class GitClientImpl implements GitClient {
  readonly repoPath: string

  constructor(repoPath: string) {
    this.repoPath = repoPath
  }

  async isDirty(): Promise<boolean> {
    const status = await this._run(['status', '--porcelain'])
    return status.trim() !== ''
  }

  async syncToRemote(remote: string, branch: string): Promise<void> {
    await this._run(['fetch', remote])
    await this._run(['checkout', '-f', branch])
    await this._run(['reset', '--hard', `${remote}/${branch}`])
    logger.info({ remote, branch }, 'Synced to remote')
  }

  async createBranch(name: string): Promise<void> {
    await this._run(['checkout', '-b', name])
  }

  async deleteBranch(name: string): Promise<boolean> {
    return this._tryRun(['branch', '-D', name])
  }

  async deleteRemoteBranch(name: string, remote: string): Promise<boolean> {
    return this._tryRun(['push', remote, '--delete', name])
  }

  async hasChanges(): Promise<boolean> {
    const probes = [
      ['diff', '--cached', '--name-only'],
      ['diff', '--name-only'],
      ['ls-files', '--others', '--exclude-standard'],
    ]
    for (const args of probes) {
      const result = await this._spawn(args)
      if (result.code === 0 && result.stdout.trim() !== '') return true
    }
    return false
  }

  async hasUnpushedCommits(remote: string, branch: string): Promise<boolean> {
    const remoteRef = `${remote}/${branch}`
    const verify = await this._spawn(['rev-parse', '--verify', remoteRef])
    if (verify.code !== 0 || verify.stdout.trim() === '') {
      return true
    }
    const ahead = await this._spawn(['rev-list', '--count', `${remoteRef}..HEAD`])
    const count = Number.parseInt(ahead.stdout.trim(), 10)
    return Number.isFinite(count) && count > 0
  }

  async stageAll(excludes: readonly string[]): Promise<void> {
    await this._run(['add', '.', ...excludes.map((pattern) => `:!${pattern}`)])
  }

  async commit(message: string): Promise<void> {
    await this._run(['commit', '-m', message])
  }

  async push(remote: string, branch: string): Promise<void> {
    await this._run(['push', '-u', remote, branch])
  }

  async discardChanges(): Promise<void> {
    await this._run(['checkout', '--', '.'])
    await this._run(['clean', '-fd'])
  }

  async checkout(branch: string): Promise<void> {
    await this._run(['checkout', branch])
  }

  async getWorkingDiff(baseRef: string): Promise<string> {
    const head = await this._spawn(['diff', 'HEAD'])
    const working = (head.code === 0 ? head.stdout : '') + (await this._untrackedDiff())
    if (working.trim() !== '') {
      return working
    }
    const base = await this._spawn(['diff', baseRef])
    return base.code === 0 ? base.stdout : ''
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private _spawn(args: string[]): Promise<CommandResult> {
    return spawnCommand('git', args, { cwd: this.repoPath })
  }

  /**
   * New-file diffs for untracked, non-ignored files. Diffed against /dev/null
   * with --no-index so the index is left untouched.
   */
  private async _untrackedDiff(): Promise<string> {
    const listed = await this._spawn(['ls-files', '--others', '--exclude-standard'])
    if (listed.code !== 0) return ''
    const files = listed.stdout.split('\n').filter((line) => line !== '')

    let diff = ''
    for (const file of files) {
      // --no-index exits 1 when the inputs differ
      const result = await this._spawn(['diff', '--no-index', '--', '/dev/null', file])
      if (result.code === 0 || result.code === 1) diff += result.stdout
    }
    return diff
  }

  /** Run and throw GitError on a non-zero exit; returns stdout */
  private async _run(args: string[]): Promise<string> {
    const result = await this._spawn(args)
    if (result.code !== 0) {
      throw new GitError(`git ${args[0] ?? ''} failed: ${result.stderr}`, {
        args,
        code: result.code,
        cwd: this.repoPath,
      })
    }
    return result.stdout
  }

  private async _tryRun(args: string[]): Promise<boolean> {
    const result = await this._spawn(args)
    if (result.code !== 0) {
      logger.debug({ args, stderr: result.stderr }, 'Best-effort git command failed')
      return false
    }
    return true
  }
}

export function createGitClient(repoPath: string): GitClient {
  return new GitClientImpl(repoPath)
}
