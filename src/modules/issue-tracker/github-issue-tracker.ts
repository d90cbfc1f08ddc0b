/**
 * GitHubIssueTracker: IssueTracker over the `gh` CLI.
 *
 * Every command carries `-R <repo>` when a repository is configured;
 * otherwise gh resolves the repository from the working directory.
 * JSON output is validated with zod before use.
 */

import { z } from 'zod'
import { IssueTrackerError } from '../../core/errors.js'
import type { Issue } from '../../core/types.js'
import { spawnCommand } from '../../utils/spawn-command.js'
import { createLogger } from '../../utils/logger.js'
import type { ChangeRequest, CreateChangeRequestOptions, IssueTracker } from './types.js'

const logger = createLogger('issue-tracker')

// ---------------------------------------------------------------------------
// Output schemas
// ---------------------------------------------------------------------------

const GhIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().optional(),
  labels: z.array(z.object({ name: z.string() })).optional(),
  url: z.string().optional(),
})

const GhChangeRequestSchema = z.object({
  number: z.number().int(),
  url: z.string(),
  headRefName: z.string(),
})

const GhChangeRequestListSchema = z.array(GhChangeRequestSchema)

function toChangeRequest(data: z.infer<typeof GhChangeRequestSchema>): ChangeRequest {
  return { number: data.number, url: data.url, headBranch: data.headRefName }
}

// ---------------------------------------------------------------------------
// GitHubIssueTracker
// ---------------------------------------------------------------------------

export interface GitHubIssueTrackerOptions {
  /** `owner/name` */
  repo?: string
  /** Directory gh runs in */
  cwd?: string
  binary?: string
}

export class GitHubIssueTracker implements IssueTracker {
  private readonly _repo: string | undefined
  private readonly _cwd: string | undefined
  private readonly _binary: string

  constructor(options: GitHubIssueTrackerOptions = {}) {
    this._repo = options.repo
    this._cwd = options.cwd
    this._binary = options.binary ?? 'gh'
  }

  async fetchIssue(issueNumber: number): Promise<Issue> {
    const output = await this._run(['issue', 'view', String(issueNumber), '--json', 'number,title,body,labels,url'])
    const data = this._parse(output, GhIssueSchema, 'issue view')
    return {
      number: data.number,
      title: data.title,
      body: data.body ?? '',
      labels: (data.labels ?? []).map((label) => label.name),
      url: data.url ?? '',
    }
  }

  async postComment(issueNumber: number, body: string): Promise<void> {
    await this._run(['issue', 'comment', String(issueNumber), '--body', body])
  }

  async findOpenChangeRequest(branch: string): Promise<ChangeRequest | null> {
    const result = await spawnCommand(
      this._binary,
      this._withRepo(['pr', 'list', '--head', branch, '--state', 'open', '--json', 'number,url,headRefName']),
      { cwd: this._cwd }
    )
    if (result.code !== 0) {
      logger.warn({ branch, stderr: result.stderr }, 'Could not list open pull requests')
      return null
    }
    if (result.stdout.trim() === '') return null

    const list = this._parse(result.stdout, GhChangeRequestListSchema, 'pr list')
    const first = list[0]
    return first !== undefined ? toChangeRequest(first) : null
  }

  async closeChangeRequest(changeRequestNumber: number): Promise<void> {
    await this._run(['pr', 'close', String(changeRequestNumber)])
  }

  async createChangeRequest(options: CreateChangeRequestOptions): Promise<ChangeRequest> {
    const args = [
      'pr',
      'create',
      '--title',
      options.title,
      '--body',
      options.body,
      '--head',
      options.head,
      '--base',
      options.base,
    ]
    if (options.draft) args.push('--draft')
    for (const label of options.labels) {
      args.push('--label', label)
    }

    const url = (await this._run(args)).trim()
    const view = await this._run(['pr', 'view', url, '--json', 'number,url,headRefName'])
    const created = toChangeRequest(this._parse(view, GhChangeRequestSchema, 'pr view'))
    logger.info({ url: created.url, number: created.number }, 'Created pull request')
    return created
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private _withRepo(args: string[]): string[] {
    return this._repo !== undefined ? [...args, '-R', this._repo] : args
  }

  private async _run(args: string[]): Promise<string> {
    const result = await spawnCommand(this._binary, this._withRepo(args), { cwd: this._cwd })
    if (result.code !== 0) {
      throw new IssueTrackerError(`gh ${args.slice(0, 2).join(' ')} failed: ${result.stderr}`, {
        args: args.slice(0, 3),
        code: result.code,
      })
    }
    return result.stdout
  }

  private _parse<T>(output: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, command: string): T {
    let json: unknown
    try {
      json = JSON.parse(output)
    } catch (err) {
      throw new IssueTrackerError(`gh ${command} returned invalid JSON`, {
        error: err instanceof Error ? err.message : String(err),
      })
    }
    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      throw new IssueTrackerError(`gh ${command} returned unexpected data`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      })
    }
    return parsed.data
  }
}

export function createIssueTracker(options: GitHubIssueTrackerOptions = {}): IssueTracker {
  return new GitHubIssueTracker(options)
}
