/**
 * Error hierarchy: codes, names, context and serialization.
 */

import { describe, it, expect } from 'vitest'
import {
  AutofixError,
  ConfigError,
  GitError,
  IssueTrackerError,
  PromptTemplateError,
  StageProcessError,
  StageTimeoutError,
} from '../errors.js'

describe('AutofixError subclasses', () => {
  it('ConfigError carries its code and context', () => {
    const error = new ConfigError('Missing required field', { key: 'repo' })
    expect(error.code).toBe('CONFIG_ERROR')
    expect(error.name).toBe('ConfigError')
    expect(error.context).toEqual({ key: 'repo' })
    expect(error).toBeInstanceOf(AutofixError)
    expect(error).toBeInstanceOf(Error)
  })

  it('GitError and IssueTrackerError have their own codes', () => {
    expect(new GitError('push rejected').code).toBe('GIT_ERROR')
    expect(new IssueTrackerError('gh exited 1').code).toBe('ISSUE_TRACKER_ERROR')
    expect(new IssueTrackerError('gh exited 1').context).toEqual({})
  })

  it('PromptTemplateError names the template and path', () => {
    const error = new PromptTemplateError('fix', '/prompts/fix.md', 'ENOENT')
    expect(error.message).toBe('Prompt template "fix" could not be loaded from /prompts/fix.md: ENOENT')
    expect(error.context).toEqual({ template: 'fix', path: '/prompts/fix.md' })
  })

  it('StageTimeoutError reports whole seconds', () => {
    const error = new StageTimeoutError('research', 600_000)
    expect(error.message).toBe('research timed out after 600s')
    expect(error.code).toBe('STAGE_TIMEOUT')
  })

  it('StageProcessError includes the exit code when known', () => {
    expect(new StageProcessError('fix', 'boom', 2).message).toBe('fix agent process failed (exit 2): boom')
    expect(new StageProcessError('fix', 'spawn ENOENT', null).message).toBe(
      'fix agent process failed: spawn ENOENT'
    )
  })
})

describe('toJSON', () => {
  it('serializes name, message, code and context', () => {
    const json = new GitError('checkout failed', { branch: 'autofix-42' }).toJSON()
    expect(json).toMatchObject({
      name: 'GitError',
      message: 'checkout failed',
      code: 'GIT_ERROR',
      context: { branch: 'autofix-42' },
    })
    expect(typeof json.stack).toBe('string')
  })
})
