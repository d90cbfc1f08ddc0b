/**
 * Tests for pipeline-factory.ts
 */

import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_CONFIG } from '../../config/defaults.js'
import type { AutofixConfig } from '../../config/config-schema.js'
import { createGitClient } from '../../git/git-client.js'
import { TEST_ISSUE, scriptedRunner } from '../../agents/__tests__/fakes.js'
import { createPipelineFactory, toPipelineConfig } from '../pipeline-factory.js'

describe('toPipelineConfig', () => {
  it('converts timeouts to milliseconds and carries the loop settings', () => {
    expect(toPipelineConfig({ ...DEFAULT_CONFIG, project_dir: '/repo', prompts_dir: '/prompts' })).toEqual({
      weights: { triage: 0.15, research: 0.2, fix: 0.35, review: 0.3 },
      maxIterations: 3,
      workingDir: '/repo',
      promptsDir: '/prompts',
      timeouts: { triage: 180_000, research: 600_000, fix: 600_000, review: 600_000 },
    })
  })
})

describe('createPipelineFactory', () => {
  let runsDir: string | undefined

  afterEach(async () => {
    if (runsDir !== undefined) await rm(runsDir, { recursive: true, force: true })
  })

  it('creates a timestamped run directory per issue', async () => {
    runsDir = await mkdtemp(join(tmpdir(), 'autofix-runs-'))
    const config: AutofixConfig = { ...DEFAULT_CONFIG, project_dir: '/repo', runs_dir: runsDir }
    const factory = createPipelineFactory({
      config,
      git: createGitClient('/repo'),
      runner: scriptedRunner([]),
      now: () => new Date(2026, 0, 2, 3, 4, 5),
    })

    const { store } = await factory(TEST_ISSUE)

    expect(store.runDir).toBe(join(runsDir, '2026-01-02_03-04-05-issue-42'))
    expect((await stat(store.runDir)).isDirectory()).toBe(true)
  })
})
