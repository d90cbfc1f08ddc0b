/**
 * Tests for prompt-library.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createPromptLibrary, renderTemplate, DEFAULT_PROMPTS_DIR } from '../prompt-library.js'
import { PromptTemplateError } from '../../../core/errors.js'

describe('renderTemplate', () => {
  it('replaces known placeholders and leaves unknown ones intact', () => {
    expect(renderTemplate('Issue #{{issue_number}}: {{title}} ({{missing}})', {
      issue_number: '12',
      title: 'Crash on save',
    })).toBe('Issue #12: Crash on save ({{missing}})')
  })

  it('does not re-expand placeholders inside substituted values', () => {
    expect(renderTemplate('{{body}} / {{title}}', { body: 'see {{title}}', title: 'T' })).toBe(
      'see {{title}} / T'
    )
  })
})

describe('PromptLibrary', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prompts-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('renders a template from the prompts directory', async () => {
    await writeFile(join(dir, 'triage.md'), 'Classify #{{issue_number}}', 'utf-8')
    const library = createPromptLibrary(dir)

    expect(await library.render('triage', { issue_number: '7' })).toBe('Classify #7')
  })

  it('caches templates after the first load', async () => {
    await writeFile(join(dir, 'fix.md'), 'v1 {{x}}', 'utf-8')
    const library = createPromptLibrary(dir)
    await library.render('fix', { x: 'a' })
    await writeFile(join(dir, 'fix.md'), 'v2 {{x}}', 'utf-8')

    expect(await library.render('fix', { x: 'b' })).toBe('v1 b')
  })

  it('throws PromptTemplateError for a missing template', async () => {
    const library = createPromptLibrary(dir)

    await expect(library.render('review', {})).rejects.toBeInstanceOf(PromptTemplateError)
  })

  it('ships a template for every stage', () => {
    for (const name of ['triage', 'research', 'fix', 'fix-revision', 'review']) {
      expect(existsSync(join(DEFAULT_PROMPTS_DIR, `${name}.md`))).toBe(true)
    }
  })
})
