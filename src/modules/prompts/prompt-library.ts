/**
 * Prompt templates for the stage agents.
 *
 * Templates live in `<promptsDir>/<name>.md` and use `{{placeholder}}`
 * markers. Substitution is a single pass: values that themselves contain
 * `{{...}}` are inserted verbatim. Unknown placeholders are left intact.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { PromptTemplateError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('prompts')

/** Templates shipped with the package (`<package root>/prompts`) */
export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL('../../../prompts/', import.meta.url))

/** Template names, one per stage (plus the revision variant of fix) */
export type PromptName = 'triage' | 'research' | 'fix' | 'fix-revision' | 'review'

export type PromptVars = Record<string, string>

// ---------------------------------------------------------------------------
// renderTemplate
// ---------------------------------------------------------------------------

/**
 * Replace `{{key}}` markers with values from `vars`.
 */
export function renderTemplate(template: string, vars: PromptVars): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    return Object.prototype.hasOwnProperty.call(vars, key) ? (vars[key] ?? match) : match
  })
}

// ---------------------------------------------------------------------------
// PromptLibrary
// ---------------------------------------------------------------------------

export interface PromptLibrary {
  readonly promptsDir: string
  /**
   * Load (and cache) a template, then substitute `vars` into it.
   * @throws PromptTemplateError when the template cannot be read
   */
  render(name: PromptName, vars: PromptVars): Promise<string>
}

export class PromptLibraryImpl implements PromptLibrary {
  readonly promptsDir: string
  private readonly _templateCache = new Map<PromptName, string>()

  constructor(promptsDir: string) {
    this.promptsDir = promptsDir
  }

  async render(name: PromptName, vars: PromptVars): Promise<string> {
    const template = await this._load(name)
    return renderTemplate(template, vars)
  }

  private async _load(name: PromptName): Promise<string> {
    const cached = this._templateCache.get(name)
    if (cached !== undefined) return cached

    const filePath = join(this.promptsDir, `${name}.md`)
    let content: string
    try {
      content = await readFile(filePath, 'utf-8')
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err)
      throw new PromptTemplateError(name, filePath, msg)
    }

    logger.debug({ name, filePath }, 'Loaded prompt template')
    this._templateCache.set(name, content)
    return content
  }
}

export function createPromptLibrary(promptsDir: string = DEFAULT_PROMPTS_DIR): PromptLibrary {
  return new PromptLibraryImpl(promptsDir)
}
