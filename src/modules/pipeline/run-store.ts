/**
 * RunStore: the per-run directory of state files, prompts and agent logs.
 *
 * Layout: `<runsDir>/<YYYY-MM-DD_HH-MM-SS>-issue-<n>/`
 *   pipeline.state.json   snapshot, rewritten on every transition
 *   <name>.state.json     AgentState per role and per revision
 *   <name>.prompt.md      rendered prompt
 *   <name>.log            agent stdout
 *   issue.json
 *
 * Every JSON write replaces the whole file through a temp file and rename.
 */

import { mkdir, readdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { formatRunTimestamp } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { Issue } from '../../core/types.js'
import type { AgentState, ArtifactSink } from '../agents/types.js'
import { PipelineSnapshotSchema } from './types.js'
import type { PipelineSnapshot } from './types.js'

const logger = createLogger('run-store')

export const PIPELINE_STATE_FILE = 'pipeline.state.json'
export const ISSUE_FILE = 'issue.json'

const RUN_DIR_PATTERN = /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}-issue-\d+$/

// ---------------------------------------------------------------------------
// Atomic JSON write
// ---------------------------------------------------------------------------

/**
 * Write `value` as 2-space JSON to `filePath` via a temp file and rename.
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const tmpPath = `${filePath}.tmp.${String(process.pid)}`
  try {
    await writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8')
    await rename(tmpPath, filePath)
  } catch (err) {
    await unlink(tmpPath).catch(() => undefined)
    throw err
  }
}

// ---------------------------------------------------------------------------
// RunStore
// ---------------------------------------------------------------------------

export interface RunStore extends ArtifactSink {
  readonly runDir: string
  writeIssue(issue: Issue): Promise<void>
  writePipelineState(snapshot: PipelineSnapshot): Promise<void>
  /** Writes `<name>.state.json` */
  writeAgentState(name: string, state: AgentState<unknown>): Promise<void>
  /** Null when no snapshot has been written or it does not validate */
  readPipelineState(): Promise<PipelineSnapshot | null>
}

export class FileRunStore implements RunStore {
  readonly runDir: string

  constructor(runDir: string) {
    this.runDir = runDir
  }

  async writeIssue(issue: Issue): Promise<void> {
    await writeJsonAtomic(join(this.runDir, ISSUE_FILE), issue)
  }

  async writePipelineState(snapshot: PipelineSnapshot): Promise<void> {
    await writeJsonAtomic(join(this.runDir, PIPELINE_STATE_FILE), snapshot)
  }

  async writeAgentState(name: string, state: AgentState<unknown>): Promise<void> {
    await writeJsonAtomic(join(this.runDir, `${name}.state.json`), state)
  }

  async writePrompt(name: string, prompt: string): Promise<void> {
    await writeFile(join(this.runDir, `${name}.prompt.md`), prompt, 'utf-8')
  }

  logPath(name: string): string {
    return join(this.runDir, `${name}.log`)
  }

  readPipelineState(): Promise<PipelineSnapshot | null> {
    return readPipelineSnapshot(this.runDir)
  }
}

// ---------------------------------------------------------------------------
// Run directories
// ---------------------------------------------------------------------------

export function runDirName(issueNumber: number, startedAt: Date): string {
  return `${formatRunTimestamp(startedAt)}-issue-${String(issueNumber)}`
}

/**
 * Create a fresh run directory under `runsDir` and return a store over it.
 */
export async function createRunStore(runsDir: string, issueNumber: number, startedAt: Date = new Date()): Promise<RunStore> {
  const runDir = join(runsDir, runDirName(issueNumber, startedAt))
  await mkdir(runDir, { recursive: true })
  logger.debug({ runDir }, 'Created run directory')
  return new FileRunStore(runDir)
}

/**
 * Read and validate `pipeline.state.json` in `runDir`.
 */
export async function readPipelineSnapshot(runDir: string): Promise<PipelineSnapshot | null> {
  let raw: string
  try {
    raw = await readFile(join(runDir, PIPELINE_STATE_FILE), 'utf-8')
  } catch {
    return null
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    logger.warn({ runDir }, 'Pipeline state is not valid JSON')
    return null
  }

  const parsed = PipelineSnapshotSchema.safeParse(json)
  if (!parsed.success) {
    logger.warn({ runDir, issues: parsed.error.issues.length }, 'Pipeline state failed validation')
    return null
  }
  return parsed.data
}

/**
 * Most recent run directory under `runsDir`, by name (names sort by start
 * time). Null when there is none.
 */
export async function findLatestRunDir(runsDir: string): Promise<string | null> {
  let entries: string[]
  try {
    entries = await readdir(runsDir)
  } catch {
    return null
  }

  const candidates = entries.filter((name) => RUN_DIR_PATTERN.test(name)).sort()
  for (let i = candidates.length - 1; i >= 0; i--) {
    const name = candidates[i]
    if (name === undefined) continue
    const dir = join(runsDir, name)
    const info = await stat(dir)
    if (info.isDirectory()) return dir
  }
  return null
}
