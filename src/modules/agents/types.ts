/**
 * Types for the stage agents: payloads, agent state, execution context.
 */

import type { AgentStatus, Issue, StageRole } from '../../core/types.js'
import type { PromptLibrary } from '../prompts/prompt-library.js'

// ---------------------------------------------------------------------------
// Payloads (post-normalization)
// ---------------------------------------------------------------------------

export const ACTIONABLE_CLASSIFICATIONS = ['FIXABLE_CODE', 'FIXABLE_CONFIG'] as const

export const NON_ACTIONABLE_CLASSIFICATIONS = [
  'NEEDS_HUMAN',
  'NEEDS_CLARIFICATION',
  'OUT_OF_SCOPE',
  'DUPLICATE',
] as const

export type TriageClassification =
  | (typeof ACTIONABLE_CLASSIFICATIONS)[number]
  | (typeof NON_ACTIONABLE_CLASSIFICATIONS)[number]

export interface TriagePayload {
  /** One of TriageClassification, or whatever unrecognized label the agent used */
  classification: string
  confidence: number
  summary: string
  reasoning: string
  risks: string[]
  suggested_approach: string
  questions_if_unclear: string[]
  full_analysis: Record<string, unknown>
}

export interface ResearchPayload {
  root_cause: string
  proposed_fix: string
  affected_areas: string[]
  files_analyzed: string[]
  test_strategy: string
  patterns_to_follow: string[]
  summary: string
  confidence: number
  full_analysis: Record<string, unknown>
}

export interface FixPayload {
  confidence: number
  files_changed: string[]
  summary: string
  tests_added: string[]
  caveats: string[]
  testing_notes: string[]
  /** Explicit flag from the agent; null when not reported */
  fix_applied: boolean | null
  full_result: Record<string, unknown>
}

export type ReviewVerdict = 'APPROVE' | 'REQUEST_CHANGES' | 'BLOCK'

export interface ReviewPayload {
  verdict: ReviewVerdict
  confidence: number
  concerns: string[]
  suggestions: string[]
  summary: string
  full_review: Record<string, unknown>
}

/** Payload type carried by each stage role */
export interface StagePayloads {
  triage: TriagePayload
  research: ResearchPayload
  fix: FixPayload
  review: ReviewPayload
}

// ---------------------------------------------------------------------------
// AgentState
// ---------------------------------------------------------------------------

interface AgentStateBase {
  /** Artifact name: the role, or `fix-revision-<n>` for revisions */
  readonly agent: string
  readonly role: StageRole
  readonly confidence: number
  readonly started_at: string
  readonly completed_at: string
}

/** Outcome of one agent attempt. Frozen at construction. */
export type AgentState<P> =
  | (AgentStateBase & {
      readonly status: Exclude<AgentStatus, 'FAILED'>
      readonly payload: Readonly<P>
      readonly error?: undefined
    })
  | (AgentStateBase & {
      readonly status: 'FAILED'
      readonly payload: null
      readonly error: string
    })

/** Latest state per role, as seen by later stages */
export type StageStates = {
  readonly [R in StageRole]?: AgentState<StagePayloads[R]>
}

// ---------------------------------------------------------------------------
// Execution context
// ---------------------------------------------------------------------------

/** Produces the change set under review */
export interface DiffSource {
  /** Working-tree diff against HEAD, or against the remote base when HEAD shows nothing */
  getWorkingDiff(): Promise<string>
}

/** Where an agent writes its prompt and process log */
export interface ArtifactSink {
  writePrompt(name: string, prompt: string): Promise<void>
  logPath(name: string): string
}

export interface AgentConfig {
  /** Repository checkout the agent process runs in */
  workingDir: string
  timeoutMs: number
  promptsDir: string
}

export interface AgentContext {
  readonly issue: Issue
  /** 1-based fix-review iteration; 1 for the pre-fix stages */
  readonly iteration: number
  readonly previousStates: StageStates
  readonly config: AgentConfig
  readonly prompts: PromptLibrary
  readonly artifacts: ArtifactSink
  readonly diffSource: DiffSource
}

/**
 * One unit of pipeline work. `execute` never rejects: every failure becomes
 * a FAILED state.
 */
export interface Agent<R extends StageRole> {
  readonly role: R
  /** Artifact name used for prompt, log and state files */
  readonly name: string
  execute(context: AgentContext): Promise<AgentState<StagePayloads[R]>>
}
