/**
 * Stage agents: public surface and factory.
 */

import type { AgentRunner } from '../agent-runner/types.js'
import { FixAgent } from './fix-agent.js'
import { FixRevisionAgent } from './fix-revision-agent.js'
import { ResearchAgent } from './research-agent.js'
import { ReviewAgent } from './review-agent.js'
import { TriageAgent } from './triage-agent.js'
import type { Agent } from './types.js'

export * from './types.js'
export { BaseAgent, formatList, issueVars } from './base-agent.js'
export type { StageOutcome } from './base-agent.js'
export { normalizeConfidence, normalizeFix, normalizeResearch, normalizeReview, normalizeTriage } from './normalize.js'
export { TriageAgent, defaultTriagePayload, isActionableClassification } from './triage-agent.js'
export type { TriageAgentOptions } from './triage-agent.js'
export { ResearchAgent, defaultResearchPayload } from './research-agent.js'
export { FixAgent, defaultFixPayload, formatResearchContext } from './fix-agent.js'
export { FixRevisionAgent, MAX_DIFF_CHARS, revisionName } from './fix-revision-agent.js'
export { ReviewAgent } from './review-agent.js'

/** The agents one pipeline run needs, with revisions built per iteration */
export interface StageAgents {
  triage: Agent<'triage'>
  research: Agent<'research'>
  fix: Agent<'fix'>
  review: Agent<'review'>
  createRevision(iteration: number): Agent<'fix'>
}

export interface StageAgentOptions {
  triageMinConfidence?: number
  maxIterations: number
}

export function createStageAgents(runner: AgentRunner, options: StageAgentOptions): StageAgents {
  return {
    triage: new TriageAgent(runner, { minConfidence: options.triageMinConfidence }),
    research: new ResearchAgent(runner),
    fix: new FixAgent(runner),
    review: new ReviewAgent(runner),
    createRevision: (iteration) => new FixRevisionAgent(runner, iteration, options.maxIterations),
  }
}
