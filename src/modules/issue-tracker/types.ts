/**
 * Types for the issue tracker client.
 */

import type { Issue } from '../../core/types.js'

export interface ChangeRequest {
  number: number
  url: string
  headBranch: string
}

export interface CreateChangeRequestOptions {
  title: string
  body: string
  head: string
  base: string
  draft: boolean
  labels: string[]
}

/**
 * The issue and change-request operations the run coordinator uses.
 * Failures raise IssueTrackerError unless stated otherwise.
 */
export interface IssueTracker {
  fetchIssue(issueNumber: number): Promise<Issue>
  postComment(issueNumber: number, body: string): Promise<void>
  /** First open change request whose head is `branch`; null when none or the lookup fails */
  findOpenChangeRequest(branch: string): Promise<ChangeRequest | null>
  closeChangeRequest(changeRequestNumber: number): Promise<void>
  createChangeRequest(options: CreateChangeRequestOptions): Promise<ChangeRequest>
}
