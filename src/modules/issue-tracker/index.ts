export { GitHubIssueTracker, createIssueTracker } from './github-issue-tracker.js'
export type { GitHubIssueTrackerOptions } from './github-issue-tracker.js'
export type { ChangeRequest, CreateChangeRequestOptions, IssueTracker } from './types.js'
