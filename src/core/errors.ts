/**
 * Error definitions for issue-autofix
 * Provides a structured error hierarchy for all pipeline operations
 */

/** Base error class for all autofix errors */
export class AutofixError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'AutofixError'
    this.code = code
    this.context = context
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AutofixError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends AutofixError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when git operations fail */
export class GitError extends AutofixError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'GIT_ERROR', context)
    this.name = 'GitError'
  }
}

/** Error thrown when an issue tracker call fails or returns malformed data */
export class IssueTrackerError extends AutofixError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'ISSUE_TRACKER_ERROR', context)
    this.name = 'IssueTrackerError'
  }
}

/** Error thrown when a prompt template cannot be loaded */
export class PromptTemplateError extends AutofixError {
  constructor(template: string, path: string, cause?: string) {
    super(
      `Prompt template "${template}" could not be loaded from ${path}${cause !== undefined ? `: ${cause}` : ''}`,
      'PROMPT_TEMPLATE_ERROR',
      { template, path }
    )
    this.name = 'PromptTemplateError'
  }
}

/** Error thrown when an agent process exceeds its wall-clock bound */
export class StageTimeoutError extends AutofixError {
  constructor(stage: string, timeoutMs: number) {
    super(
      `${stage} timed out after ${String(Math.round(timeoutMs / 1000))}s`,
      'STAGE_TIMEOUT',
      { stage, timeoutMs }
    )
    this.name = 'StageTimeoutError'
  }
}

/** Error thrown when an agent process exits non-zero or cannot be spawned */
export class StageProcessError extends AutofixError {
  constructor(stage: string, detail: string, exitCode: number | null) {
    super(
      `${stage} agent process failed${exitCode !== null ? ` (exit ${String(exitCode)})` : ''}: ${detail}`,
      'STAGE_PROCESS_FAILED',
      { stage, exitCode }
    )
    this.name = 'StageProcessError'
  }
}
