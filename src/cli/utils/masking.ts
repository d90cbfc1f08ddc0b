/**
 * Credential masking utilities for CLI output and Pino logger redaction.
 *
 * Keeps tracker tokens and API keys out of logs, issue comments echoed to the
 * terminal, and error messages captured from child processes.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Patterns that identify credential values inside free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // GitHub tokens: ghp_, gho_, ghu_, ghs_, ghr_
  /gh[pousr]_[A-Za-z0-9]{30,}/g,
  // GitHub fine-grained PATs
  /github_pat_[A-Za-z0-9_]{40,}/g,
  // Generic 40-char hex tokens (classic PATs, generic secrets)
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Pino redaction paths. Covers the environment objects passed to child
 * processes and any token fields on logged config objects.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  'apiKey',
  'api_key',
  '*.token',
  '*.apiKey',
  '*.api_key',
  'env.GH_TOKEN',
  'env.GITHUB_TOKEN',
  'env.ANTHROPIC_API_KEY',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace known credential patterns in a string with `***`.
 *
 * Best-effort: formats not listed in SECRET_PATTERNS pass through.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}
