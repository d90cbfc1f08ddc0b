/**
 * Built-in default values for the autofix configuration.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   config file → environment variables → CLI flags
 */

import { DEFAULT_PROMPTS_DIR } from '../prompts/prompt-library.js'
import { DEFAULT_CONFIDENCE_WEIGHTS } from '../pipeline/confidence.js'
import type { AutofixConfig, TimeoutSettings } from './config-schema.js'

/** Project config file, relative to the project directory */
export const PROJECT_CONFIG_FILE = '.autofix/config.yaml'

export const DEFAULT_TIMEOUTS: TimeoutSettings = {
  triage: 180,
  research: 600,
  fix: 600,
  review: 600,
}

export const DEFAULT_CONFIG: AutofixConfig = {
  project_dir: '.',
  base_branch: 'main',
  remote: 'origin',
  branch_prefix: 'autofix-',
  runs_dir: '.autofix/runs',
  prompts_dir: DEFAULT_PROMPTS_DIR,
  log_level: 'info',
  agent: {
    binary: 'claude',
  },
  timeouts: DEFAULT_TIMEOUTS,
  pipeline: {
    max_iterations: 3,
    weights: { ...DEFAULT_CONFIDENCE_WEIGHTS },
  },
  triage: {
    min_confidence: 0.6,
  },
  issue_quality: {
    min_body_chars: 50,
    min_words: 10,
  },
}
