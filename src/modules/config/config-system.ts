/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Callers depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { AutofixConfig, PartialAutofixConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /**
   * Explicit config file. When set it must exist; otherwise
   * `<project_dir>/.autofix/config.yaml` is read if present.
   */
  configPath?: string
  /**
   * Values that override everything else. Typically populated from CLI flags.
   */
  cliOverrides?: PartialAutofixConfig
  /** Environment to read `AUTOFIX_*` variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Base for relative paths when no project_dir is given (default: process.cwd()) */
  cwd?: string
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < config file < env vars < CLI flags
 *
 * After loading, `project_dir`, `runs_dir` and `prompts_dir` are absolute.
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * @throws {ConfigError} when a source cannot be read or the result is invalid
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getConfig(): AutofixConfig

  /**
   * Return a single value by dot-notation key (e.g. "pipeline.max_iterations").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /** Config file that was read, or null when only defaults, env and flags applied */
  readonly configFile: string | null

  readonly isLoaded: boolean
}
