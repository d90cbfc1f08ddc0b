/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → config file        (--config, or <project_dir>/.autofix/config.yaml)
 *     → environment vars   (AUTOFIX_* prefixed)
 *     → CLI flag overrides (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'node:fs/promises'
import { resolve } from 'node:path'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  AutofixConfigSchema,
  PartialAutofixConfigSchema,
  type AutofixConfig,
  type PartialAutofixConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG, PROJECT_CONFIG_FILE } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` into a copy of `base`. Nested plain objects merge key by
 * key; anything else (arrays included) replaces. `undefined` never overrides.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue
    const current = result[key]
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

interface EnvBinding {
  path: readonly string[]
  kind: 'string' | 'number'
}

/**
 * AUTOFIX_ environment variables and the config keys they set.
 * Only scalar values; nested structures come from the config file.
 */
export const ENV_VAR_MAP: Readonly<Record<string, EnvBinding>> = {
  AUTOFIX_PROJECT_DIR: { path: ['project_dir'], kind: 'string' },
  AUTOFIX_REPO: { path: ['repo'], kind: 'string' },
  AUTOFIX_BASE_BRANCH: { path: ['base_branch'], kind: 'string' },
  AUTOFIX_REMOTE: { path: ['remote'], kind: 'string' },
  AUTOFIX_RUNS_DIR: { path: ['runs_dir'], kind: 'string' },
  AUTOFIX_PROMPTS_DIR: { path: ['prompts_dir'], kind: 'string' },
  AUTOFIX_LOG_LEVEL: { path: ['log_level'], kind: 'string' },
  AUTOFIX_AGENT_BINARY: { path: ['agent', 'binary'], kind: 'string' },
  AUTOFIX_AGENT_MODEL: { path: ['agent', 'model'], kind: 'string' },
  AUTOFIX_MAX_ITERATIONS: { path: ['pipeline', 'max_iterations'], kind: 'number' },
}

function coerce(raw: string, kind: EnvBinding['kind']): unknown {
  if (kind === 'string') return raw
  const trimmed = raw.trim()
  const value = Number(trimmed)
  // Left as a string so validation reports the offending key
  return trimmed === '' || Number.isNaN(value) ? raw : value
}

/**
 * Read relevant environment variables and return a config overlay.
 * Empty variables are treated as unset.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, binding] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = deepMerge(overrides, nest(binding.path, coerce(rawValue, binding.kind)))
  }

  return overrides
}

function nest(path: readonly string[], value: unknown): Record<string, unknown> {
  const [head, ...rest] = path
  if (head === undefined) return {}
  return { [head]: rest.length > 0 ? nest(rest, value) : value }
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: AutofixConfig | null = null
  private _configFile: string | null = null
  private readonly _configPath: string | undefined
  private readonly _cliOverrides: PartialAutofixConfig
  private readonly _env: NodeJS.ProcessEnv
  private readonly _cwd: string

  constructor(options: ConfigSystemOptions = {}) {
    this._cwd = resolve(options.cwd ?? process.cwd())
    this._configPath = options.configPath !== undefined ? resolve(this._cwd, options.configPath) : undefined
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get configFile(): string | null {
    return this._configFile
  }

  async load(): Promise<void> {
    const envOverrides = readEnvOverrides(this._env)

    // The project file lives under project_dir, which only flags or env can move
    const earlyProjectDir = getByPath(deepMerge(envOverrides, this._cliOverrides), 'project_dir')
    const projectDir = resolve(
      this._cwd,
      typeof earlyProjectDir === 'string' ? earlyProjectDir : DEFAULT_CONFIG.project_dir
    )

    let fileConfig: PartialAutofixConfig | null
    let configFile: string | null
    if (this._configPath !== undefined) {
      if (!(await this._fileExists(this._configPath))) {
        throw new ConfigError(`Config file not found: ${this._configPath}`, { filePath: this._configPath })
      }
      configFile = this._configPath
      fileConfig = await this._loadYamlFile(this._configPath)
    } else {
      configFile = resolve(projectDir, PROJECT_CONFIG_FILE)
      fileConfig = (await this._fileExists(configFile)) ? await this._loadYamlFile(configFile) : null
      if (fileConfig === null) configFile = null
    }

    // 1. defaults → 2. file → 3. env → 4. CLI flags
    let merged = deepMerge({}, DEFAULT_CONFIG)
    if (fileConfig !== null) merged = deepMerge(merged, fileConfig)
    merged = deepMerge(merged, envOverrides)
    merged = deepMerge(merged, this._cliOverrides)

    const result = AutofixConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    const config = result.data
    const resolvedProjectDir = resolve(this._cwd, config.project_dir)
    this._config = {
      ...config,
      project_dir: resolvedProjectDir,
      runs_dir: resolve(resolvedProjectDir, config.runs_dir),
      prompts_dir: resolve(resolvedProjectDir, config.prompts_dir),
    }
    this._configFile = configFile
    logger.debug({ configFile, projectDir: resolvedProjectDir }, 'Configuration loaded')
  }

  getConfig(): AutofixConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialAutofixConfig> {
    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialAutofixConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ cliOverrides: { base_branch: 'develop' } })
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
