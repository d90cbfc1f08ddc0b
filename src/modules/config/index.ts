/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge, readEnvOverrides, ENV_VAR_MAP } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export { AutofixConfigSchema, PartialAutofixConfigSchema, LogLevelSchema } from './config-schema.js'
export type { AutofixConfig, PartialAutofixConfig, TimeoutSettings } from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_TIMEOUTS, PROJECT_CONFIG_FILE } from './defaults.js'
