// Schema and types
export {
  AppConfigSchema,
  GuardrailConfigSchema,
  MessagesConfigSchema,
  LoggingConfigSchema,
  type AppConfig,
  type AppConfigInput,
  type GuardrailConfig,
  type MessagesConfig,
  type LoggingConfig,
} from './schema.js'

// Paths
export {
  getHome,
  getConfigPath,
  getLocalConfigPath,
  getLogsPath,
  getAuditPath,
} from './paths.js'

// Environment parsing
export { parseEnvConfig, parseValue, envKeyToPath } from './env.js'

// File utilities
export { fileExists, loadConfigFile } from './file.js'

// Merge utilities
export { deepMerge, setPath } from './merge.js'

// Loader
export { loadConfig, type LoadConfigOptions } from './loader.js'

// Errors
export { ConfigError } from './errors.js'

// Validation
export {
  validateConfig,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from './validation.js'
