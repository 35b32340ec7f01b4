import { AppConfigSchema, type AppConfig, type AppConfigInput } from './schema.js'
import { getConfigPath, getLocalConfigPath } from './paths.js'
import { parseEnvConfig } from './env.js'
import { fileExists, loadConfigFile } from './file.js'
import { deepMerge } from './merge.js'

export interface LoadConfigOptions {
  /** Explicit config file; its .local.json sibling is read as well. */
  configPath?: string
  /** Environment to read CONVOGUARD_* variables from. Default: process.env */
  env?: NodeJS.ProcessEnv
  /** Highest-precedence values, typically from the host application. */
  overrides?: AppConfigInput
}

/**
 * Load configuration with full precedence chain.
 *
 * Precedence (later overrides earlier):
 * 1. Defaults (schema)
 * 2. User config file (config.json)
 * 3. Local overrides (config.local.json)
 * 4. Environment variables
 * 5. Explicit overrides
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  let config: Record<string, unknown> = {}

  const configPath = options.configPath ?? getConfigPath()
  if (await fileExists(configPath)) {
    config = deepMerge(config, await loadConfigFile(configPath))
  }

  const localPath = options.configPath
    ? options.configPath.replace(/\.json$/, '.local.json')
    : getLocalConfigPath()
  if (await fileExists(localPath)) {
    config = deepMerge(config, await loadConfigFile(localPath))
  }

  config = deepMerge(config, parseEnvConfig(options.env))

  if (options.overrides) {
    config = deepMerge(config, { ...options.overrides })
  }

  // Defaults are applied by the schema
  return AppConfigSchema.parse(config)
}
