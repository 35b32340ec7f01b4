import path from 'path'
import os from 'os'

/**
 * Get the convoguard home directory.
 * Resolution order:
 * 1. CONVOGUARD_HOME environment variable
 * 2. XDG_CONFIG_HOME/convoguard (Linux)
 * 3. Platform-specific defaults
 */
export function getHome(): string {
  if (process.env.CONVOGUARD_HOME) {
    return process.env.CONVOGUARD_HOME
  }

  if (process.env.XDG_CONFIG_HOME) {
    return path.join(process.env.XDG_CONFIG_HOME, 'convoguard')
  }

  switch (process.platform) {
    case 'win32':
      return path.join(process.env.APPDATA || os.homedir(), 'convoguard')
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', 'convoguard')
    default:
      return path.join(os.homedir(), '.convoguard')
  }
}

/**
 * Get the path to the main config file.
 */
export function getConfigPath(): string {
  return path.join(getHome(), 'config.json')
}

/**
 * Get the path to the local config overrides file.
 */
export function getLocalConfigPath(): string {
  return path.join(getHome(), 'config.local.json')
}

export function getLogsPath(): string {
  return path.join(getHome(), 'logs')
}

/**
 * Get the path to the audit logs directory.
 */
export function getAuditPath(): string {
  return path.join(getLogsPath(), 'audit')
}
