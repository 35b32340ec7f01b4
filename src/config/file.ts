import { promises as fs } from 'fs'
import { ConfigError } from './errors.js'

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load a JSON config file. The top level must be an object.
 */
export async function loadConfigFile(
  filePath: string
): Promise<Record<string, unknown>> {
  const content = await fs.readFile(filePath, 'utf-8')

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new ConfigError(
      `Config file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    )
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`, filePath)
  }

  return { ...parsed }
}
