import { setPath } from './merge.js'

const ENV_PREFIX = 'CONVOGUARD_'

// Reserved environment variables (not parsed into config)
const RESERVED_ENV_VARS = new Set(['CONVOGUARD_HOME'])

/**
 * Convert an env segment to a camelCase key: MAX_WARNINGS -> maxWarnings.
 */
function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase())
}

/**
 * Convert an environment variable name to a config path.
 *
 * Double underscore separates path segments, single underscore separates
 * the words of one camelCase key:
 * - CONVOGUARD_GUARDRAIL__MAX_WARNINGS -> guardrail.maxWarnings
 * - CONVOGUARD_LOGGING__AUDIT__ENABLED -> logging.audit.enabled
 * - CONVOGUARD_VERSION -> version
 */
export function envKeyToPath(key: string): string {
  return key
    .slice(ENV_PREFIX.length)
    .split('__')
    .map(toCamelCase)
    .join('.')
}

/**
 * Parse CONVOGUARD_* environment variables into a partial config object.
 */
export function parseEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX)) continue
    if (value === undefined) continue
    if (RESERVED_ENV_VARS.has(key)) continue

    setPath(config, envKeyToPath(key), parseValue(value))
  }

  return config
}

/**
 * Parse a string value to its appropriate type.
 */
export function parseValue(value: string): unknown {
  // Boolean
  if (value === 'true') return true
  if (value === 'false') return false

  // Integer
  if (/^-?\d+$/.test(value)) return parseInt(value, 10)

  // Float
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value)

  // JSON (arrays/objects)
  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      // Fall through to string
    }
  }

  return value
}
