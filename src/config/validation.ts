import { promises as fs } from 'fs'
import path from 'path'
import type { AppConfig } from './schema.js'

export interface ValidationError {
  path: string
  message: string
  suggestion?: string
}

export interface ValidationWarning {
  path: string
  message: string
}

export interface ValidationResult {
  valid: boolean
  errors: ValidationError[]
  warnings: ValidationWarning[]
}

/**
 * Validate a configuration for semantic correctness.
 * This goes beyond Zod schema validation to check things like
 * rule file presence and settings that behave surprisingly.
 */
export async function validateConfig(config: AppConfig): Promise<ValidationResult> {
  const errors: ValidationError[] = []
  const warnings: ValidationWarning[] = []

  // Custom rules directory must hold both rule files
  if (config.guardrail.rulesDir) {
    for (const file of ['input.json', 'output.json']) {
      const filePath = path.join(config.guardrail.rulesDir, file)
      try {
        await fs.access(filePath)
      } catch {
        errors.push({
          path: 'guardrail.rulesDir',
          message: `Rule file not found: ${filePath}`,
          suggestion: 'Copy the bundled rules/ directory and edit it, or unset guardrail.rulesDir',
        })
      }
    }
  }

  if (config.guardrail.maxWarnings === 1) {
    warnings.push({
      path: 'guardrail.maxWarnings',
      message: 'A single warning locks the user out.',
    })
  }

  // Blocks are permanent until reset; the duration is informational only
  warnings.push({
    path: 'guardrail.blockDurationSeconds',
    message: `Blocked users are not released after ${config.guardrail.blockDurationSeconds}s; call reset() to unblock.`,
  })

  if (!config.logging.audit.enabled) {
    warnings.push({
      path: 'logging.audit.enabled',
      message: 'Audit logging is disabled. Security decisions will not be recorded.',
    })
  }

  if (config.logging.audit.inMemory && config.logging.audit.dir) {
    warnings.push({
      path: 'logging.audit.dir',
      message: 'Ignored because logging.audit.inMemory is true.',
    })
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}
