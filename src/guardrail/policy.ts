import type { Action, Severity } from './types.js'
import { SEVERITY_ORDER } from './types.js'

const ACTION_BY_SEVERITY: Record<Severity, Action> = {
  safe: 'allow',
  low: 'allow',
  medium: 'warn',
  high: 'block',
  critical: 'escalate',
}

/**
 * Map a severity to its handling action. Same for input and output.
 */
export function actionFor(severity: Severity): Action {
  return ACTION_BY_SEVERITY[severity]
}

/**
 * Compare two severities: negative if a < b, zero if equal, positive if a > b.
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER[a] - SEVERITY_ORDER[b]
}

export function isHigherSeverity(candidate: Severity, current: Severity): boolean {
  return SEVERITY_ORDER[candidate] > SEVERITY_ORDER[current]
}

/**
 * Get the riskier of two severities.
 */
export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_ORDER[b] > SEVERITY_ORDER[a] ? b : a
}

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value)
}
