import type { Action, Severity, Verdict } from './types.js'
import { actionFor } from './policy.js'

export interface VerdictInit {
  severity: Severity
  reason: string
  confidence: number
  patterns?: readonly string[]
  /**
   * Only for synthesized verdicts (blocked user). Classifiers always derive
   * the action from the severity.
   */
  action?: Action
}

/**
 * Build a frozen Verdict. Confidence is clamped to [0, 1].
 */
export function createVerdict(init: VerdictInit): Verdict {
  return Object.freeze({
    severity: init.severity,
    action: init.action ?? actionFor(init.severity),
    reason: init.reason,
    confidence: Math.min(1, Math.max(0, init.confidence)),
    patterns: Object.freeze([...(init.patterns ?? [])]),
  })
}

/**
 * Verdict returned for empty or whitespace-only text.
 */
export function emptyInputVerdict(): Verdict {
  return createVerdict({ severity: 'low', reason: 'empty input', confidence: 1 })
}

/**
 * Verdict returned for a locked-out user without classifying their text.
 */
export function blockedUserVerdict(): Verdict {
  return createVerdict({
    severity: 'critical',
    action: 'block',
    reason: 'User is currently blocked',
    confidence: 1,
  })
}
