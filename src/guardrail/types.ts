/**
 * Risk classification for a piece of text.
 *
 * Ordering: safe < low < medium < high < critical
 * Always compare through SEVERITY_ORDER, never through array or key order.
 */
export type Severity = 'safe' | 'low' | 'medium' | 'high' | 'critical'

/**
 * Operational consequence of a severity.
 */
export type Action = 'allow' | 'warn' | 'block' | 'escalate'

/**
 * Which side of the model the text is on.
 */
export type Direction = 'input' | 'output'

/**
 * Severity rank (higher number = riskier).
 */
export const SEVERITY_ORDER: Record<Severity, number> = {
  safe: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
}

export const SEVERITIES = ['safe', 'low', 'medium', 'high', 'critical'] as const satisfies readonly Severity[]

/**
 * A compiled classification rule.
 */
export interface Rule {
  readonly id: string
  /** Name of the table the rule belongs to (harmful, compliance, ...). */
  readonly table: string
  readonly severity: Severity
  readonly pattern: RegExp
  readonly explanation: string
}

/**
 * A named group of rules.
 */
export interface RuleTable {
  readonly name: string
  readonly rules: readonly Rule[]
}

/**
 * All rules that apply to one direction.
 */
export interface RuleSet {
  readonly direction: Direction
  readonly tables: readonly RuleTable[]
  /** Vocabulary for the excessive-certainty guard (output side only). */
  readonly certaintyTerms: readonly string[]
}

/**
 * Result of classifying one text blob. Frozen on construction.
 */
export interface Verdict {
  readonly severity: Severity
  readonly action: Action
  readonly reason: string
  readonly confidence: number
  readonly patterns: readonly string[]
}

/**
 * Optional caller context for output classification (agent type, session, ...).
 */
export type ClassificationContext = Record<string, unknown>

/**
 * Result of a pipeline filter call.
 */
export interface FilterResult {
  allowed: boolean
  message: string
  verdict: Verdict
}

/**
 * Per-user escalation state.
 */
export interface UserState {
  warningCount: number
  blocked: boolean
}

/**
 * Read-only view of a user's state, as exposed to the transport layer.
 */
export interface UserStatus {
  userId: string
  warnings: number
  isBlocked: boolean
  maxWarnings: number
}

/**
 * What a recorded outcome did to the user's state.
 */
export type UserTransition =
  | 'none' // allow, nothing recorded
  | 'warning' // warning counted, below the limit
  | 'violation' // block counted toward the limit
  | 'lockout' // warning limit reached, user now blocked
  | 'escalation' // critical outcome, user now blocked
  | 'already-blocked'

export interface OutcomeRecord {
  /** Effective action after applying user state. */
  action: Action
  blocked: boolean
  transition: UserTransition
}

/**
 * Point-in-time aggregates for a health surface.
 */
export interface TrackerStats {
  blockedUsers: number
  totalWarnings: number
}
