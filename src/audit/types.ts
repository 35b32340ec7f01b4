/**
 * Audit event categories.
 */
export type AuditCategory =
  | 'input' // User text classification
  | 'output' // Model text classification
  | 'user' // Lockout, escalation, reset
  | 'security' // Host-reported security events and handler failures
  | 'config' // Configuration and rule loading

/**
 * Audit event severity levels.
 */
export type AuditSeverity =
  | 'debug'
  | 'info'
  | 'warning'
  | 'alert'
  | 'critical'

/**
 * Severity ordering (higher number = more severe).
 */
export const AUDIT_SEVERITY_ORDER: Record<AuditSeverity, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  alert: 3,
  critical: 4,
}

// NOTE: AuditEntry is defined in schema.ts and re-exported from index.ts
