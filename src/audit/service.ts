import { randomUUID } from 'crypto'
import type { AuditEntry } from './schema.js'
import {
  AUDIT_SEVERITY_ORDER,
  type AuditCategory,
  type AuditSeverity,
} from './types.js'
import type { AuditFilter, AuditStore } from './store/interface.js'
import { JsonlAuditStore } from './store/jsonl.js'
import { getAuditPath } from '../config/paths.js'

/**
 * Options for creating an audit entry.
 */
export interface AuditOptions {
  category: AuditCategory
  action: string
  severity?: AuditSeverity
  requestId?: string
  userId?: string
  metadata?: Record<string, unknown>
}

export interface AuditLoggerOptions {
  /** Entries below this severity are dropped. Default: debug (keep all). */
  minSeverity?: AuditSeverity
  /** When false nothing is written. Default: true. */
  enabled?: boolean
}

/**
 * Audit logger service.
 *
 * All entries are sanitized by the store before they are written.
 */
export class AuditLogger {
  private readonly store: AuditStore
  private readonly minSeverity: AuditSeverity
  private readonly enabled: boolean

  constructor(store?: AuditStore, options: AuditLoggerOptions = {}) {
    this.store = store ?? new JsonlAuditStore(getAuditPath())
    this.minSeverity = options.minSeverity ?? 'debug'
    this.enabled = options.enabled ?? true
  }

  /**
   * Whether an entry of this severity would be written.
   */
  isEnabledFor(severity: AuditSeverity): boolean {
    return (
      this.enabled &&
      AUDIT_SEVERITY_ORDER[severity] >= AUDIT_SEVERITY_ORDER[this.minSeverity]
    )
  }

  /**
   * Log an audit entry.
   */
  async log(options: AuditOptions): Promise<void> {
    const severity = options.severity ?? 'info'
    if (!this.isEnabledFor(severity)) return

    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date(),
      category: options.category,
      action: options.action,
      severity,
      requestId: options.requestId,
      userId: options.userId,
      metadata: options.metadata,
    }

    await this.store.append(entry)
  }

  /**
   * Log without waiting. Store failures are reported on stderr and never
   * reach the caller.
   */
  emit(options: AuditOptions): void {
    this.log(options).catch((error: unknown) => {
      console.error(`Audit write failed (${options.category}/${options.action}):`, error)
    })
  }

  async debug(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'debug', metadata })
  }

  async info(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'info', metadata })
  }

  async warning(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'warning', metadata })
  }

  async alert(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'alert', metadata })
  }

  async critical(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'critical', metadata })
  }

  /**
   * Query the audit store.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    return this.store.query(filter)
  }
}
