import type { AuditEntry } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import { matchesFilter, type AuditFilter, type AuditStore } from './interface.js'

/**
 * In-process audit store holding the most recent entries.
 *
 * Oldest entries are dropped once capacity is reached. Used by tests and by
 * hosts that forward audit events elsewhere instead of writing files.
 */
export class MemoryAuditStore implements AuditStore {
  private readonly entries: AuditEntry[] = []

  constructor(private readonly capacity = 1000) {}

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(sanitizeAuditEntry(entry))
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity)
    }
  }

  /**
   * Query entries, newest first.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    const results: AuditEntry[] = []
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i]
      if (!matchesFilter(entry, filter)) continue
      results.push(entry)
      if (filter.limit && results.length >= filter.limit) break
    }
    return results
  }

  /**
   * All stored entries in insertion order.
   */
  all(): AuditEntry[] {
    return [...this.entries]
  }

  get size(): number {
    return this.entries.length
  }

  clear(): void {
    this.entries.length = 0
  }
}
