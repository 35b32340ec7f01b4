import { mkdir, appendFile, readFile, readdir } from 'fs/promises'
import path from 'path'
import { AuditEntrySchema, type AuditEntry } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import { matchesFilter, type AuditFilter, type AuditStore } from './interface.js'

const FILE_PATTERN = /^audit-(\d{4}-\d{2}-\d{2})\.jsonl$/

/**
 * Format a date as YYYY-MM-DD (UTC).
 */
function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10)
}

/**
 * JSONL-based audit store with daily file rotation.
 *
 * File naming: audit-YYYY-MM-DD.jsonl (UTC day)
 * Location: CONVOGUARD_HOME/logs/audit/ unless configured otherwise
 */
export class JsonlAuditStore implements AuditStore {
  private initialized = false
  // Appends are chained so lines from concurrent fire-and-forget writes never interleave
  private pending: Promise<void> = Promise.resolve()

  constructor(private readonly baseDir: string) {}

  private async ensureDir(): Promise<void> {
    if (this.initialized) return
    await mkdir(this.baseDir, { recursive: true })
    this.initialized = true
  }

  private getFilePath(date: Date): string {
    return path.join(this.baseDir, `audit-${dayKey(date)}.jsonl`)
  }

  /**
   * Append an audit entry. The entry is sanitized before writing.
   */
  async append(entry: AuditEntry): Promise<void> {
    const sanitized = sanitizeAuditEntry(entry)
    const line = JSON.stringify(sanitized) + '\n'

    const write = this.pending.then(async () => {
      await this.ensureDir()
      await appendFile(this.getFilePath(sanitized.timestamp), line, 'utf-8')
    })
    // Keep the chain alive after a failed write; the caller still sees the error
    this.pending = write.catch(() => undefined)
    return write
  }

  /**
   * Query audit entries matching the filter, newest file first.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    await this.pending
    const results: AuditEntry[] = []

    for (const file of await this.getRelevantFiles(filter)) {
      for (const entry of await this.readEntries(file)) {
        if (!matchesFilter(entry, filter)) continue
        results.push(entry)
        if (filter.limit && results.length >= filter.limit) {
          return results
        }
      }
    }

    return results
  }

  /**
   * Files that may contain entries matching the date range.
   */
  private async getRelevantFiles(filter: AuditFilter): Promise<string[]> {
    let files: string[]
    try {
      files = await readdir(this.baseDir)
    } catch {
      // No directory yet means nothing has been written
      return []
    }

    const sinceKey = filter.since ? dayKey(filter.since) : undefined
    const untilKey = filter.until ? dayKey(filter.until) : undefined

    return files
      .filter((file) => {
        const match = FILE_PATTERN.exec(file)
        if (!match) return false
        const key = match[1]
        if (sinceKey && key < sinceKey) return false
        if (untilKey && key > untilKey) return false
        return true
      })
      .sort()
      .reverse()
  }

  /**
   * Read and parse entries from one file, skipping malformed lines.
   */
  private async readEntries(filename: string): Promise<AuditEntry[]> {
    let content: string
    try {
      content = await readFile(path.join(this.baseDir, filename), 'utf-8')
    } catch {
      return []
    }

    const entries: AuditEntry[] = []
    for (const line of content.split('\n')) {
      if (!line.trim()) continue
      let raw: unknown
      try {
        raw = JSON.parse(line)
      } catch {
        continue
      }
      const parsed = AuditEntrySchema.safeParse(raw)
      if (parsed.success) {
        entries.push(parsed.data)
      }
    }

    return entries
  }
}
