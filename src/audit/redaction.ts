import type { AuditEntry } from './schema.js'

/**
 * Fields that must NEVER appear in audit logs.
 *
 * Paths are relative to the AuditEntry root object, so
 * 'metadata.input.text' means entry.metadata.input.text.
 */
const NEVER_LOG_FIELDS = [
  'metadata.input.text', // User message text
  'metadata.output.text', // Model response text
  'metadata.context.content', // Conversation content passed as context
  'metadata.text', // Raw text passed by host events
]

/**
 * Maximum length for error messages in audit logs.
 */
const MAX_ERROR_MESSAGE_LENGTH = 500

/**
 * Sanitize an audit entry by removing NEVER_LOG fields and truncating
 * error messages.
 *
 * Every store calls this before writing.
 */
export function sanitizeAuditEntry(entry: AuditEntry): AuditEntry {
  // Deep clone to avoid mutation
  const sanitized = structuredClone(entry)

  if (sanitized.metadata) {
    for (const field of NEVER_LOG_FIELDS) {
      deletePath(sanitized, field.split('.'))
    }

    if (sanitized.metadata.errorMessage !== undefined) {
      sanitized.metadata.errorMessage = sanitizeErrorMessage(
        String(sanitized.metadata.errorMessage)
      )
    }
  }

  return sanitized
}

/**
 * Collapse whitespace and truncate an error message.
 */
export function sanitizeErrorMessage(msg: string): string {
  return msg.replace(/\s+/g, ' ').trim().slice(0, MAX_ERROR_MESSAGE_LENGTH)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Delete a value at a path in an object.
 */
function deletePath(obj: object, parts: string[]): void {
  let current: unknown = obj

  for (let i = 0; i < parts.length - 1; i++) {
    if (!isRecord(current)) return
    current = current[parts[i]]
  }

  if (isRecord(current)) {
    delete current[parts[parts.length - 1]]
  }
}
