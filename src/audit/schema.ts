import { z } from 'zod'

/**
 * Audit entry schema.
 *
 * timestamp uses z.coerce.date() so entries read back from JSONL
 * (where the Date became an ISO string) parse to a Date again.
 */
export const AuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  category: z.enum(['input', 'output', 'user', 'security', 'config']),
  action: z.string(),
  severity: z.enum(['debug', 'info', 'warning', 'alert', 'critical']),
  requestId: z.string().optional(),
  userId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
})

export type AuditEntry = z.infer<typeof AuditEntrySchema>
