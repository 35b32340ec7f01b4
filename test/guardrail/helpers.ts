import { AuditLogger } from '../../src/audit/service.js'
import { MemoryAuditStore } from '../../src/audit/store/memory.js'
import type { PatternLibraryDefinition } from '../../src/guardrail/library.js'

/**
 * Let fire-and-forget audit writes settle.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

export function createTestAudit(): { audit: AuditLogger; store: MemoryAuditStore } {
  const store = new MemoryAuditStore()
  return { audit: new AuditLogger(store), store }
}

/**
 * Small rule set for tests that should not depend on the bundled rules.
 */
export function minimalDefinition(
  extraInputRules: PatternLibraryDefinition['input']['tables'][number]['rules'] = []
): PatternLibraryDefinition {
  return {
    input: {
      direction: 'input',
      tables: [
        {
          name: 'test',
          rules: [
            { id: 'test.late_rent', severity: 'low', pattern: 'late\\s+rent', explanation: 'Late rent' },
            ...extraInputRules,
          ],
        },
      ],
    },
    output: {
      direction: 'output',
      certaintyTerms: ['always', 'never'],
      tables: [
        {
          name: 'test',
          rules: [
            { id: 'test.wire_money', severity: 'high', pattern: 'wire\\s+money', explanation: 'Wire transfer request' },
          ],
        },
      ],
    },
  }
}
