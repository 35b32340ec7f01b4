import type { AppConfig } from '../config/schema.js'
import { loadConfig, type LoadConfigOptions } from '../config/loader.js'
import { getAuditPath } from '../config/paths.js'
import { AuditLogger } from '../audit/service.js'
import { JsonlAuditStore } from '../audit/store/jsonl.js'
import { MemoryAuditStore } from '../audit/store/memory.js'
import { PatternLibrary } from './library.js'
import { UserStateTracker } from './tracker.js'
import { GuardrailPipeline } from './pipeline.js'

export interface CreateGuardrailOptions {
  /** Fully resolved config. When absent, loadConfig(load) is used. */
  config?: AppConfig
  load?: LoadConfigOptions
  library?: PatternLibrary
  tracker?: UserStateTracker
  audit?: AuditLogger
}

/**
 * Build the audit logger described by the logging section.
 */
export function createAuditLogger(logging: AppConfig['logging']): AuditLogger {
  const store = logging.audit.inMemory
    ? new MemoryAuditStore(logging.audit.memoryCapacity)
    : new JsonlAuditStore(logging.audit.dir ?? getAuditPath())

  return new AuditLogger(store, {
    minSeverity: logging.level,
    enabled: logging.audit.enabled,
  })
}

/**
 * Load config and rules, then wire a pipeline. Call once per process and
 * share the result; each call gets its own user state.
 */
export async function createGuardrail(
  options: CreateGuardrailOptions = {}
): Promise<GuardrailPipeline> {
  const config = options.config ?? (await loadConfig(options.load))
  const library =
    options.library ?? (await PatternLibrary.load(config.guardrail.rulesDir))
  const audit = options.audit ?? createAuditLogger(config.logging)
  const tracker =
    options.tracker ??
    new UserStateTracker({ maxWarnings: config.guardrail.maxWarnings })

  audit.emit({
    category: 'config',
    action: 'guardrail.started',
    severity: 'info',
    metadata: {
      inputRules: library.rules('input').length,
      outputRules: library.rules('output').length,
      maxWarnings: tracker.maxWarnings,
      maxInputLength: config.guardrail.maxInputLength,
      certaintyWordThreshold: config.guardrail.certaintyWordThreshold,
    },
  })

  return new GuardrailPipeline({
    library,
    tracker,
    audit,
    guardrail: config.guardrail,
    messages: config.messages,
  })
}
