import type {
  Action,
  ClassificationContext,
  FilterResult,
  TrackerStats,
  UserStatus,
  Verdict,
} from './types.js'
import type { PatternLibrary } from './library.js'
import { InputClassifier, OutputClassifier } from './classifier.js'
import { UserStateTracker } from './tracker.js'
import { blockedUserVerdict } from './verdict.js'
import { resolveMessages } from './messages.js'
import type { AuditLogger } from '../audit/service.js'
import type { GuardrailConfig, MessagesConfig } from '../config/schema.js'

export interface GuardrailPipelineOptions {
  library: PatternLibrary
  /** Shared user state. Default: a fresh tracker using guardrail.maxWarnings. */
  tracker?: UserStateTracker
  audit?: AuditLogger
  guardrail?: Partial<Pick<GuardrailConfig, 'maxWarnings' | 'maxInputLength' | 'certaintyWordThreshold'>>
  messages?: Partial<MessagesConfig>
}

export interface GuardrailHealth extends TrackerStats {
  status: 'healthy'
  guardrailActive: true
}

/**
 * GuardrailPipeline - the two checkpoints around a model call.
 *
 *   transport -> filterInput(text, userId) -> model -> filterOutput(text) -> transport
 *
 * Input decisions feed the user's escalation state; output decisions only
 * ever affect the content.
 */
export class GuardrailPipeline {
  readonly inputClassifier: InputClassifier
  readonly outputClassifier: OutputClassifier
  readonly tracker: UserStateTracker
  private readonly audit?: AuditLogger
  private readonly messages: MessagesConfig

  constructor(options: GuardrailPipelineOptions) {
    const { library, audit, guardrail = {} } = options
    this.audit = audit
    this.messages = resolveMessages(options.messages)
    this.tracker =
      options.tracker ?? new UserStateTracker({ maxWarnings: guardrail.maxWarnings })
    this.inputClassifier = new InputClassifier(library.input, {
      audit,
      maxInputLength: guardrail.maxInputLength,
    })
    this.outputClassifier = new OutputClassifier(library.output, {
      audit,
      certaintyWordThreshold: guardrail.certaintyWordThreshold,
    })
  }

  /**
   * Check user text before it is sent to the model.
   */
  filterInput(text: string, userId?: string): FilterResult {
    if (userId && this.tracker.isBlocked(userId)) {
      this.audit?.emit({
        category: 'user',
        action: 'user.blocked_attempt',
        severity: 'info',
        userId,
      })
      return {
        allowed: false,
        message: this.messages.blockedUser,
        verdict: blockedUserVerdict(),
      }
    }

    const verdict = this.inputClassifier.classify(text, userId ? { userId } : undefined)

    // No identifier, no tracking
    if (!userId) {
      return this.respondToInput(text, verdict.action, verdict)
    }

    const outcome = this.tracker.recordOutcome(userId, verdict.action)

    switch (outcome.transition) {
      case 'lockout':
        this.auditBlocked(userId, 'warning_limit', verdict)
        return { allowed: false, message: this.messages.warningLimit, verdict }
      case 'escalation':
        this.auditBlocked(userId, 'critical_violation', verdict)
        break
      case 'already-blocked':
        return { allowed: false, message: this.messages.blockedUser, verdict }
    }

    return this.respondToInput(text, outcome.action, verdict)
  }

  /**
   * Check model text before it is shown to the user.
   */
  filterOutput(text: string, context?: ClassificationContext): FilterResult {
    const verdict = this.outputClassifier.classify(text, context)

    switch (verdict.action) {
      case 'allow':
        return { allowed: true, message: text, verdict }
      case 'warn':
        // Output warnings annotate instead of rejecting
        return { allowed: true, message: text + this.messages.outputDisclaimer, verdict }
      case 'block':
      case 'escalate':
        this.audit?.emit({
          category: 'output',
          action: 'output.blocked',
          severity: 'alert',
          metadata: { severity: verdict.severity, reason: verdict.reason, patterns: [...verdict.patterns] },
        })
        return { allowed: false, message: this.messages.outputFallback, verdict }
    }
  }

  status(userId: string): UserStatus {
    return this.tracker.status(userId)
  }

  /**
   * Clear a user's warnings and lift their block.
   */
  reset(userId: string): void {
    const previous = this.tracker.status(userId)
    this.tracker.reset(userId)
    this.audit?.emit({
      category: 'user',
      action: 'user.reset',
      severity: 'info',
      userId,
      metadata: { previousWarnings: previous.warnings, wasBlocked: previous.isBlocked },
    })
  }

  stats(): TrackerStats {
    return this.tracker.stats()
  }

  health(): GuardrailHealth {
    return { status: 'healthy', guardrailActive: true, ...this.tracker.stats() }
  }

  /**
   * Record a security event reported by the host. Fire-and-forget.
   */
  logSecurityEvent(
    eventType: string,
    userId: string | undefined,
    details: Record<string, unknown>
  ): void {
    this.audit?.emit({
      category: 'security',
      action: eventType,
      severity: 'info',
      userId,
      metadata: details,
    })
  }

  private respondToInput(text: string, action: Action, verdict: Verdict): FilterResult {
    switch (action) {
      case 'allow':
        return { allowed: true, message: text, verdict }
      case 'warn':
        return { allowed: false, message: this.messages.rephrase, verdict }
      case 'block':
        return { allowed: false, message: this.messages.policyViolation, verdict }
      case 'escalate':
        return { allowed: false, message: this.messages.restricted, verdict }
    }
  }

  private auditBlocked(userId: string, cause: string, verdict: Verdict): void {
    this.audit?.emit({
      category: 'user',
      action: 'user.blocked',
      severity: 'critical',
      userId,
      metadata: {
        cause,
        severity: verdict.severity,
        reason: verdict.reason,
        patterns: [...verdict.patterns],
        warnings: this.tracker.status(userId).warnings,
      },
    })
  }
}
