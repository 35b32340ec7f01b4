import type {
  ClassificationContext,
  Direction,
  Rule,
  RuleSet,
  Severity,
  Verdict,
} from './types.js'
import { isHigherSeverity } from './policy.js'
import { createVerdict, emptyInputVerdict } from './verdict.js'
import type { AuditLogger } from '../audit/service.js'

/**
 * One triggered rule or guard.
 */
export interface Signal {
  id: string
  severity: Severity
  explanation: string
}

/**
 * Confidence = min(1, base + step * signals).
 */
export interface ConfidenceCurve {
  base: number
  step: number
}

export interface ClassifierOptions {
  audit?: AuditLogger
}

export const INPUT_LENGTH_GUARD = 'guard.input_length'
export const EXCESSIVE_CERTAINTY_GUARD = 'guard.excessive_certainty'

function escapeRegExp(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Shared classification algorithm. Subclasses add direction-specific guards.
 *
 * classify() is pure apart from the audit entry it emits for non-safe text,
 * so one instance can serve any number of concurrent requests.
 */
export abstract class Classifier {
  abstract readonly direction: Direction
  protected abstract readonly curve: ConfidenceCurve
  private readonly audit?: AuditLogger

  constructor(
    protected readonly ruleSet: RuleSet,
    options: ClassifierOptions = {}
  ) {
    this.audit = options.audit
  }

  /**
   * Extra signals computed from the raw and normalized text.
   */
  protected abstract guards(raw: string, normalized: string): Signal[]

  classify(text: string, context?: ClassificationContext): Verdict {
    if (!text || !text.trim()) {
      const verdict = emptyInputVerdict()
      this.record(verdict, text.length, context)
      return verdict
    }

    const normalized = text.trim().toLowerCase()
    const signals = [...this.matchRules(normalized), ...this.guards(text, normalized)]

    let severity: Severity = 'safe'
    for (const signal of signals) {
      if (isHigherSeverity(signal.severity, severity)) {
        severity = signal.severity
      }
    }

    const verdict = createVerdict({
      severity,
      reason:
        signals.length > 0
          ? signals.map((s) => `${s.explanation} (${s.severity})`).join('; ')
          : `${this.direction === 'input' ? 'Input' : 'Output'} appears safe`,
      confidence: this.curve.base + this.curve.step * signals.length,
      patterns: signals.map((s) => s.id),
    })

    this.record(verdict, text.length, context)
    return verdict
  }

  /**
   * Evaluate every rule of every table, in order.
   */
  private matchRules(normalized: string): Signal[] {
    const signals: Signal[] = []
    for (const table of this.ruleSet.tables) {
      for (const rule of table.rules) {
        if (rule.pattern.test(normalized)) {
          signals.push(toSignal(rule))
        }
      }
    }
    return signals
  }

  private record(
    verdict: Verdict,
    length: number,
    context?: ClassificationContext
  ): void {
    if (!this.audit || verdict.severity === 'safe') return

    const userId = context?.userId
    this.audit.emit({
      category: this.direction,
      action: `${this.direction}.classified`,
      severity: 'warning',
      userId: typeof userId === 'string' ? userId : undefined,
      metadata: {
        severity: verdict.severity,
        action: verdict.action,
        confidence: verdict.confidence,
        patterns: [...verdict.patterns],
        length,
        contextKeys: context ? Object.keys(context) : [],
      },
    })
  }
}

function toSignal(rule: Rule): Signal {
  return { id: rule.id, severity: rule.severity, explanation: rule.explanation }
}

export interface InputClassifierOptions extends ClassifierOptions {
  /** Text longer than this is at least medium. Default 5000. */
  maxInputLength?: number
}

/**
 * Classifies user text before it reaches the model.
 */
export class InputClassifier extends Classifier {
  readonly direction = 'input' as const
  protected readonly curve: ConfidenceCurve = { base: 0.7, step: 0.3 }
  private readonly maxInputLength: number

  constructor(ruleSet: RuleSet, options: InputClassifierOptions = {}) {
    super(ruleSet, options)
    this.maxInputLength = options.maxInputLength ?? 5000
  }

  protected guards(raw: string): Signal[] {
    // Code points, so astral characters count once
    const length = [...raw].length
    if (length <= this.maxInputLength) return []
    return [
      {
        id: INPUT_LENGTH_GUARD,
        severity: 'medium',
        explanation: `Input length exceeds safe limits (${length} > ${this.maxInputLength})`,
      },
    ]
  }
}

export interface OutputClassifierOptions extends ClassifierOptions {
  /** More certainty words than this makes the text at least medium. Default 3. */
  certaintyWordThreshold?: number
}

/**
 * Classifies model text before it reaches the user.
 */
export class OutputClassifier extends Classifier {
  readonly direction = 'output' as const
  protected readonly curve: ConfidenceCurve = { base: 0.8, step: 0.2 }
  private readonly certaintyWordThreshold: number
  private readonly certaintyPattern: RegExp

  constructor(ruleSet: RuleSet, options: OutputClassifierOptions = {}) {
    super(ruleSet, options)
    this.certaintyWordThreshold = options.certaintyWordThreshold ?? 3
    this.certaintyPattern = new RegExp(
      `\\b(?:${ruleSet.certaintyTerms.map(escapeRegExp).join('|')})\\b`,
      'gi'
    )
  }

  /**
   * Count whole-word certainty terms in normalized text.
   */
  countCertaintyWords(normalized: string): number {
    if (this.ruleSet.certaintyTerms.length === 0) return 0
    // matchAll works on a copy, so the shared pattern keeps no lastIndex state
    return Array.from(normalized.matchAll(this.certaintyPattern)).length
  }

  protected guards(_raw: string, normalized: string): Signal[] {
    const count = this.countCertaintyWords(normalized)
    if (count <= this.certaintyWordThreshold) return []
    return [
      {
        id: EXCESSIVE_CERTAINTY_GUARD,
        severity: 'medium',
        explanation: `Excessive confidence in uncertain predictions (${count} certainty words)`,
      },
    ]
  }
}
