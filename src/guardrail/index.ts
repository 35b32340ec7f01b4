// Types
export {
  SEVERITY_ORDER,
  SEVERITIES,
  type Severity,
  type Action,
  type Direction,
  type Rule,
  type RuleTable,
  type RuleSet,
  type Verdict,
  type ClassificationContext,
  type FilterResult,
  type UserState,
  type UserStatus,
  type UserTransition,
  type OutcomeRecord,
  type TrackerStats,
} from './types.js'

// Policy
export {
  actionFor,
  compareSeverity,
  isHigherSeverity,
  maxSeverity,
  isSeverity,
} from './policy.js'

// Rules
export {
  PatternLibrary,
  DEFAULT_RULES_DIR,
  type PatternLibraryDefinition,
} from './library.js'
export {
  RuleSetDefinitionSchema,
  type RuleDefinition,
  type RuleTableDefinition,
  type RuleSetDefinition,
} from './rules.js'
export { PatternLibraryError } from './errors.js'

// Classification
export { createVerdict, type VerdictInit } from './verdict.js'
export {
  Classifier,
  InputClassifier,
  OutputClassifier,
  INPUT_LENGTH_GUARD,
  EXCESSIVE_CERTAINTY_GUARD,
  type Signal,
  type ConfidenceCurve,
  type ClassifierOptions,
  type InputClassifierOptions,
  type OutputClassifierOptions,
} from './classifier.js'

// User state
export { UserStateTracker, type UserStateTrackerOptions } from './tracker.js'

// Pipeline
export {
  GuardrailPipeline,
  type GuardrailPipelineOptions,
  type GuardrailHealth,
} from './pipeline.js'
export {
  createGuardrail,
  createAuditLogger,
  type CreateGuardrailOptions,
} from './factory.js'

// Transport helpers
export { getSafeErrorMessage, type SafeErrorKind } from './messages.js'
export {
  withSafeErrors,
  isSafeErrorResponse,
  type SafeErrorResponse,
  type SafeErrorOptions,
} from './interceptor.js'
