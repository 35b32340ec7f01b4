import { MessagesConfigSchema, type MessagesConfig } from '../config/schema.js'

export type SafeErrorKind = 'general' | 'inappropriate' | 'technical' | 'blocked'

const SAFE_ERROR_MESSAGES: Record<SafeErrorKind, string> = {
  general:
    'I apologize, but I encountered an issue processing your request. Please try rephrasing your question about real estate.',
  inappropriate:
    'Please keep our conversation focused on real estate topics and maintain a professional tone.',
  technical:
    "I'm experiencing technical difficulties. Please try your real estate question again in a moment.",
  blocked:
    "Your request cannot be processed. Please ensure you're asking about legitimate real estate topics.",
}

function isSafeErrorKind(kind: string): kind is SafeErrorKind {
  return Object.prototype.hasOwnProperty.call(SAFE_ERROR_MESSAGES, kind)
}

/**
 * User-safe text for a failure. Unknown kinds get the general message.
 */
export function getSafeErrorMessage(kind: string = 'general'): string {
  return isSafeErrorKind(kind) ? SAFE_ERROR_MESSAGES[kind] : SAFE_ERROR_MESSAGES.general
}

/**
 * Default replacement texts, overridden field by field.
 */
export function resolveMessages(overrides: Partial<MessagesConfig> = {}): MessagesConfig {
  return MessagesConfigSchema.parse(overrides)
}
