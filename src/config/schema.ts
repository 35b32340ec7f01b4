import { z } from 'zod'

// Escalation and classification limits
export const GuardrailConfigSchema = z.object({
  maxWarnings: z.number().int().min(1).default(3),
  // Defined for hosts that display it; blocks are never lifted automatically
  blockDurationSeconds: z.number().int().positive().default(3600),
  maxInputLength: z.number().int().positive().default(5000),
  certaintyWordThreshold: z.number().int().min(0).default(3),
  rulesDir: z.string().optional(),
})

// User-facing replacement texts
export const MessagesConfigSchema = z.object({
  rephrase: z
    .string()
    .default(
      '⚠️ Your message contains potentially inappropriate content. Please rephrase your question about real estate in a professional manner.'
    ),
  policyViolation: z
    .string()
    .default(
      '❌ Your message has been blocked due to inappropriate content. Please ask questions related to real estate in a respectful and legal manner.'
    ),
  restricted: z
    .string()
    .default(
      '🚨 Your message has been flagged for serious policy violations. Your account has been temporarily restricted.'
    ),
  warningLimit: z
    .string()
    .default(
      'Your account has been temporarily restricted due to repeated security warnings.'
    ),
  blockedUser: z
    .string()
    .default(
      'Your account has been temporarily restricted due to security concerns. Please contact support.'
    ),
  outputDisclaimer: z
    .string()
    .default(
      '\n\n⚠️ **Disclaimer**: This information is for general purposes only. Please consult with qualified professionals for specific advice regarding real estate transactions, legal matters, or financial decisions.'
    ),
  outputFallback: z
    .string()
    .default(
      "I apologize, but I cannot provide a response to that query. Please ask me about real estate properties, market insights, or general housing information, and I'll be happy to help."
    ),
})

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warning', 'alert', 'critical']).default('info'),
  audit: z
    .object({
      enabled: z.boolean().default(true),
      // Directory for JSONL files; defaults to CONVOGUARD_HOME/logs/audit
      dir: z.string().optional(),
      // Use an in-process store instead of files
      inMemory: z.boolean().default(false),
      memoryCapacity: z.number().int().positive().default(1000),
    })
    .default({}),
})

// Full application configuration
export const AppConfigSchema = z.object({
  version: z.number().int().positive().default(1),
  guardrail: GuardrailConfigSchema.default({}),
  messages: MessagesConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type AppConfig = z.infer<typeof AppConfigSchema>
export type GuardrailConfig = z.infer<typeof GuardrailConfigSchema>
export type MessagesConfig = z.infer<typeof MessagesConfigSchema>
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

/**
 * Partial config accepted from files, env and explicit overrides.
 */
export type AppConfigInput = z.input<typeof AppConfigSchema>
