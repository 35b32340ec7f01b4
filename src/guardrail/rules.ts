import { z } from 'zod'
import { SEVERITIES } from './types.js'

export const RuleDefinitionSchema = z.object({
  id: z.string().min(1),
  severity: z.enum(SEVERITIES),
  pattern: z.string().min(1),
  explanation: z.string().min(1),
})

export const RuleTableDefinitionSchema = z.object({
  name: z.string().min(1),
  rules: z.array(RuleDefinitionSchema),
})

export const RuleSetDefinitionSchema = z.object({
  direction: z.enum(['input', 'output']),
  certaintyTerms: z.array(z.string().min(1)).default([]),
  tables: z.array(RuleTableDefinitionSchema).min(1),
})

export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>
export type RuleTableDefinition = z.infer<typeof RuleTableDefinitionSchema>
export type RuleSetDefinition = z.input<typeof RuleSetDefinitionSchema>
