import { describe, it, expect } from 'vitest'
import { AppConfigSchema } from '../../src/config/schema.js'

describe('AppConfigSchema', () => {
  it('parses empty object with defaults', () => {
    const config = AppConfigSchema.parse({})
    expect(config.version).toBe(1)
    expect(config.guardrail).toEqual({
      maxWarnings: 3,
      blockDurationSeconds: 3600,
      maxInputLength: 5000,
      certaintyWordThreshold: 3,
    })
    expect(config.logging).toEqual({
      level: 'info',
      audit: { enabled: true, inMemory: false, memoryCapacity: 1000 },
    })
  })

  it('fills the default replacement texts', () => {
    const config = AppConfigSchema.parse({})
    expect(config.messages.warningLimit).toBe(
      'Your account has been temporarily restricted due to repeated security warnings.'
    )
    expect(config.messages.outputDisclaimer.startsWith('\n\n')).toBe(true)
  })

  it('keeps explicit values and fills the rest', () => {
    const config = AppConfigSchema.parse({
      guardrail: { maxWarnings: 5, rulesDir: '/etc/convoguard/rules' },
      messages: { rephrase: 'Please rephrase.' },
    })
    expect(config.guardrail.maxWarnings).toBe(5)
    expect(config.guardrail.maxInputLength).toBe(5000)
    expect(config.guardrail.rulesDir).toBe('/etc/convoguard/rules')
    expect(config.messages.rephrase).toBe('Please rephrase.')
    expect(config.messages.blockedUser).toBe(AppConfigSchema.parse({}).messages.blockedUser)
  })

  it('rejects zero maxWarnings', () => {
    expect(() => AppConfigSchema.parse({ guardrail: { maxWarnings: 0 } })).toThrow()
  })

  it('rejects fractional maxWarnings', () => {
    expect(() => AppConfigSchema.parse({ guardrail: { maxWarnings: 2.5 } })).toThrow()
  })

  it('accepts a zero certainty threshold', () => {
    const config = AppConfigSchema.parse({ guardrail: { certaintyWordThreshold: 0 } })
    expect(config.guardrail.certaintyWordThreshold).toBe(0)
  })

  it('rejects a non-positive input length', () => {
    expect(() => AppConfigSchema.parse({ guardrail: { maxInputLength: 0 } })).toThrow()
  })

  it('returns fresh nested defaults on each parse', () => {
    const first = AppConfigSchema.parse({})
    first.guardrail.maxWarnings = 10
    expect(AppConfigSchema.parse({}).guardrail.maxWarnings).toBe(3)
  })

  it('rejects invalid log level', () => {
    expect(() => AppConfigSchema.parse({ logging: { level: 'invalid' } })).toThrow()
  })
})
