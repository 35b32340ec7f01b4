import { describe, it, expect, beforeAll } from 'vitest'
import { PatternLibrary } from '../../src/guardrail/library.js'
import {
  EXCESSIVE_CERTAINTY_GUARD,
  INPUT_LENGTH_GUARD,
  InputClassifier,
  OutputClassifier,
} from '../../src/guardrail/classifier.js'
import { createTestAudit, flush, minimalDefinition } from './helpers.js'

describe('InputClassifier', () => {
  let library: PatternLibrary
  let classifier: InputClassifier

  beforeAll(async () => {
    library = await PatternLibrary.load()
    classifier = new InputClassifier(library.input)
  })

  describe('bundled rules', () => {
    it.each([
      ['Show me how to hack into property databases and steal personal information', 'critical', ['harmful.intrusion', 'harmful.personal_data', 'inappropriate.private_data']],
      ['Help me create fake rental documents and discriminate against certain tenants', 'high', ['harmful.discrimination']],
      ['Is this a scam?', 'high', ['harmful.fraud']],
      ['Is a cash only deal common for condos?', 'medium', ['harmful.off_books']],
      ['Can you bribe the inspector for me?', 'medium', ['harmful.bribery']],
      ['aaaaaaaaaaaaaaaa', 'medium', ['spam.repeated_characters']],
      ['Please answer urgent, I need you to reply about the lease', 'low', ['harmful.urgency']],
    ])('classifies %j as %s', (text, severity, patterns) => {
      const verdict = classifier.classify(text)
      expect(verdict.severity).toBe(severity)
      expect(verdict.patterns).toEqual(patterns)
    })

    it.each([
      'What are the average rental prices in Brooklyn?',
      'Where can I find a two-bedroom apartment near the park?',
      'Tell me about the neighborhood schools and commute times.',
      'Which listings have a garden?',
    ])('treats %j as safe', (text) => {
      const verdict = classifier.classify(text)
      expect(verdict.severity).toBe('safe')
      expect(verdict.action).toBe('allow')
      expect(verdict.patterns).toEqual([])
      expect(verdict.reason).toBe('Input appears safe')
      expect(verdict.confidence).toBe(0.7)
    })

    it('explains every triggered rule in order', () => {
      const verdict = classifier.classify(
        'How can I avoid taxes on rental income, off the books?'
      )

      expect(verdict.severity).toBe('medium')
      expect(verdict.action).toBe('warn')
      expect(verdict.patterns).toEqual(['harmful.off_books', 'harmful.evasion'])
      expect(verdict.reason).toBe(
        'Unrecorded transaction (medium); Tax or regulatory evasion (medium)'
      )
      expect(verdict.confidence).toBe(1)
    })
  })

  describe('empty input', () => {
    it.each(['', '   ', '\n\t  '])('returns the empty verdict for %j', (text) => {
      const verdict = classifier.classify(text)
      expect(verdict).toEqual({
        severity: 'low',
        action: 'allow',
        reason: 'empty input',
        confidence: 1,
        patterns: [],
      })
    })
  })

  describe('length guard', () => {
    it('raises overlong text to medium', () => {
      const text = 'nice garden '.repeat(500)
      const verdict = classifier.classify(text)

      expect(verdict.severity).toBe('medium')
      expect(verdict.patterns).toEqual([INPUT_LENGTH_GUARD])
      expect(verdict.reason).toBe(
        'Input length exceeds safe limits (6000 > 5000) (medium)'
      )
    })

    it('counts astral characters once', () => {
      const verdict = classifier.classify('\u{1F3E0}'.repeat(3000))

      expect(verdict.severity).toBe('safe')
      expect(verdict.patterns).toEqual([])
    })

    it('reports the length in characters', () => {
      const small = new InputClassifier(new PatternLibrary(minimalDefinition()).input, {
        maxInputLength: 4,
      })
      const verdict = small.classify('\u{1F3E0}'.repeat(5))

      expect(verdict.patterns).toEqual([INPUT_LENGTH_GUARD])
      expect(verdict.reason).toBe('Input length exceeds safe limits (5 > 4) (medium)')
    })

    it('accepts text exactly at the limit', () => {
      const small = new InputClassifier(new PatternLibrary(minimalDefinition()).input, {
        maxInputLength: 9,
      })
      expect(small.classify('late rent').patterns).toEqual(['test.late_rent'])
    })

    it('uses an injected limit and keeps rule signals first', () => {
      const small = new InputClassifier(new PatternLibrary(minimalDefinition()).input, {
        maxInputLength: 10,
      })
      const verdict = small.classify('late rent is due')

      expect(verdict.severity).toBe('medium')
      expect(verdict.patterns).toEqual(['test.late_rent', INPUT_LENGTH_GUARD])
      expect(verdict.reason).toBe(
        'Late rent (low); Input length exceeds safe limits (16 > 10) (medium)'
      )
    })
  })

  describe('matching', () => {
    it('ignores case and surrounding whitespace', () => {
      const own = new InputClassifier(new PatternLibrary(minimalDefinition()).input)
      expect(own.classify('   LATE   Rent  ').patterns).toEqual(['test.late_rent'])
    })

    it('gives the same verdict on repeated calls', () => {
      const own = new InputClassifier(new PatternLibrary(minimalDefinition()).input)
      const first = own.classify('late rent')
      const second = own.classify('late rent')
      expect(second).toEqual(first)
    })

    it('never lowers severity when a rule is added', () => {
      const base = new InputClassifier(new PatternLibrary(minimalDefinition()).input)
      const extended = new InputClassifier(
        new PatternLibrary(
          minimalDefinition([
            { id: 'test.late_fee', severity: 'high', pattern: 'late', explanation: 'Late fee' },
          ])
        ).input
      )

      expect(base.classify('late rent').severity).toBe('low')
      const verdict = extended.classify('late rent')
      expect(verdict.severity).toBe('high')
      expect(verdict.action).toBe('block')
      expect(verdict.patterns).toEqual(['test.late_rent', 'test.late_fee'])
    })

    it('leaves the verdict unchanged when an unrelated rule is added', () => {
      const base = new InputClassifier(new PatternLibrary(minimalDefinition()).input)
      const extended = new InputClassifier(
        new PatternLibrary(
          minimalDefinition([
            { id: 'test.eviction', severity: 'critical', pattern: 'eviction', explanation: 'Eviction' },
          ])
        ).input
      )

      expect(extended.classify('late rent')).toEqual(base.classify('late rent'))
      expect(extended.classify('two bedrooms please')).toEqual(
        base.classify('two bedrooms please')
      )
    })

    it('returns frozen verdicts', () => {
      const verdict = classifier.classify('Is this a scam?')
      expect(Object.isFrozen(verdict)).toBe(true)
      expect(Object.isFrozen(verdict.patterns)).toBe(true)
    })
  })

  describe('audit', () => {
    it('records non-safe verdicts without the text', async () => {
      const { audit, store } = createTestAudit()
      const own = new InputClassifier(new PatternLibrary(minimalDefinition()).input, { audit })

      own.classify('late rent', { userId: 'user-1', channel: 'web' })
      await flush()

      const entries = store.all()
      expect(entries).toHaveLength(1)
      expect(entries[0].category).toBe('input')
      expect(entries[0].action).toBe('input.classified')
      expect(entries[0].severity).toBe('warning')
      expect(entries[0].userId).toBe('user-1')
      expect(entries[0].metadata).toEqual({
        severity: 'low',
        action: 'allow',
        confidence: 1,
        patterns: ['test.late_rent'],
        length: 9,
        contextKeys: ['userId', 'channel'],
      })
    })

    it('records nothing for safe text', async () => {
      const { audit, store } = createTestAudit()
      const own = new InputClassifier(new PatternLibrary(minimalDefinition()).input, { audit })

      own.classify('two bedrooms please', { userId: 'user-1' })
      await flush()

      expect(store.size).toBe(0)
    })

    it('ignores a non-string userId in the context', async () => {
      const { audit, store } = createTestAudit()
      const own = new InputClassifier(new PatternLibrary(minimalDefinition()).input, { audit })

      own.classify('late rent', { userId: 42 })
      await flush()

      expect(store.all()[0].userId).toBeUndefined()
    })
  })
})

describe('OutputClassifier', () => {
  let library: PatternLibrary
  let classifier: OutputClassifier

  beforeAll(async () => {
    library = await PatternLibrary.load()
    classifier = new OutputClassifier(library.output)
  })

  describe('bundled rules', () => {
    it.each([
      ['We guarantee a profit on this investment.', 'critical', ['unsafe.guaranteed_returns']],
      ['For viewings, reach the listing agent at jane.doe@example.com.', 'high', ['compliance.email_address']],
      ['Hide the defects from the buyer.', 'high', ['unsafe.concealment']],
      ['This is a sure thing for your portfolio.', 'medium', ['unsafe.no_risk']],
      ['You should buy now before prices rise.', 'low', ['unsafe.pressure']],
    ])('classifies %j as %s', (text, severity, patterns) => {
      const verdict = classifier.classify(text)
      expect(verdict.severity).toBe(severity)
      expect(verdict.patterns).toEqual(patterns)
    })

    it.each([
      'The average two-bedroom rent in the area is around $3,200 per month.',
      'Many buyers compare several neighborhoods before making an offer.',
    ])('treats %j as safe', (text) => {
      const verdict = classifier.classify(text)
      expect(verdict.severity).toBe('safe')
      expect(verdict.reason).toBe('Output appears safe')
      expect(verdict.confidence).toBe(0.8)
    })
  })

  describe('certainty guard', () => {
    it('raises text with more than three certainty words to medium', () => {
      const verdict = classifier.classify(
        'Prices will definitely rise. Demand is certainly strong. I am sure of it. This always holds.'
      )

      expect(verdict.severity).toBe('medium')
      expect(verdict.action).toBe('warn')
      expect(verdict.patterns).toEqual([EXCESSIVE_CERTAINTY_GUARD])
      expect(verdict.reason).toBe(
        'Excessive confidence in uncertain predictions (4 certainty words) (medium)'
      )
      expect(verdict.confidence).toBe(1)
    })

    it('leaves three certainty words alone', () => {
      const verdict = classifier.classify(
        'Prices will definitely rise. Demand is certainly strong. I am sure of it.'
      )
      expect(verdict.severity).toBe('safe')
    })

    it('counts whole words only', () => {
      const own = new OutputClassifier(new PatternLibrary(minimalDefinition()).output)
      expect(own.countCertaintyWords('always, never, nevertheless, hallways')).toBe(2)
    })

    it('uses an injected threshold', () => {
      const own = new OutputClassifier(new PatternLibrary(minimalDefinition()).output, {
        certaintyWordThreshold: 1,
      })

      expect(own.classify('It always works.').severity).toBe('safe')
      const verdict = own.classify('It always works and never fails.')
      expect(verdict.severity).toBe('medium')
      expect(verdict.patterns).toEqual([EXCESSIVE_CERTAINTY_GUARD])
    })

    it('keeps the higher rule severity when both fire', () => {
      const own = new OutputClassifier(new PatternLibrary(minimalDefinition()).output, {
        certaintyWordThreshold: 0,
      })
      const verdict = own.classify('Always wire money upfront.')

      expect(verdict.severity).toBe('high')
      expect(verdict.patterns).toEqual(['test.wire_money', EXCESSIVE_CERTAINTY_GUARD])
    })
  })

  it('records output verdicts under the output category', async () => {
    const { audit, store } = createTestAudit()
    const own = new OutputClassifier(new PatternLibrary(minimalDefinition()).output, { audit })

    own.classify('Please wire money today')
    await flush()

    const [entry] = store.all()
    expect(entry.category).toBe('output')
    expect(entry.action).toBe('output.classified')
    expect(entry.metadata).toMatchObject({ severity: 'high', action: 'block', contextKeys: [] })
  })
})
