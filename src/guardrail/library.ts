import { readFile } from 'fs/promises'
import path from 'path'
import { fileURLToPath } from 'url'
import type { Direction, Rule, RuleSet, RuleTable } from './types.js'
import {
  RuleSetDefinitionSchema,
  type RuleSetDefinition,
} from './rules.js'
import { PatternLibraryError } from './errors.js'

/**
 * Directory holding the bundled input.json / output.json rule files.
 * Resolves the same from src/guardrail and dist/guardrail.
 */
export const DEFAULT_RULES_DIR = fileURLToPath(
  new URL('../../rules/', import.meta.url)
)

export interface PatternLibraryDefinition {
  input: RuleSetDefinition
  output: RuleSetDefinition
}

/**
 * Compile one rule set definition. Throws on the first invalid rule.
 */
function compileRuleSet(
  definition: RuleSetDefinition,
  expected: Direction,
  seenIds: Set<string>
): RuleSet {
  const parsed = RuleSetDefinitionSchema.safeParse(definition)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new PatternLibraryError(
      `Invalid ${expected} rule set at '${issue.path.join('.')}': ${issue.message}`
    )
  }

  const set = parsed.data
  if (set.direction !== expected) {
    throw new PatternLibraryError(
      `Expected ${expected} rule set, got ${set.direction}`
    )
  }

  if (expected === 'output' && set.certaintyTerms.length === 0) {
    throw new PatternLibraryError('Output rule set must define certaintyTerms')
  }

  const tables: RuleTable[] = set.tables.map((table) => {
    const rules: Rule[] = table.rules.map((def) => {
      if (seenIds.has(def.id)) {
        throw new PatternLibraryError(`Duplicate rule id: ${def.id}`, def.id)
      }
      seenIds.add(def.id)

      let pattern: RegExp
      try {
        // No 'g' flag: test() must not carry lastIndex between calls
        pattern = new RegExp(def.pattern, 'i')
      } catch (error) {
        throw new PatternLibraryError(
          `Invalid pattern for rule '${def.id}': ${error instanceof Error ? error.message : String(error)}`,
          def.id,
          def.pattern
        )
      }

      return Object.freeze({
        id: def.id,
        table: table.name,
        severity: def.severity,
        pattern,
        explanation: def.explanation,
      })
    })

    return Object.freeze({ name: table.name, rules: Object.freeze(rules) })
  })

  return Object.freeze({
    direction: set.direction,
    tables: Object.freeze(tables),
    certaintyTerms: Object.freeze([...set.certaintyTerms]),
  })
}

/**
 * PatternLibrary - the compiled, read-only rule tables for both directions.
 *
 * Construction is the only fallible step. After that the library is frozen
 * and shared freely between classifiers.
 *
 * Usage:
 *   const library = await PatternLibrary.load()
 *   library.rules('input')
 */
export class PatternLibrary {
  readonly input: RuleSet
  readonly output: RuleSet

  constructor(definition: PatternLibraryDefinition) {
    const seenIds = new Set<string>()
    this.input = compileRuleSet(definition.input, 'input', seenIds)
    this.output = compileRuleSet(definition.output, 'output', seenIds)
    Object.freeze(this)
  }

  /**
   * Load input.json and output.json from a rules directory.
   */
  static async load(rulesDir: string = DEFAULT_RULES_DIR): Promise<PatternLibrary> {
    const [input, output] = await Promise.all([
      readRuleFile(path.join(rulesDir, 'input.json')),
      readRuleFile(path.join(rulesDir, 'output.json')),
    ])
    return new PatternLibrary({ input, output })
  }

  /**
   * Get the rule set for a direction.
   */
  ruleSet(direction: Direction): RuleSet {
    return direction === 'input' ? this.input : this.output
  }

  /**
   * All rules for a direction, in table order then rule order.
   */
  rules(direction: Direction): Rule[] {
    return this.ruleSet(direction).tables.flatMap((table) => [...table.rules])
  }

  /**
   * Find a rule by id in either direction.
   */
  findRule(id: string): Rule | undefined {
    return [...this.rules('input'), ...this.rules('output')].find(
      (rule) => rule.id === id
    )
  }
}

async function readRuleFile(filePath: string): Promise<RuleSetDefinition> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (error) {
    throw new PatternLibraryError(
      `Cannot read rule file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch {
    throw new PatternLibraryError(`Rule file is not valid JSON: ${filePath}`)
  }

  const parsed = RuleSetDefinitionSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new PatternLibraryError(
      `Invalid rule file ${filePath} at '${issue.path.join('.')}': ${issue.message}`
    )
  }
  return parsed.data
}
