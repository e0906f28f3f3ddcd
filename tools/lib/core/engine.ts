/**
 * engine.ts - Apply a profile to text records
 *
 *   find    - report every accepted match, never mutates
 *   replace - rewrite targets; rules compose in order within each record
 *
 * Both are pure and synchronous. Rules are compiled once per call; a rule that
 * fails to compile is skipped and reported as a diagnostic.
 *
 * With `markup` set, targets are inline XML: rules run over each text run
 * between tags (entities decoded), offsets still point into the raw target, and
 * replacement text is escaped back in. No match crosses a tag.
 */

import type {
  BatchFindResult,
  Diagnostic,
  MatchReport,
  PatternRule,
  Profile,
  RecordChange,
  RuleTally,
  TextRecord,
} from "./types"
import { compileRule, evaluateRule, expandReplacement, substitute, type CompiledRule, type RuleMatch } from "./rule"
import { InvalidPatternError } from "./errors"
import { rewriteText, textSegments } from "../xml/segments"
import { enabledRules } from "../profile/profile"
import { createLog } from "../log"

const log = createLog("engine")

export interface CompiledProfile {
  rules: readonly CompiledRule[] // enabled, valid, ascending by order
  diagnostics: Diagnostic[]
}

/**
 * Compile the enabled rules of a profile. Invalid rules become diagnostics.
 */
export function compileProfile(profile: Profile): CompiledProfile {
  const rules: CompiledRule[] = []
  const diagnostics: Diagnostic[] = []

  for (const rule of enabledRules(profile)) {
    try {
      rules.push(compileRule(rule))
    } catch (error) {
      if (!(error instanceof InvalidPatternError)) throw error
      log.warn(`skipping rule [${rule.order}] ${rule.name}: ${error.message}`)
      diagnostics.push(invalidPattern(rule, error))
    }
  }

  return { rules: Object.freeze(rules), diagnostics }
}

function invalidPattern(rule: PatternRule, error: InvalidPatternError): Diagnostic {
  return {
    kind: "InvalidPattern",
    ruleName: rule.name,
    ruleOrder: rule.order,
    pattern: error.pattern,
    message: error.message,
  }
}

// Matches with offsets into the raw target
function locate(compiled: CompiledRule, target: string, markup: boolean): RuleMatch[] {
  if (!markup) return evaluateRule(compiled, target)
  return textSegments(target).flatMap((segment) =>
    evaluateRule(compiled, segment.text).map((m) => ({
      ...m,
      start: segment.offsets[m.start] ?? segment.end,
      end: segment.offsets[m.end] ?? segment.end,
    }))
  )
}

function rewrite(compiled: CompiledRule, target: string, markup: boolean): { text: string; count: number } {
  const template = compiled.rule.replacement
  if (!markup) {
    const matches = evaluateRule(compiled, target)
    return { text: matches.length === 0 ? target : substitute(target, matches, template), count: matches.length }
  }

  let count = 0
  const text = rewriteText(target, (run) => {
    const matches = evaluateRule(compiled, run)
    count += matches.length
    return matches.length === 0 ? null : substitute(run, matches, template)
  })
  return { text, count }
}

// ============================================================================
// Find
// ============================================================================

export interface EngineOptions {
  markup?: boolean // targets are inline XML markup
}

export interface FindOptions extends EngineOptions {
  source?: string // identifier of the document the records came from
}

/**
 * Report every accepted match: record order first, then rule order.
 */
export function find(profile: Profile, records: readonly TextRecord[], options: FindOptions = {}): BatchFindResult {
  const compiled = compileProfile(profile)
  const matches: MatchReport[] = []

  for (const record of records) {
    for (const compiledRule of compiled.rules) {
      const { rule } = compiledRule
      for (const m of locate(compiledRule, record.target, options.markup ?? false)) {
        matches.push({
          recordId: record.id,
          ruleName: rule.name,
          ruleOrder: rule.order,
          category: rule.category,
          description: rule.description,
          source: record.source,
          target: record.target,
          match: record.target.slice(m.start, m.end),
          start: m.start,
          end: m.end,
          pattern: rule.pattern,
          replacement: rule.replacement,
          preview: expandReplacement(rule.replacement, m),
        })
      }
    }
  }

  return {
    profileName: profile.name,
    source: options.source ?? "",
    totalMatches: matches.length,
    matches,
    diagnostics: compiled.diagnostics,
  }
}

// ============================================================================
// Replace
// ============================================================================

export interface ReplaceOutcome {
  records: TextRecord[] // new objects; the input records are left untouched
  modifiedRecords: number
  totalReplacements: number
  changes: RecordChange[] // one per modified record, in record order
  rules: RuleTally[] // one per applied rule, ascending by order
  diagnostics: Diagnostic[]
}

/**
 * Rewrite record targets. Within a record each rule sees the previous rule's
 * output; exclusion is evaluated against that same input text.
 */
export function replace(profile: Profile, records: readonly TextRecord[], options: EngineOptions = {}): ReplaceOutcome {
  const compiled = compileProfile(profile)
  const tallies: RuleTally[] = compiled.rules.map(({ rule }) => ({
    order: rule.order,
    name: rule.name,
    replacements: 0,
    records: 0,
  }))

  const output: TextRecord[] = []
  const changes: RecordChange[] = []
  let totalReplacements = 0

  for (const record of records) {
    let text = record.target
    let recordReplacements = 0

    compiled.rules.forEach((rule, index) => {
      const result = rewrite(rule, text, options.markup ?? false)
      if (result.count === 0) return
      text = result.text
      recordReplacements += result.count
      const tally = tallies[index]
      if (tally) {
        tally.replacements += result.count
        tally.records += 1
      }
    })

    totalReplacements += recordReplacements
    if (text !== record.target) {
      changes.push({ recordId: record.id, before: record.target, after: text, replacements: recordReplacements })
    }
    output.push({ ...record, target: text })
  }

  return {
    records: output,
    modifiedRecords: changes.length,
    totalReplacements,
    changes,
    rules: tallies,
    diagnostics: compiled.diagnostics,
  }
}
