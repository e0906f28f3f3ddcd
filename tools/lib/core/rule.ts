/**
 * rule.ts - Compile and evaluate a single pattern rule
 *
 * Exclusion contract: the exclusion pattern is scanned once over the full text
 * handed to the rule, and a match is dropped when its span intersects any
 * exclusion span. An empty match is dropped when it sits inside one.
 *
 * Patterns compile in Unicode mode (\p{L}, astral characters as one). A pattern
 * that only compiles without it (identity escapes such as \- or \') falls back
 * to legacy mode with a warning.
 */

import type { PatternRule } from "./types"
import { InvalidPatternError } from "./errors"
import { createLog } from "../log"

const log = createLog("rule")

export interface CompiledRule {
  readonly rule: PatternRule
  readonly regex: RegExp | null // null = empty pattern, rule is a no-op
  readonly exclude: RegExp | null
}

export interface RuleMatch {
  start: number
  end: number
  text: string
  groups: readonly (string | undefined)[] // index 0 is the whole match
  named: Readonly<Record<string, string | undefined>>
}

interface Span {
  start: number
  end: number
}

function flagsFor(rule: PatternRule): string {
  return rule.caseSensitive ? "g" : "gi"
}

function compilePattern(rule: PatternRule, source: string): RegExp {
  const flags = flagsFor(rule)
  try {
    return new RegExp(source, `${flags}u`)
  } catch (unicodeError) {
    let legacy: RegExp
    try {
      legacy = new RegExp(source, flags)
    } catch {
      const reason = unicodeError instanceof Error ? unicodeError.message : String(unicodeError)
      throw new InvalidPatternError(rule.name, source, reason)
    }
    log.warn(`rule "${rule.name}": ${source} compiled without Unicode mode`)
    return legacy
  }
}

/**
 * Compile a rule's pattern and exclusion pattern.
 * Throws InvalidPatternError when either fails to compile.
 */
export function compileRule(rule: PatternRule): CompiledRule {
  const regex = rule.pattern === "" ? null : compilePattern(rule, rule.pattern)
  const exclude = rule.excludePattern === "" ? null : compilePattern(rule, rule.excludePattern)
  return Object.freeze({ rule, regex, exclude })
}

// matchAll clones the regex, so a compiled rule is never mutated by a scan
function spans(regex: RegExp, text: string): Span[] {
  return Array.from(text.matchAll(regex), (m) => {
    const start = m.index ?? 0
    return { start, end: start + m[0].length }
  })
}

function intersects(match: Span, excluded: Span): boolean {
  if (match.start === match.end) {
    return excluded.start <= match.start && match.start < excluded.end
  }
  return match.start < excluded.end && excluded.start < match.end
}

/**
 * Leftmost-first, non-overlapping matches of a rule against text,
 * with exclusion applied.
 */
export function evaluateRule(compiled: CompiledRule, text: string): RuleMatch[] {
  if (!compiled.regex) return []

  const excluded = compiled.exclude ? spans(compiled.exclude, text) : []

  const matches: RuleMatch[] = []
  for (const m of text.matchAll(compiled.regex)) {
    const span = { start: m.index ?? 0, end: (m.index ?? 0) + m[0].length }
    if (excluded.some((e) => intersects(span, e))) continue
    matches.push({
      ...span,
      text: m[0],
      groups: Array.from(m),
      named: { ...(m.groups ?? {}) },
    })
  }
  return matches
}

// ============================================================================
// Replacement templates
// ============================================================================

function groupAt(match: RuleMatch, index: number): string {
  return match.groups[index] ?? ""
}

/**
 * Resolve "$12"-style numeric references the way String.prototype.replace
 * does: prefer two digits when that group exists, fall back to one.
 */
function numericReference(digits: string, match: RuleMatch): { value: string; consumed: number } | null {
  const groupCount = match.groups.length - 1
  if (digits.length >= 2) {
    const two = Number(digits.slice(0, 2))
    if (two >= 1 && two <= groupCount) return { value: groupAt(match, two), consumed: 2 }
  }
  const one = Number(digits.slice(0, 1))
  if (one >= 1 && one <= groupCount) return { value: groupAt(match, one), consumed: 1 }
  return null
}

// null = leave the reference as written (the pattern has no named groups)
function namedOrIndexed(ref: string, match: RuleMatch): string | null {
  if (/^\d+$/.test(ref)) return groupAt(match, Number(ref))
  if (Object.keys(match.named).length === 0) return null
  return match.named[ref] ?? ""
}

/**
 * Expand a replacement template against one match.
 *
 * Dollar forms: $1..$99, $<name>, ${name}, $&, $$
 * Backslash forms: \1..\99, \g<1>, \g<name>, \\, \n, \t
 *
 * As with String.prototype.replace, a name the pattern does not define expands
 * to "" and named references stay literal when the pattern defines no names.
 */
export function expandReplacement(template: string, match: RuleMatch): string {
  let out = ""
  let i = 0

  while (i < template.length) {
    const ch = template[i]
    const rest = template.slice(i + 1)

    if (ch === "$") {
      if (rest.startsWith("$")) {
        out += "$"
        i += 2
        continue
      }
      if (rest.startsWith("&")) {
        out += match.text
        i += 2
        continue
      }
      const braced = /^(?:<([^>]+)>|\{([^}]+)\})/.exec(rest)
      const value = braced ? namedOrIndexed(braced[1] ?? braced[2] ?? "", match) : null
      if (braced && value !== null) {
        out += value
        i += 1 + braced[0].length
        continue
      }
      const digits = /^\d{1,2}/.exec(rest)
      const numeric = digits ? numericReference(digits[0], match) : null
      if (numeric) {
        out += numeric.value
        i += 1 + numeric.consumed
        continue
      }
    } else if (ch === "\\") {
      const named = /^g<([^>]+)>/.exec(rest)
      const value = named ? namedOrIndexed(named[1] ?? "", match) : null
      if (named && value !== null) {
        out += value
        i += 1 + named[0].length
        continue
      }
      const digits = /^\d{1,2}/.exec(rest)
      const numeric = digits ? numericReference(digits[0], match) : null
      if (numeric) {
        out += numeric.value
        i += 1 + numeric.consumed
        continue
      }
      const next = rest[0]
      if (next === "\\") {
        out += "\\"
        i += 2
        continue
      }
      if (next === "n") {
        out += "\n"
        i += 2
        continue
      }
      if (next === "t") {
        out += "\t"
        i += 2
        continue
      }
    }

    out += ch
    i += 1
  }

  return out
}

/**
 * Replace every match's span with its expanded template.
 * Matches must be sorted and non-overlapping (as evaluateRule returns them).
 */
export function substitute(text: string, matches: readonly RuleMatch[], template: string): string {
  let out = ""
  let last = 0
  for (const m of matches) {
    out += text.slice(last, m.start) + expandReplacement(template, m)
    last = m.end
  }
  return out + text.slice(last)
}
