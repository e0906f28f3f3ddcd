/**
 * stats.ts - Aggregate match reports and replace tallies for display
 */

import type { BatchFindResult, BatchReplaceResult, Diagnostic } from "./types"

export interface RuleSummary {
  order: number
  name: string
  category: string
  matches: number
  records: number // distinct records with at least one match
}

export interface FindSummary {
  profileName: string
  source: string
  totalMatches: number
  recordsWithMatches: number
  rules: RuleSummary[] // ascending by order, only rules that matched
  categories: Record<string, number>
  invalidRules: number
}

export function summarizeFind(result: BatchFindResult): FindSummary {
  const rules = new Map<string, RuleSummary & { recordIds: Set<string> }>()
  const categories: Record<string, number> = {}
  const records = new Set<string>()

  for (const m of result.matches) {
    records.add(m.recordId)
    categories[m.category] = (categories[m.category] ?? 0) + 1

    // order alone is not unique, so key on order and name
    const key = `${m.ruleOrder}\u0000${m.ruleName}`
    let rule = rules.get(key)
    if (!rule) {
      rule = { order: m.ruleOrder, name: m.ruleName, category: m.category, matches: 0, records: 0, recordIds: new Set() }
      rules.set(key, rule)
    }
    rule.matches++
    rule.recordIds.add(m.recordId)
  }

  return {
    profileName: result.profileName,
    source: result.source,
    totalMatches: result.totalMatches,
    recordsWithMatches: records.size,
    rules: [...rules.values()]
      .sort((a, b) => a.order - b.order)
      .map(({ recordIds, ...rule }) => ({ ...rule, records: recordIds.size })),
    categories,
    invalidRules: result.diagnostics.length,
  }
}

// ============================================================================
// Text reports
// ============================================================================

function formatDiagnostics(diagnostics: readonly Diagnostic[]): string[] {
  if (diagnostics.length === 0) return []
  return ["", "Skipped rules:", ...diagnostics.map((d) => `  [${d.ruleOrder}] ${d.message}`)]
}

function plural(count: number, word: string, many = `${word}s`): string {
  return `${count} ${count === 1 ? word : many}`
}

export function formatFindReport(result: BatchFindResult): string {
  const lines = [`Profile: ${result.profileName}`]
  if (result.source) lines.push(`Source: ${result.source}`)
  lines.push(`Found ${plural(result.totalMatches, "match", "matches")}`)

  for (const m of result.matches) {
    lines.push("")
    lines.push(`[${m.recordId}] ${m.ruleName} (${m.category})`)
    lines.push(`  ${m.start}-${m.end}: ${JSON.stringify(m.match)} -> ${JSON.stringify(m.preview)}`)
    lines.push(`  target: ${m.target}`)
  }

  lines.push(...formatDiagnostics(result.diagnostics))
  return lines.join("\n")
}

export function formatStatsReport(summary: FindSummary): string {
  const lines = [
    `Profile: ${summary.profileName}`,
    `Total matches: ${summary.totalMatches}`,
    `Records with matches: ${summary.recordsWithMatches}`,
  ]

  if (summary.rules.length > 0) {
    lines.push("", "By rule:")
    for (const rule of summary.rules) {
      lines.push(`  [${rule.order}] ${rule.name}: ${rule.matches} in ${plural(rule.records, "record")}`)
    }
  }

  const categories = Object.entries(summary.categories)
  if (categories.length > 0) {
    lines.push("", "By category:")
    for (const [name, count] of categories) lines.push(`  ${name}: ${count}`)
  }

  if (summary.invalidRules > 0) lines.push("", `Invalid rules skipped: ${summary.invalidRules}`)
  return lines.join("\n")
}

export function formatReplaceReport(result: BatchReplaceResult): string {
  const lines = [
    `Replacements: ${result.totalReplacements}`,
    `Modified records: ${result.modifiedRecords}`,
    result.success ? `Saved: ${result.output}` : "No changes written",
  ]

  const applied = result.rules.filter((r) => r.replacements > 0)
  if (applied.length > 0) {
    lines.push("", "By rule:")
    for (const rule of applied) {
      lines.push(`  [${rule.order}] ${rule.name}: ${rule.replacements} in ${plural(rule.records, "record")}`)
    }
  }

  lines.push(...formatDiagnostics(result.diagnostics))
  return lines.join("\n")
}
