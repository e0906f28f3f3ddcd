/**
 * document-stats.ts - Translation progress and ICU problems across a document
 */

import type { TextRecord } from "./types"
import { hasIcuSyntax, validateIcu } from "./icu"
import { textSegments } from "../xml/segments"

export interface IcuProblem {
  recordId: string
  source: string
  target: string
  errors: string[]
}

export interface DocumentStats {
  source: string
  totalRecords: number
  translated: number // target has non-whitespace content
  untranslated: number
  completion: number | null // percent, one decimal; null for an empty document
  structural: number // markup records whose source is only tags, left out of the counts
  icuProblems: IcuProblem[]
}

export interface DocumentStatsOptions {
  source?: string
  markup?: boolean
}

function plainText(text: string, markup: boolean): string {
  return markup ? textSegments(text).map((s) => s.text).join("") : text
}

function isStructural(record: TextRecord): boolean {
  return record.source.trim() !== "" && plainText(record.source, true).trim() === ""
}

/**
 * Count translated records and check ICU messages. In markup documents,
 * records whose source carries no text are skipped, unless every record is
 * like that.
 */
export function documentStats(records: readonly TextRecord[], options: DocumentStatsOptions = {}): DocumentStats {
  const markup = options.markup ?? false
  const content = markup ? records.filter((r) => !isStructural(r)) : records
  const counted = content.length > 0 ? content : records

  const translated = counted.filter((r) => r.target.trim() !== "").length
  const icuProblems: IcuProblem[] = []
  for (const record of counted) {
    const source = plainText(record.source, markup)
    const target = plainText(record.target, markup)
    if (!hasIcuSyntax(source) && !hasIcuSyntax(target)) continue
    const errors = validateIcu(source, target)
    if (errors.length > 0) icuProblems.push({ recordId: record.id, source, target, errors })
  }

  return {
    source: options.source ?? "",
    totalRecords: counted.length,
    translated,
    untranslated: counted.length - translated,
    completion: counted.length > 0 ? Math.round((translated / counted.length) * 1000) / 10 : null,
    structural: records.length - counted.length,
    icuProblems,
  }
}

export function formatDocumentStats(stats: DocumentStats): string {
  const lines: string[] = []
  if (stats.source) lines.push(`Document: ${stats.source}`)
  lines.push(`Records: ${stats.totalRecords}`)
  if (stats.structural > 0) lines.push(`Structural (skipped): ${stats.structural}`)
  lines.push(`Translated: ${stats.translated}`)
  lines.push(`Untranslated: ${stats.untranslated}`)
  if (stats.completion !== null) lines.push(`Completion: ${stats.completion.toFixed(1)}%`)

  if (stats.icuProblems.length > 0) {
    lines.push("", `ICU problems: ${stats.icuProblems.length} record(s)`)
    for (const problem of stats.icuProblems) {
      lines.push(`  [${problem.recordId}]`)
      for (const error of problem.errors) lines.push(`    ${error}`)
    }
  }
  return lines.join("\n")
}
