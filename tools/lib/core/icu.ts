/**
 * icu.ts - ICU MessageFormat consistency checks between source and target
 *
 * A heuristic comparison, not a parser: argument types and plural categories
 * must stay untranslated, and braces, argument names, `offset:` and `#` must
 * carry over from the source.
 */

const ARGUMENT_TYPES = ["plural", "select", "selectordinal"] as const
const CATEGORIES = ["zero", "one", "two", "few", "many", "other"] as const

const ICU_ARGUMENT = /\{[^}]+,\s*(?:plural|select|selectordinal)/i
// {name, word, ... word { : ICU-shaped even when the type was translated
const ICU_LIKE = /\{[^}]+,\s*\w+,.*?\w+\s*\{/i
const ARGUMENT_NAME = /\{(\w+)\s*,/g

function count(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0
}

function occurrences(text: string, char: string): number {
  return text.split(char).length - 1
}

function argumentNames(text: string): string[] {
  return [...text.matchAll(ARGUMENT_NAME)].map((m) => m[1] ?? "")
}

/**
 * Whether the text looks like an ICU message with a plural or select argument.
 */
export function hasIcuSyntax(text: string): boolean {
  return ICU_ARGUMENT.test(text) || ICU_LIKE.test(text)
}

/**
 * Problems with the target's ICU structure relative to the source, in a fixed
 * order. An empty target has none.
 */
export function validateIcu(source: string, target: string): string[] {
  if (!target) return []
  const errors: string[] = []

  for (const type of ARGUMENT_TYPES) {
    const pattern = new RegExp(`\\{[^}]+,\\s*${type}\\b`, "gi")
    const inSource = count(source, pattern)
    const inTarget = count(target, pattern)
    if (inSource > 0 && inTarget === 0) {
      errors.push(`ICU keyword "${type}" is missing or translated in target (must remain "${type}")`)
    } else if (inSource !== inTarget) {
      errors.push(`ICU keyword "${type}" count mismatch (source: ${inSource}, target: ${inTarget})`)
    }
  }

  for (const category of CATEGORIES) {
    const pattern = new RegExp(`\\b${category}\\s*\\{`, "g")
    const inSource = count(source, pattern)
    const inTarget = count(target, pattern)
    if (inSource > 0 && inTarget === 0) {
      errors.push(`Category "${category}" is missing or translated in target (must remain "${category}")`)
    } else if (inSource !== inTarget) {
      errors.push(`Category "${category}" count mismatch (source: ${inSource}, target: ${inTarget})`)
    }
  }

  const open = occurrences(target, "{")
  const close = occurrences(target, "}")
  if (open > close) {
    errors.push(`Missing ${open - close} closing brace(s) } in target`)
  } else if (close > open) {
    errors.push(`Missing ${close - open} opening brace(s) { in target`)
  } else if (open !== occurrences(source, "{") || close !== occurrences(source, "}")) {
    errors.push(`Brace count differs from source (source: ${occurrences(source, "{")} pairs, target: ${open} pairs)`)
  }

  const sourceNames = argumentNames(source)
  const targetNames = argumentNames(target)
  if (sourceNames.length > 0 && targetNames.length > 0) {
    const kept = new Set(targetNames)
    const changed = [...new Set(sourceNames)].filter((name) => !kept.has(name)).sort()
    if (changed.length > 0) errors.push(`Argument name(s) changed: ${changed.join(", ")} (must not be translated)`)
  }
  if (sourceNames.length !== targetNames.length) {
    errors.push("Argument/comma mismatch (check the comma after each argument name)")
  }

  if (source.includes("offset:") && !target.includes("offset:")) {
    errors.push('"offset:" is missing in target')
  }

  const sourceHashes = occurrences(source, "#")
  const targetHashes = occurrences(target, "#")
  if (sourceHashes > 0 && sourceHashes !== targetHashes) {
    errors.push(`Hash (#) count mismatch (source: ${sourceHashes}, target: ${targetHashes})`)
  }

  return errors
}
