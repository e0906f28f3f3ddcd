/**
 * xbench.ts - Read Xbench QA checklists (.xbckl) into the snippet library
 *
 * Checklist layouts vary between Xbench versions, so items are recognised by
 * element name anywhere in the document, and each field is looked up under
 * several aliases, as a descendant element or an attribute of the item.
 */

import { randomUUID } from "crypto"
import type { SnippetCategory, SnippetEntry, SnippetLibrary } from "../core/types"
import { readTextFile } from "../core/files"
import { findElements, isElement, parseXml } from "../xml/markup"
import { createLog } from "../log"
import { UNCATEGORIZED } from "./snippets"

const log = createLog("xbench")

export interface ChecklistItem {
  name: string
  search: string
  replace: string
  isRegex: boolean
  caseSensitive: boolean
  enabled: boolean
  category: string
  description: string
}

export interface Checklist {
  name: string
  items: ChecklistItem[]
}

export interface ChecklistStats {
  totalItems: number
  regexItems: number
  enabledItems: number
  withReplacement: number
}

const ITEM_ELEMENTS = new Set(["ChecklistItem", "PowerSearchItem", "Item", "QAItem"])

const FIELDS = {
  name: ["Name", "Description", "Text"],
  search: ["SearchText", "Search", "Pattern", "FindText", "SourceText"],
  replace: ["ReplaceText", "Replace", "Replacement", "TargetText"],
  isRegex: ["IsRegEx", "IsRegex", "RegEx", "UseRegex", "RegularExpression"],
  caseSensitive: ["CaseSensitive", "MatchCase", "CaseMatching"],
  enabled: ["Enabled", "Active", "IsEnabled"],
  category: ["Category", "Group", "Type"],
  description: ["Description", "Comment", "Notes", "Help"],
} as const

const TRUTHY = new Set(["true", "1", "yes", "on"])

function localName(element: Element): string {
  return element.localName || element.tagName
}

function itemElements(root: Element): Element[] {
  const items: Element[] = []
  for (let i = 0; i < root.childNodes.length; i++) {
    const child = root.childNodes.item(i)
    if (!child || !isElement(child)) continue
    if (ITEM_ELEMENTS.has(localName(child))) items.push(child)
    items.push(...itemElements(child))
  }
  return items
}

// First alias present as a descendant element (with text) or a non-empty attribute
function readText(item: Element, aliases: readonly string[]): string {
  for (const alias of aliases) {
    const text = findElements(item, alias)[0]?.textContent?.trim()
    if (text) return text
    const attr = item.getAttribute(alias)?.trim()
    if (attr) return attr
  }
  return ""
}

// An empty element still counts as present (and false)
function readFlag(item: Element, aliases: readonly string[], fallback: boolean): boolean {
  for (const alias of aliases) {
    const element = findElements(item, alias)[0]
    if (element) return TRUTHY.has((element.textContent ?? "").trim().toLowerCase())
    const attr = item.getAttribute(alias)?.trim()
    if (attr) return TRUTHY.has(attr.toLowerCase())
  }
  return fallback
}

function readItem(item: Element): ChecklistItem | null {
  const search = readText(item, FIELDS.search)
  if (!search) return null
  return {
    name: readText(item, FIELDS.name) || "Unnamed Item",
    search,
    replace: readText(item, FIELDS.replace),
    isRegex: readFlag(item, FIELDS.isRegex, false),
    caseSensitive: readFlag(item, FIELDS.caseSensitive, false),
    enabled: readFlag(item, FIELDS.enabled, true),
    category: readText(item, FIELDS.category) || UNCATEGORIZED,
    description: readText(item, FIELDS.description),
  }
}

/**
 * Parse checklist XML. Items without a search text are skipped.
 */
export function parseChecklist(content: string, path?: string): Checklist {
  const root = parseXml(content, path).documentElement
  const name = findElements(root, "ChecklistName")[0]?.textContent?.trim() ?? ""

  const items: ChecklistItem[] = []
  let skipped = 0
  for (const element of itemElements(root)) {
    const item = readItem(element)
    if (item) items.push(item)
    else skipped++
  }
  if (skipped > 0) log.warn(`skipped ${skipped} checklist item(s) without a search text`)

  return { name, items }
}

export function loadChecklist(path: string): Checklist {
  return parseChecklist(readTextFile(path, "Checklist"), path)
}

export function checklistStats(checklist: Checklist): ChecklistStats {
  const { items } = checklist
  return {
    totalItems: items.length,
    regexItems: items.filter((i) => i.isRegex).length,
    enabledItems: items.filter((i) => i.enabled).length,
    withReplacement: items.filter((i) => i.replace !== "").length,
  }
}

/**
 * Enabled regex items as snippets, one category per checklist category in
 * order of first appearance. Plain-text searches are left out.
 */
export function checklistToLibrary(checklist: Checklist): SnippetLibrary {
  const categories = new Map<string, SnippetCategory>()
  for (const item of checklist.items) {
    if (!item.enabled || !item.isRegex) continue
    const entry: SnippetEntry = {
      id: randomUUID(),
      name: item.name,
      description: item.description,
      pattern: item.search,
      replace: item.replace,
      category: item.category,
    }
    const category = categories.get(item.category)
    if (category) category.entries.push(entry)
    else categories.set(item.category, { name: item.category, entries: [entry] })
  }
  return { categories: [...categories.values()] }
}
