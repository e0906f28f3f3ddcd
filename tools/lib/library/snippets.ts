/**
 * snippets.ts - Reusable pattern/replacement snippets, grouped by category
 *
 * Provides:
 *   - defaultLibrary: the starter library used when none is stored yet
 *   - parseLibraryXml / serializeLibraryXml: <regex-library> document <-> SnippetLibrary
 *   - loadLibrary / saveLibrary / importLibrary / exportLibrary
 *   - addSnippet, removeSnippet, findSnippet, searchSnippets, mergeLibraries
 *   - snippetToRule: copy a snippet into a profile as a rule
 */

import { existsSync } from "fs"
import { randomUUID } from "crypto"
import type { PatternRule, SnippetCategory, SnippetEntry, SnippetLibrary } from "../core/types"
import { ParseError } from "../core/errors"
import { readTextFile, writeTextFile } from "../core/files"
import { XML_DECLARATION, escapeAttribute, escapeXml, parseXml, walkXml } from "../xml/markup"
import { createLog } from "../log"

const log = createLog("library")

export const UNCATEGORIZED = "Uncategorized"

const DEFAULT_CATEGORIES = ["Tegnsetting", "Harde mellomrom", "Tall/tallformatering", "Spesialtegn"] as const

export function defaultLibrary(): SnippetLibrary {
  return { categories: DEFAULT_CATEGORIES.map((name) => ({ name, entries: [] })) }
}

// ============================================================================
// Document reading
// ============================================================================

enum LibraryElement {
  Root = "regex-library",
  Category = "category",
  Entry = "entry",
  Name = "name",
  Description = "description",
  Pattern = "pattern",
  Replace = "replace",
}

type EntryField = LibraryElement.Name | LibraryElement.Description | LibraryElement.Pattern | LibraryElement.Replace

const LIBRARY_ELEMENTS = new Map<string, LibraryElement>(Object.values(LibraryElement).map((kind) => [kind, kind]))

function isEntryField(kind: LibraryElement): kind is EntryField {
  return (
    kind === LibraryElement.Name ||
    kind === LibraryElement.Description ||
    kind === LibraryElement.Pattern ||
    kind === LibraryElement.Replace
  )
}

interface DraftEntry {
  id: string | undefined
  fields: Map<EntryField, string>
}

interface LibraryReaderState {
  category: SnippetCategory | null
  entry: DraftEntry | null
  field: { kind: EntryField; text: string } | null
  categories: SnippetCategory[]
  orphans: SnippetEntry[] // entries outside any category
}

function toEntry(draft: DraftEntry, category: string): SnippetEntry {
  return {
    id: draft.id || randomUUID(),
    name: draft.fields.get(LibraryElement.Name) ?? "",
    description: draft.fields.get(LibraryElement.Description) ?? "",
    pattern: draft.fields.get(LibraryElement.Pattern) ?? "",
    replace: draft.fields.get(LibraryElement.Replace) ?? "",
    category,
  }
}

/**
 * Parse a library document. Duplicate category names stay separate.
 */
export function parseLibraryXml(content: string, path?: string): SnippetLibrary {
  const root = parseXml(content, path).documentElement
  const rootName = root.localName || root.tagName
  if (rootName !== LibraryElement.Root) {
    throw new ParseError(`Expected <${LibraryElement.Root}> root element, found <${rootName}>`, undefined, undefined, path)
  }

  const state: LibraryReaderState = { category: null, entry: null, field: null, categories: [], orphans: [] }

  for (const event of walkXml(root)) {
    if (event.type === "text") {
      if (state.field) state.field.text += event.text
      continue
    }

    const kind = LIBRARY_ELEMENTS.get(event.name)
    if (kind === undefined) continue

    if (event.type === "open") {
      if (kind === LibraryElement.Category) {
        state.category = { name: event.attributes.get("name") ?? UNCATEGORIZED, entries: [] }
      } else if (kind === LibraryElement.Entry) {
        state.entry = { id: event.attributes.get("id"), fields: new Map() }
      } else if (isEntryField(kind) && state.entry && !state.field) {
        state.field = { kind, text: "" }
      }
      continue
    }

    if (kind === LibraryElement.Entry && state.entry) {
      if (state.category) {
        state.category.entries.push(toEntry(state.entry, state.category.name))
      } else {
        state.orphans.push(toEntry(state.entry, UNCATEGORIZED))
      }
      state.entry = null
    } else if (kind === LibraryElement.Category && state.category) {
      state.categories.push(state.category)
      state.category = null
    } else if (isEntryField(kind) && state.field?.kind === kind && state.entry) {
      state.entry.fields.set(kind, state.field.text)
      state.field = null
    }
  }

  if (state.orphans.length > 0) {
    state.categories.push({ name: UNCATEGORIZED, entries: state.orphans })
  }
  return { categories: state.categories }
}

// ============================================================================
// Document writing
// ============================================================================

export function serializeLibraryXml(library: SnippetLibrary): string {
  let xml = `${XML_DECLARATION}\n<regex-library>\n`
  for (const category of library.categories) {
    xml += `  <category name="${escapeAttribute(category.name)}">\n`
    for (const entry of category.entries) {
      xml += `    <entry id="${escapeAttribute(entry.id)}">\n`
      xml += `      <name>${escapeXml(entry.name)}</name>\n`
      xml += `      <description>${escapeXml(entry.description)}</description>\n`
      xml += `      <pattern>${escapeXml(entry.pattern)}</pattern>\n`
      xml += `      <replace>${escapeXml(entry.replace)}</replace>\n`
      xml += "    </entry>\n"
    }
    xml += "  </category>\n"
  }
  xml += "</regex-library>\n"
  return xml
}

/**
 * Load the library stored at path, or the default library when there is none.
 */
export function loadLibrary(path: string): SnippetLibrary {
  if (!existsSync(path)) {
    log.info(`no library at ${path}, using defaults`)
    return defaultLibrary()
  }
  return parseLibraryXml(readTextFile(path, "Library"), path)
}

export function saveLibrary(library: SnippetLibrary, path: string): void {
  writeTextFile(path, serializeLibraryXml(library))
}

/**
 * Read a library document from an arbitrary location. Unlike loadLibrary, a
 * missing file is an error.
 */
export function importLibrary(path: string): SnippetLibrary {
  return parseLibraryXml(readTextFile(path, "Library"), path)
}

export function exportLibrary(library: SnippetLibrary, path: string): void {
  saveLibrary(library, path)
}

// ============================================================================
// Editing
// ============================================================================

export interface NewSnippet {
  name: string
  description?: string
  pattern: string
  replace?: string
  category: string
}

/**
 * Add a snippet to the first category with a matching name, creating the
 * category at the end when none exists.
 */
export function addSnippet(library: SnippetLibrary, snippet: NewSnippet): { library: SnippetLibrary; entry: SnippetEntry } {
  const entry: SnippetEntry = {
    id: randomUUID(),
    name: snippet.name,
    description: snippet.description ?? "",
    pattern: snippet.pattern,
    replace: snippet.replace ?? "",
    category: snippet.category,
  }

  const index = library.categories.findIndex((c) => c.name === snippet.category)
  const categories =
    index === -1
      ? [...library.categories, { name: snippet.category, entries: [entry] }]
      : library.categories.map((c, i) => (i === index ? { ...c, entries: [...c.entries, entry] } : c))

  return { library: { categories }, entry }
}

/**
 * Remove the snippet with the given id. Returns null when no snippet has it.
 */
export function removeSnippet(library: SnippetLibrary, id: string): SnippetLibrary | null {
  if (!findSnippet(library, id)) return null
  return {
    categories: library.categories.map((c) => ({ ...c, entries: c.entries.filter((e) => e.id !== id) })),
  }
}

export function findSnippet(library: SnippetLibrary, id: string): SnippetEntry | null {
  for (const category of library.categories) {
    const entry = category.entries.find((e) => e.id === id)
    if (entry) return entry
  }
  return null
}

export function allSnippets(library: SnippetLibrary): SnippetEntry[] {
  return library.categories.flatMap((c) => c.entries)
}

/**
 * Case-insensitive substring search over name, description and pattern.
 */
export function searchSnippets(library: SnippetLibrary, query: string): SnippetEntry[] {
  const needle = query.toLowerCase()
  return allSnippets(library).filter(
    (e) =>
      e.name.toLowerCase().includes(needle) ||
      e.description.toLowerCase().includes(needle) ||
      e.pattern.toLowerCase().includes(needle)
  )
}

export function snippetToRule(entry: SnippetEntry, order: number): PatternRule {
  return {
    order,
    enabled: true,
    name: entry.name,
    description: entry.description,
    category: entry.category,
    pattern: entry.pattern,
    replacement: entry.replace,
    caseSensitive: false,
    excludePattern: "",
  }
}

/**
 * Append the imported categories after the existing ones.
 */
export function mergeLibraries(base: SnippetLibrary, imported: SnippetLibrary): SnippetLibrary {
  return { categories: [...base.categories, ...imported.categories] }
}
