/**
 * profile.ts - QA profiles: ordered pattern rules plus metadata, stored as XML
 *
 * Provides:
 *   - parseProfileXml / serializeProfileXml: document <-> Profile
 *   - loadProfile / saveProfile: the same, against the filesystem
 *   - enabledRules, nextOrder, addRule, removeRule, touchProfile: authoring helpers
 *   - importProfile / exportProfile / deleteProfile: profile files as a unit
 *
 * Saving never rewrites timestamps, so load -> save is byte-stable.
 */

import { copyFileSync, existsSync, unlinkSync } from "fs"
import { join } from "path"
import type { PatternRule, Profile } from "../core/types"
import { IoError, MissingResourceError, ParseError } from "../core/errors"
import { isNotFound, readTextFile, writeTextFile } from "../core/files"
import { XML_DECLARATION, escapeAttribute, escapeXml, parseXml, walkXml } from "../xml/markup"
import { createLog } from "../log"

const log = createLog("profile")

export const PROFILE_SUFFIX = "_qa_profile.xml"
export const DEFAULT_CATEGORY = "Custom"
export const UNTITLED_PROFILE = "Untitled Profile"

const SECONDS_PER_DAY = 86400

// ============================================================================
// Document reading
// ============================================================================

/** Every element the profile reader reacts to */
enum ElementKind {
  Root = "qa_profile",
  Metadata = "metadata",
  Checks = "checks",
  Check = "check",
  Name = "name",
  Description = "description",
  Language = "language",
  Created = "created",
  Modified = "modified",
  Pattern = "pattern",
  Replacement = "replacement",
  Category = "category",
  CaseSensitive = "case_sensitive",
  ExcludePattern = "exclude_pattern",
}

const ELEMENT_KINDS = new Map<string, ElementKind>(Object.values(ElementKind).map((kind) => [kind, kind]))

type CheckField =
  | ElementKind.Name
  | ElementKind.Description
  | ElementKind.Pattern
  | ElementKind.Replacement
  | ElementKind.Category
  | ElementKind.CaseSensitive
  | ElementKind.ExcludePattern

const METADATA_FIELDS: ReadonlySet<ElementKind> = new Set([
  ElementKind.Name,
  ElementKind.Description,
  ElementKind.Language,
  ElementKind.Created,
  ElementKind.Modified,
])

const CHECK_FIELDS: ReadonlySet<ElementKind> = new Set([
  ElementKind.Name,
  ElementKind.Description,
  ElementKind.Pattern,
  ElementKind.Replacement,
  ElementKind.Category,
  ElementKind.CaseSensitive,
  ElementKind.ExcludePattern,
])

interface DraftCheck {
  order: string | undefined
  enabled: string | undefined
  fields: Map<ElementKind, string>
}

interface ReaderState {
  inMetadata: boolean
  metadata: Map<ElementKind, string>
  check: DraftCheck | null
  checks: DraftCheck[]
  // Field currently receiving text events, and what it has collected so far
  field: { kind: ElementKind; text: string } | null
}

function openField(state: ReaderState, kind: ElementKind): void {
  if (state.field) return // nested markup inside a field contributes its text
  if (state.check ? CHECK_FIELDS.has(kind) : state.inMetadata && METADATA_FIELDS.has(kind)) {
    state.field = { kind, text: "" }
  }
}

function closeField(state: ReaderState, kind: ElementKind): void {
  if (!state.field || state.field.kind !== kind) return
  const target = state.check ? state.check.fields : state.metadata
  target.set(kind, state.field.text)
  state.field = null
}

function parseOrder(raw: string | undefined): number {
  const order = Number.parseInt(raw?.trim() ?? "", 10)
  return Number.isNaN(order) ? 0 : order
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback
  return raw.trim().toLowerCase() === "true"
}

export function dayAligned(epochSeconds: number): number {
  return Math.floor(epochSeconds / SECONDS_PER_DAY) * SECONDS_PER_DAY
}

/**
 * Timestamps are day-aligned epoch seconds; older documents carry ISO dates.
 */
function parseTimestamp(raw: string | undefined): number | null {
  const text = raw?.trim() ?? ""
  if (text === "") return null
  if (/^-?\d+$/.test(text)) return Number(text)
  const ms = Date.parse(text)
  if (Number.isNaN(ms)) {
    log.warn(`ignoring unreadable timestamp "${text}"`)
    return null
  }
  return dayAligned(Math.floor(ms / 1000))
}

function toRule(draft: DraftCheck): PatternRule {
  const field = (kind: CheckField): string | undefined => draft.fields.get(kind)
  return {
    order: parseOrder(draft.order),
    enabled: parseFlag(draft.enabled, true),
    name: field(ElementKind.Name) ?? "",
    description: field(ElementKind.Description) ?? "",
    pattern: field(ElementKind.Pattern) ?? "",
    replacement: field(ElementKind.Replacement) ?? "",
    category: field(ElementKind.Category) ?? DEFAULT_CATEGORY,
    caseSensitive: parseFlag(field(ElementKind.CaseSensitive), false),
    excludePattern: field(ElementKind.ExcludePattern) ?? "",
  }
}

/**
 * Stable ascending sort by order; ties keep declaration order.
 */
export function sortRules(rules: readonly PatternRule[]): PatternRule[] {
  return [...rules].sort((a, b) => a.order - b.order)
}

function warnDuplicateOrders(rules: readonly PatternRule[]): void {
  const seen = new Set<number>()
  for (const rule of rules) {
    if (seen.has(rule.order)) log.warn(`duplicate rule order ${rule.order} ("${rule.name}")`)
    seen.add(rule.order)
  }
}

/**
 * Parse a profile document. Rules come back sorted by order.
 */
export function parseProfileXml(content: string, path?: string): Profile {
  const root = parseXml(content, path).documentElement
  const rootName = root.localName || root.tagName
  if (rootName !== ElementKind.Root) {
    throw new ParseError(`Expected <${ElementKind.Root}> root element, found <${rootName}>`, undefined, undefined, path)
  }

  const state: ReaderState = { inMetadata: false, metadata: new Map(), check: null, checks: [], field: null }

  for (const event of walkXml(root)) {
    if (event.type === "text") {
      if (state.field) state.field.text += event.text
      continue
    }

    const kind = ELEMENT_KINDS.get(event.name)
    if (kind === undefined) continue

    if (event.type === "open") {
      switch (kind) {
        case ElementKind.Metadata:
          state.inMetadata = true
          break
        case ElementKind.Check:
          state.check = {
            order: event.attributes.get("order"),
            enabled: event.attributes.get("enabled"),
            fields: new Map(),
          }
          break
        default:
          openField(state, kind)
      }
    } else {
      switch (kind) {
        case ElementKind.Metadata:
          state.inMetadata = false
          break
        case ElementKind.Check:
          if (state.check) state.checks.push(state.check)
          state.check = null
          break
        default:
          closeField(state, kind)
      }
    }
  }

  const rules = state.checks.map(toRule)
  warnDuplicateOrders(rules)

  return {
    name: state.metadata.get(ElementKind.Name) ?? UNTITLED_PROFILE,
    description: state.metadata.get(ElementKind.Description) ?? "",
    language: state.metadata.get(ElementKind.Language) ?? "",
    created: parseTimestamp(state.metadata.get(ElementKind.Created)),
    modified: parseTimestamp(state.metadata.get(ElementKind.Modified)),
    rules: sortRules(rules),
  }
}

// ============================================================================
// Document writing
// ============================================================================

function element(indent: string, name: string, value: string): string {
  return `${indent}<${name}>${escapeXml(value)}</${name}>\n`
}

function timestamp(value: number | null): string {
  return value === null ? "" : String(value)
}

/**
 * Serialize a profile. Every field is written, empty or not.
 */
export function serializeProfileXml(profile: Profile): string {
  let xml = `${XML_DECLARATION}\n<qa_profile>\n`

  xml += "    <metadata>\n"
  xml += element("        ", "name", profile.name)
  xml += element("        ", "description", profile.description)
  xml += element("        ", "language", profile.language)
  xml += element("        ", "created", timestamp(profile.created))
  xml += element("        ", "modified", timestamp(profile.modified))
  xml += "    </metadata>\n\n"

  xml += "    <checks>\n"
  for (const rule of profile.rules) {
    xml += `        <check order="${escapeAttribute(String(rule.order))}" enabled="${rule.enabled}">\n`
    xml += element("            ", "name", rule.name)
    xml += element("            ", "description", rule.description)
    xml += element("            ", "pattern", rule.pattern)
    xml += element("            ", "replacement", rule.replacement)
    xml += element("            ", "category", rule.category)
    xml += element("            ", "case_sensitive", String(rule.caseSensitive))
    xml += element("            ", "exclude_pattern", rule.excludePattern)
    xml += "        </check>\n"
  }
  xml += "    </checks>\n"
  xml += "</qa_profile>\n"

  return xml
}

export function loadProfile(path: string): Profile {
  return parseProfileXml(readTextFile(path, "Profile"), path)
}

export function saveProfile(profile: Profile, path: string): void {
  writeTextFile(path, serializeProfileXml(profile))
}

// ============================================================================
// Authoring helpers
// ============================================================================

export function emptyProfile(name: string, language = "", description = ""): Profile {
  return { name, description, language, rules: [], created: null, modified: null }
}

/**
 * Enabled rules in execution order.
 */
export function enabledRules(profile: Profile): PatternRule[] {
  return sortRules(profile.rules).filter((rule) => rule.enabled)
}

export function nextOrder(profile: Profile): number {
  return profile.rules.reduce((max, rule) => Math.max(max, rule.order), 0) + 1
}

export function addRule(profile: Profile, rule: PatternRule): Profile {
  return { ...profile, rules: sortRules([...profile.rules, rule]) }
}

export function removeRule(profile: Profile, order: number): Profile {
  return { ...profile, rules: profile.rules.filter((rule) => rule.order !== order) }
}

/**
 * Stamp the modification day (and the creation day, if never set).
 */
export function touchProfile(profile: Profile, now: Date = new Date()): Profile {
  const today = dayAligned(Math.floor(now.getTime() / 1000))
  return { ...profile, created: profile.created ?? today, modified: today }
}

/**
 * File name used when a profile is stored in the profiles directory.
 */
export function profileFileName(name: string): string {
  const slug = name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
  return `${slug || "profile"}${PROFILE_SUFFIX}`
}

/**
 * Copy a profile document into the profiles directory, named after the
 * profile. The document is validated first and copied verbatim.
 */
export function importProfile(sourcePath: string, profilesDir: string, overwrite = false): string {
  const content = readTextFile(sourcePath, "Profile")
  const profile = parseProfileXml(content, sourcePath)
  const destination = join(profilesDir, profileFileName(profile.name))
  if (!overwrite && existsSync(destination)) {
    throw new IoError(destination, "import into", new Error("a profile with this name already exists"))
  }
  writeTextFile(destination, content)
  log.info(`imported "${profile.name}" -> ${destination}`)
  return destination
}

export function exportProfile(profilePath: string, destination: string): void {
  try {
    copyFileSync(profilePath, destination)
  } catch (error) {
    if (isNotFound(error) && !existsSync(profilePath)) throw new MissingResourceError("Profile", profilePath)
    throw new IoError(destination, "export to", error)
  }
}

export function deleteProfile(profilePath: string): void {
  try {
    unlinkSync(profilePath)
  } catch (error) {
    if (isNotFound(error)) throw new MissingResourceError("Profile", profilePath)
    throw new IoError(profilePath, "delete", error)
  }
}
