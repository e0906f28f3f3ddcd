import { z } from "zod"

// One unit of translatable text supplied by a record store
export const TextRecord = z.object({
  id: z.string(),
  source: z.string().default(""),
  target: z.string(), // the text the engine reads and may rewrite
  metadata: z.record(z.string()).optional(), // opaque to the engine
})
export type TextRecord = z.infer<typeof TextRecord>

export const TextRecords = z.array(TextRecord)

// A single configured check
export const PatternRule = z.object({
  order: z.number().int(),
  enabled: z.boolean().default(true),
  name: z.string(),
  description: z.string().default(""),
  category: z.string().default("Custom"),
  pattern: z.string(), // regex source, "" = no-op
  replacement: z.string().default(""), // may contain back-references
  caseSensitive: z.boolean().default(false),
  excludePattern: z.string().default(""), // "" = no exclusion
})
export type PatternRule = z.infer<typeof PatternRule>

export const Profile = z.object({
  name: z.string(),
  description: z.string(),
  language: z.string(),
  rules: z.array(PatternRule),
  created: z.number().int().nullable(), // day-aligned epoch seconds
  modified: z.number().int().nullable(),
})
export type Profile = z.infer<typeof Profile>

// Display metadata for a profile found on disk
export const ProfileInfo = z.object({
  path: z.string(),
  name: z.string(),
  description: z.string(),
  language: z.string(),
  parsed: z.boolean(), // false = metadata extracted best-effort from a broken document
})
export type ProfileInfo = z.infer<typeof ProfileInfo>

export const SnippetEntry = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  pattern: z.string(),
  replace: z.string(),
  category: z.string(),
})
export type SnippetEntry = z.infer<typeof SnippetEntry>

export const SnippetCategory = z.object({
  name: z.string(),
  entries: z.array(SnippetEntry),
})
export type SnippetCategory = z.infer<typeof SnippetCategory>

// Category names may repeat; consumers keep duplicates apart
export const SnippetLibrary = z.object({
  categories: z.array(SnippetCategory),
})
export type SnippetLibrary = z.infer<typeof SnippetLibrary>

export const MatchReport = z.object({
  recordId: z.string(),
  ruleName: z.string(),
  ruleOrder: z.number().int(),
  category: z.string(),
  description: z.string(),
  source: z.string(),
  target: z.string(),
  match: z.string(), // target.slice(start, end)
  start: z.number().int(), // offsets into the pre-mutation target
  end: z.number().int(),
  pattern: z.string(),
  replacement: z.string(), // template as authored
  preview: z.string(), // template expanded against this match
})
export type MatchReport = z.infer<typeof MatchReport>

export const Diagnostic = z.object({
  kind: z.literal("InvalidPattern"),
  ruleName: z.string(),
  ruleOrder: z.number().int(),
  pattern: z.string(),
  message: z.string(),
})
export type Diagnostic = z.infer<typeof Diagnostic>

export const BatchFindResult = z.object({
  profileName: z.string(),
  source: z.string(),
  totalMatches: z.number().int(),
  matches: z.array(MatchReport),
  diagnostics: z.array(Diagnostic),
})
export type BatchFindResult = z.infer<typeof BatchFindResult>

export const RuleTally = z.object({
  order: z.number().int(),
  name: z.string(),
  replacements: z.number().int(),
  records: z.number().int(),
})
export type RuleTally = z.infer<typeof RuleTally>

export const RecordChange = z.object({
  recordId: z.string(),
  before: z.string(),
  after: z.string(),
  replacements: z.number().int(),
})
export type RecordChange = z.infer<typeof RecordChange>

export const BatchReplaceResult = z.object({
  success: z.boolean(),
  modifiedRecords: z.number().int(),
  totalReplacements: z.number().int(),
  output: z.string(),
  diagnostics: z.array(Diagnostic),
  rules: z.array(RuleTally),
})
export type BatchReplaceResult = z.infer<typeof BatchReplaceResult>

// A manual correction: replace a record's target wholesale
export const RecordEdit = z.object({
  id: z.string(),
  target: z.string(),
})
export type RecordEdit = z.infer<typeof RecordEdit>

// Accepted edit documents: [{ id, target }] or { id: target }
export const EditsDocument = z.union([z.array(RecordEdit), z.record(z.string())])
export type EditsDocument = z.infer<typeof EditsDocument>
