/**
 * batch.ts - Whole-document operations: profile + record store -> result
 *
 * Preconditions (profile readable, document readable) are checked before any
 * record is touched. Documents are only rewritten when something changed, and
 * are backed up first unless backups are turned off.
 */

import { existsSync } from "fs"
import type { BatchFindResult, BatchReplaceResult, PatternRule, Profile, RecordEdit, TextRecord } from "./types"
import { find, replace } from "./engine"
import { applyEdits } from "./edits"
import { documentStats, type DocumentStats } from "./document-stats"
import { loadProfile, emptyProfile, DEFAULT_CATEGORY } from "../profile/profile"
import { openRecordStore, createBackup, type RecordStore } from "../store"
import { createLog } from "../log"

const log = createLog("batch")

export type DocumentRef = string | RecordStore

export interface WriteOptions {
  output?: string // write here instead of over the document
  backup?: boolean // default true
  backupDir?: string | null // null = beside the document
}

function storeFor(document: DocumentRef): RecordStore {
  return typeof document === "string" ? openRecordStore(document) : document
}

function profileFor(profile: string | Profile): Profile {
  return typeof profile === "string" ? loadProfile(profile) : profile
}

/**
 * Write records back, backing the document up first when it is being
 * overwritten in place.
 */
function write(store: RecordStore, records: readonly TextRecord[], options: WriteOptions): string {
  const inPlace = options.output === undefined || options.output === store.location
  if (inPlace && options.backup !== false && existsSync(store.location)) {
    createBackup(store.location, options.backupDir)
  }
  return store.persist(records, options.output)
}

export function runBatchFind(profile: string | Profile, document: DocumentRef): BatchFindResult {
  const loaded = profileFor(profile)
  const store = storeFor(document)
  const records = store.list()
  return find(loaded, records, { source: store.location, markup: store.markup })
}

export function runDocumentStats(document: DocumentRef): DocumentStats {
  const store = storeFor(document)
  return documentStats(store.list(), { source: store.location, markup: store.markup })
}

export function runBatchReplace(profile: string | Profile, document: DocumentRef, options: WriteOptions = {}): BatchReplaceResult {
  const loaded = profileFor(profile)
  const store = storeFor(document)
  const outcome = replace(loaded, store.list(), { markup: store.markup })

  let output = options.output ?? store.location
  if (outcome.totalReplacements > 0) {
    output = write(store, outcome.records, options)
    log.info(`${outcome.totalReplacements} replacement(s) in ${outcome.modifiedRecords} record(s) -> ${output}`)
  }

  return {
    success: outcome.totalReplacements > 0,
    modifiedRecords: outcome.modifiedRecords,
    totalReplacements: outcome.totalReplacements,
    output,
    diagnostics: outcome.diagnostics,
    rules: outcome.rules,
  }
}

export interface ApplyEditsReport {
  success: boolean // the document was rewritten
  applied: number
  unknownIds: string[]
  output: string
}

export function runApplyEdits(document: DocumentRef, edits: readonly RecordEdit[], options: WriteOptions = {}): ApplyEditsReport {
  const store = storeFor(document)
  const result = applyEdits(store.list(), edits)
  for (const error of result.errors) log.warn(error.message)

  let output = options.output ?? store.location
  if (result.applied > 0) output = write(store, result.records, options)

  return {
    success: result.applied > 0,
    applied: result.applied,
    unknownIds: result.errors.map((error) => error.recordId),
    output,
  }
}

export interface AdHocRuleOptions {
  replacement?: string
  caseSensitive?: boolean
  excludePattern?: string
  name?: string
}

/**
 * A one-rule profile for running a single pattern from the command line.
 */
export function adHocProfile(pattern: string, options: AdHocRuleOptions = {}): Profile {
  const rule: PatternRule = {
    order: 1,
    enabled: true,
    name: options.name ?? pattern,
    description: "",
    category: DEFAULT_CATEGORY,
    pattern,
    replacement: options.replacement ?? "",
    caseSensitive: options.caseSensitive ?? false,
    excludePattern: options.excludePattern ?? "",
  }
  return { ...emptyProfile("Ad hoc"), rules: [rule] }
}
