import { EditsDocument, type RecordEdit, type TextRecord } from "./types"
import { ParseError, UnknownRecordIdError } from "./errors"
import { readTextFile, writeTextFile } from "./files"

export interface ApplyEditsResult {
  records: TextRecord[] // new objects; the input records are left untouched
  applied: number
  errors: UnknownRecordIdError[] // one per edit whose id matched no record
}

/**
 * Overwrite record targets wholesale. Edits apply in order, so a later edit
 * for the same id wins.
 */
export function applyEdits(records: readonly TextRecord[], edits: readonly RecordEdit[]): ApplyEditsResult {
  const output = records.map((record) => ({ ...record }))
  const byId = new Map(output.map((record) => [record.id, record]))
  const errors: UnknownRecordIdError[] = []
  let applied = 0

  for (const edit of edits) {
    const record = byId.get(edit.id)
    if (!record) {
      errors.push(new UnknownRecordIdError(edit.id))
      continue
    }
    record.target = edit.target
    applied++
  }

  return { records: output, applied, errors }
}

/**
 * Parse edits from JSON (stdin or file).
 * Accepts either a list of { id, target } or a minimal map: { id: target, ... }
 */
export function parseEdits(input: string, path?: string): RecordEdit[] {
  let json: unknown
  try {
    json = JSON.parse(input)
  } catch (error) {
    throw new ParseError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, undefined, undefined, path)
  }

  const parsed = EditsDocument.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
    throw new ParseError(`Invalid edits document${where}: ${issue?.message ?? "unrecognized shape"}`, undefined, undefined, path)
  }

  const doc = parsed.data
  if (Array.isArray(doc)) return doc
  return Object.entries(doc).map(([id, target]) => ({ id, target }))
}

export function loadEdits(path: string): RecordEdit[] {
  return parseEdits(readTextFile(path, "Edits file"), path)
}

export function saveEdits(edits: readonly RecordEdit[], path: string): void {
  writeTextFile(path, JSON.stringify(edits, null, 2))
}
