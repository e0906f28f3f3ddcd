/**
 * backup.ts - Timestamped copies of documents before they are rewritten
 *
 * Naming:
 *   beside the file:   <stem>_backup_<YYYYMMDD_HHMMSS><ext>
 *   in a backup dir:   <stem>_<YYYYMMDD_HHMMSS><ext>
 * Copies made within the same second get a _2, _3 ... suffix.
 */

import { copyFileSync, existsSync, mkdirSync, readdirSync, unlinkSync } from "fs"
import path from "path"
import { IoError, MissingResourceError } from "../core/errors"
import { createLog } from "../log"

const log = createLog("backup")

const BACKUP_MARKER = "_backup_"
const TIMESTAMP = String.raw`\d{8}_\d{6}(?:_\d+)?`

function pad(value: number): string {
  return String(value).padStart(2, "0")
}

export function backupTimestamp(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return `${date}_${time}`
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

interface BackupNaming {
  dir: string
  prefix: string // everything before the timestamp
  ext: string
}

function namingFor(file: string, backupDir?: string | null): BackupNaming {
  const ext = path.extname(file)
  const stem = path.basename(file, ext)
  return backupDir
    ? { dir: backupDir, prefix: `${stem}_`, ext }
    : { dir: path.dirname(file), prefix: `${stem}${BACKUP_MARKER}`, ext }
}

/**
 * Copy a file to a new timestamped backup. Returns the backup path.
 */
export function createBackup(file: string, backupDir?: string | null, now: Date = new Date()): string {
  if (!existsSync(file)) throw new MissingResourceError("File to back up", file)

  const { dir, prefix, ext } = namingFor(file, backupDir)
  const base = `${prefix}${backupTimestamp(now)}`
  let destination = path.join(dir, `${base}${ext}`)
  for (let n = 2; existsSync(destination); n++) {
    destination = path.join(dir, `${base}_${n}${ext}`)
  }

  try {
    mkdirSync(dir, { recursive: true })
    copyFileSync(file, destination)
  } catch (error) {
    throw new IoError(destination, "create backup", error)
  }
  log.info(`backup created: ${destination}`)
  return destination
}

/**
 * Backups of a file, newest first.
 */
export function listBackups(file: string, backupDir?: string | null): string[] {
  const { dir, prefix, ext } = namingFor(file, backupDir)
  if (!existsSync(dir)) return []

  const pattern = new RegExp(`^${escapeRegex(prefix)}${TIMESTAMP}${escapeRegex(ext)}$`)
  return readdirSync(dir)
    .filter((name) => pattern.test(name))
    .sort(compareBackupNames)
    .reverse()
    .map((name) => path.join(dir, name))
}

// Timestamps sort lexically; a missing collision counter ranks as 1
function compareBackupNames(a: string, b: string): number {
  const key = (name: string): [string, number] => {
    const match = /(\d{8}_\d{6})(?:_(\d+))?\.?[^.]*$/.exec(name)
    return [match?.[1] ?? "", Number(match?.[2] ?? 1)]
  }
  const [stampA, countA] = key(a)
  const [stampB, countB] = key(b)
  if (stampA !== stampB) return stampA < stampB ? -1 : 1
  return countA - countB
}

/**
 * The document a side-by-side backup was taken from, or null when the name
 * does not say (backups kept in a backup directory).
 */
export function originalFor(backup: string): string | null {
  const ext = path.extname(backup)
  const stem = path.basename(backup, ext)
  const at = stem.lastIndexOf(BACKUP_MARKER)
  if (at <= 0) return null
  return path.join(path.dirname(backup), `${stem.slice(0, at)}${ext}`)
}

/**
 * Copy a backup over its document. The current document is backed up first.
 * Returns the restored path.
 */
export function restoreBackup(backup: string, target?: string, backupDir?: string | null): string {
  if (!existsSync(backup)) throw new MissingResourceError("Backup", backup)

  const destination = target ?? originalFor(backup)
  if (!destination) {
    throw new IoError(backup, "restore", new Error("cannot tell the original file from the backup name; give a target"))
  }

  if (existsSync(destination)) createBackup(destination, backupDir)
  try {
    copyFileSync(backup, destination)
  } catch (error) {
    throw new IoError(destination, "restore", error)
  }
  log.info(`restored ${backup} -> ${destination}`)
  return destination
}

/**
 * Delete all but the newest `keep` backups. Returns the deleted paths.
 */
export function cleanupBackups(file: string, keep: number, backupDir?: string | null): string[] {
  if (!Number.isInteger(keep) || keep < 0) throw new RangeError(`keep must be a non-negative integer, got ${keep}`)
  const stale = listBackups(file, backupDir).slice(keep)
  for (const backup of stale) {
    try {
      unlinkSync(backup)
    } catch (error) {
      throw new IoError(backup, "delete", error)
    }
  }
  if (stale.length > 0) log.info(`deleted ${stale.length} old backup(s)`)
  return stale
}
