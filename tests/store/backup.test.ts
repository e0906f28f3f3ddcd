import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest"
import { mkdtempSync, rmSync, readFileSync, writeFileSync, existsSync } from "fs"
import { join } from "path"
import { tmpdir } from "os"
import {
  backupTimestamp,
  cleanupBackups,
  createBackup,
  listBackups,
  originalFor,
  restoreBackup,
} from "../../tools/lib/store/backup"
import { IoError, MissingResourceError } from "../../tools/lib/core/errors"

let errorSpy: MockInstance
let tempDir: string
let docPath: string

// Local-time constructors, so names do not depend on the time zone
const t1 = new Date(2026, 9, 18, 14, 30, 5)
const t2 = new Date(2026, 9, 18, 14, 31, 0)
const t3 = new Date(2026, 9, 19, 9, 0, 0)

beforeEach(() => {
  errorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
  tempDir = mkdtempSync(join(tmpdir(), "backup-test-"))
  docPath = join(tempDir, "doc.json")
  writeFileSync(docPath, "original")
})

afterEach(() => {
  errorSpy.mockRestore()
  rmSync(tempDir, { recursive: true, force: true })
})

describe("createBackup", () => {
  test("formats the timestamp", () => {
    expect(backupTimestamp(t1)).toBe("20261018_143005")
  })

  test("copies the file beside itself", () => {
    const backup = createBackup(docPath, null, t1)
    expect(backup).toBe(join(tempDir, "doc_backup_20261018_143005.json"))
    expect(readFileSync(backup, "utf-8")).toBe("original")
    expect(errorSpy).toHaveBeenCalledWith(`[backup] backup created: ${backup}`)
  })

  test("numbers backups made within the same second", () => {
    createBackup(docPath, null, t1)
    expect(createBackup(docPath, null, t1)).toBe(join(tempDir, "doc_backup_20261018_143005_2.json"))
    expect(createBackup(docPath, null, t1)).toBe(join(tempDir, "doc_backup_20261018_143005_3.json"))
  })

  test("uses the backup directory when given", () => {
    const dir = join(tempDir, "backups")
    const backup = createBackup(docPath, dir, t1)
    expect(backup).toBe(join(dir, "doc_20261018_143005.json"))
    expect(readFileSync(backup, "utf-8")).toBe("original")
  })

  test("missing source is a MissingResourceError", () => {
    expect(() => createBackup(join(tempDir, "none.json"), null, t1)).toThrow(MissingResourceError)
  })
})

describe("listBackups", () => {
  test("lists a file's backups newest first", () => {
    const a = createBackup(docPath, null, t1)
    const c = createBackup(docPath, null, t3)
    const b = createBackup(docPath, null, t2)
    const b2 = createBackup(docPath, null, t2)
    writeFileSync(join(tempDir, "other_backup_20261018_143005.json"), "x")
    writeFileSync(join(tempDir, "doc_backup_notes.json"), "x")

    expect(listBackups(docPath)).toEqual([c, b2, b, a])
  })

  test("lists backups in a backup directory", () => {
    const dir = join(tempDir, "backups")
    const a = createBackup(docPath, dir, t1)
    const b = createBackup(docPath, dir, t2)
    expect(listBackups(docPath, dir)).toEqual([b, a])
    expect(listBackups(docPath)).toEqual([])
  })

  test("missing backup directory lists nothing", () => {
    expect(listBackups(docPath, join(tempDir, "absent"))).toEqual([])
  })
})

describe("restoreBackup", () => {
  test("derives the original from a side-by-side backup name", () => {
    expect(originalFor(join(tempDir, "doc_backup_20261018_143005.json"))).toBe(docPath)
    expect(originalFor(join(tempDir, "doc_20261018_143005.json"))).toBeNull()
  })

  test("restores the backup and keeps the replaced version", () => {
    const backup = createBackup(docPath, null, t1)
    writeFileSync(docPath, "changed")

    expect(restoreBackup(backup)).toBe(docPath)
    expect(readFileSync(docPath, "utf-8")).toBe("original")

    const backups = listBackups(docPath)
    expect(backups).toHaveLength(2)
    expect(backups.map((path) => readFileSync(path, "utf-8")).sort()).toEqual(["changed", "original"])
  })

  test("needs a target for backups kept in a backup directory", () => {
    const backup = createBackup(docPath, join(tempDir, "backups"), t1)
    expect(() => restoreBackup(backup)).toThrow(IoError)

    writeFileSync(docPath, "changed")
    expect(restoreBackup(backup, docPath, join(tempDir, "backups"))).toBe(docPath)
    expect(readFileSync(docPath, "utf-8")).toBe("original")
  })

  test("missing backup is a MissingResourceError", () => {
    expect(() => restoreBackup(join(tempDir, "doc_backup_20000101_000000.json"))).toThrow(MissingResourceError)
  })
})

describe("cleanupBackups", () => {
  test("keeps the newest backups", () => {
    const a = createBackup(docPath, null, t1)
    const b = createBackup(docPath, null, t2)
    const c = createBackup(docPath, null, t3)

    expect(cleanupBackups(docPath, 1)).toEqual([b, a])
    expect(existsSync(c)).toBe(true)
    expect(existsSync(a)).toBe(false)
    expect(listBackups(docPath)).toEqual([c])
  })

  test("rejects a keep count that is not a non-negative integer", () => {
    const backup = createBackup(docPath, null, t1)
    expect(() => cleanupBackups(docPath, Number.NaN)).toThrow(RangeError)
    expect(() => cleanupBackups(docPath, -1)).toThrow("keep must be a non-negative integer, got -1")
    expect(existsSync(backup)).toBe(true)
  })

  test("keep 0 deletes every backup", () => {
    const backup = createBackup(docPath, null, t1)
    expect(cleanupBackups(docPath, 0)).toEqual([backup])
  })

  test("does nothing when under the limit", () => {
    createBackup(docPath, null, t1)
    expect(cleanupBackups(docPath, 10)).toEqual([])
  })
})
