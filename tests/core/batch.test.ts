import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest"
import { mkdtempSync, rmSync, readFileSync, writeFileSync, readdirSync } from "fs"
import { join } from "path"
import { tmpdir } from "os"
import { adHocProfile, runApplyEdits, runBatchFind, runBatchReplace } from "../../tools/lib/core/batch"
import { saveProfile } from "../../tools/lib/profile/profile"
import { MemoryRecordStore } from "../../tools/lib/store"
import { MissingResourceError, ParseError } from "../../tools/lib/core/errors"
import type { Profile } from "../../tools/lib/core/types"

let errorSpy: MockInstance
let tempDir: string
let docPath: string
let profilePath: string

const profile: Profile = {
  name: "Spaces",
  description: "",
  language: "nb",
  created: null,
  modified: null,
  rules: [
    {
      order: 1,
      enabled: true,
      name: "Double space",
      description: "",
      category: "Whitespace",
      pattern: " {2,}",
      replacement: " ",
      caseSensitive: false,
      excludePattern: "",
    },
  ],
}

const records = [
  { id: "1", source: "Price: 10 EUR", target: "Pris: 10  EUR" },
  { id: "2", source: "Hi", target: "Hei" },
]

beforeEach(() => {
  errorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
  tempDir = mkdtempSync(join(tmpdir(), "batch-test-"))
  docPath = join(tempDir, "doc.json")
  profilePath = join(tempDir, "spaces_qa_profile.xml")
  writeFileSync(docPath, JSON.stringify(records))
  saveProfile(profile, profilePath)
})

afterEach(() => {
  errorSpy.mockRestore()
  rmSync(tempDir, { recursive: true, force: true })
})

function readDoc(path = docPath): unknown {
  return JSON.parse(readFileSync(path, "utf-8"))
}

function backupsIn(dir: string): string[] {
  return readdirSync(dir).filter((name) => name.includes("_backup_"))
}

describe("runBatchFind", () => {
  test("runs a profile file over a document", () => {
    const result = runBatchFind(profilePath, docPath)
    expect(result.profileName).toBe("Spaces")
    expect(result.source).toBe(docPath)
    expect(result.totalMatches).toBe(1)
    expect(result.matches[0]).toMatchObject({ recordId: "1", start: 8, end: 10 })
  })

  test("an unreadable profile fails before the document is read", () => {
    writeFileSync(profilePath, "<broken")
    expect(() => runBatchFind(profilePath, join(tempDir, "missing.json"))).toThrow(ParseError)
  })

  test("a missing document is a MissingResourceError", () => {
    expect(() => runBatchFind(profilePath, join(tempDir, "missing.json"))).toThrow(MissingResourceError)
  })
})

describe("runBatchReplace", () => {
  test("rewrites the document and backs it up first", () => {
    const result = runBatchReplace(profilePath, docPath)

    expect(result).toEqual({
      success: true,
      modifiedRecords: 1,
      totalReplacements: 1,
      output: docPath,
      diagnostics: [],
      rules: [{ order: 1, name: "Double space", replacements: 1, records: 1 }],
    })
    expect(readDoc()).toEqual([{ ...records[0], target: "Pris: 10 EUR" }, records[1]])

    const backups = backupsIn(tempDir)
    expect(backups).toHaveLength(1)
    expect(JSON.parse(readFileSync(join(tempDir, backups[0] ?? ""), "utf-8"))).toEqual(records)
  })

  test("writes to an output file without a backup", () => {
    const out = join(tempDir, "fixed.json")
    const result = runBatchReplace(profilePath, docPath, { output: out })

    expect(result.output).toBe(out)
    expect(readDoc(out)).toEqual([{ ...records[0], target: "Pris: 10 EUR" }, records[1]])
    expect(readDoc()).toEqual(records)
    expect(backupsIn(tempDir)).toEqual([])
  })

  test("skips the backup when asked", () => {
    runBatchReplace(profilePath, docPath, { backup: false })
    expect(backupsIn(tempDir)).toEqual([])
  })

  test("puts backups in the backup directory", () => {
    const dir = join(tempDir, "backups")
    runBatchReplace(profilePath, docPath, { backupDir: dir })
    expect(readdirSync(dir)).toHaveLength(1)
  })

  test("leaves the document alone when nothing matches", () => {
    writeFileSync(docPath, JSON.stringify([records[1]]))
    const before = readFileSync(docPath, "utf-8")
    const result = runBatchReplace(profilePath, docPath)

    expect(result.success).toBe(false)
    expect(result.totalReplacements).toBe(0)
    expect(readFileSync(docPath, "utf-8")).toBe(before)
    expect(backupsIn(tempDir)).toEqual([])
  })

  test("accepts an in-memory store and an ad hoc profile", () => {
    const store = new MemoryRecordStore(records)
    const result = runBatchReplace(adHocProfile("(\\d+)  EUR", { replacement: "$1 EUR" }), store)

    expect(result.success).toBe(true)
    expect(result.output).toBe("memory")
    expect(store.list()[0]?.target).toBe("Pris: 10 EUR")
  })
})

describe("runApplyEdits", () => {
  test("applies known edits and reports unknown ids", () => {
    const report = runApplyEdits(docPath, [
      { id: "2", target: "Hallo" },
      { id: "404", target: "x" },
    ])

    expect(report).toEqual({ success: true, applied: 1, unknownIds: ["404"], output: docPath })
    expect(readDoc()).toEqual([records[0], { ...records[1], target: "Hallo" }])
    expect(backupsIn(tempDir)).toHaveLength(1)
  })

  test("writes nothing when every id is unknown", () => {
    const before = readFileSync(docPath, "utf-8")
    const report = runApplyEdits(docPath, [{ id: "404", target: "x" }])

    expect(report).toEqual({ success: false, applied: 0, unknownIds: ["404"], output: docPath })
    expect(readFileSync(docPath, "utf-8")).toBe(before)
    expect(errorSpy).toHaveBeenCalledWith("[batch] warning: Unknown record id: 404")
  })
})

describe("adHocProfile", () => {
  test("wraps one pattern in a profile", () => {
    const p = adHocProfile("a+", { replacement: "b", caseSensitive: true, excludePattern: "c" })
    expect(p.rules).toEqual([
      {
        order: 1,
        enabled: true,
        name: "a+",
        description: "",
        category: "Custom",
        pattern: "a+",
        replacement: "b",
        caseSensitive: true,
        excludePattern: "c",
      },
    ])
  })
})
