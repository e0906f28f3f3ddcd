import { describe, test, expect, beforeEach, afterEach } from "vitest"
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from "fs"
import { join } from "path"
import { tmpdir } from "os"
import { applyEdits, loadEdits, parseEdits, saveEdits } from "../../tools/lib/core/edits"
import { MissingResourceError, ParseError, UnknownRecordIdError } from "../../tools/lib/core/errors"
import type { TextRecord } from "../../tools/lib/core/types"

function createRecords(): TextRecord[] {
  return [
    { id: "1", source: "Hello", target: "Hei" },
    { id: "2", source: "World", target: "Verd" },
  ]
}

describe("applyEdits", () => {
  test("overwrites targets wholesale", () => {
    const result = applyEdits(createRecords(), [{ id: "2", target: "Verden" }])

    expect(result.applied).toBe(1)
    expect(result.errors).toEqual([])
    expect(result.records.map((r) => r.target)).toEqual(["Hei", "Verden"])
  })

  test("unknown id reports one error and changes nothing", () => {
    const records = createRecords()
    const result = applyEdits(records, [{ id: "missing", target: "x" }])

    expect(result.applied).toBe(0)
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0]).toBeInstanceOf(UnknownRecordIdError)
    expect(result.errors[0]?.recordId).toBe("missing")
    expect(result.errors[0]?.kind).toBe("UnknownRecordId")
    expect(result.records).toEqual(createRecords())
  })

  test("applies the known edits alongside unknown ones", () => {
    const result = applyEdits(createRecords(), [
      { id: "1", target: "Hallo" },
      { id: "9", target: "x" },
    ])
    expect(result.applied).toBe(1)
    expect(result.errors.map((e) => e.message)).toEqual(["Unknown record id: 9"])
    expect(result.records[0]?.target).toBe("Hallo")
  })

  test("later edits for the same id win", () => {
    const result = applyEdits(createRecords(), [
      { id: "1", target: "first" },
      { id: "1", target: "second" },
    ])
    expect(result.applied).toBe(2)
    expect(result.records[0]?.target).toBe("second")
  })

  test("does not mutate the input", () => {
    const records = createRecords()
    applyEdits(records, [{ id: "1", target: "changed" }])
    expect(records[0]?.target).toBe("Hei")
  })
})

describe("parseEdits", () => {
  test("accepts a list of edits", () => {
    expect(parseEdits('[{"id":"1","target":"a"},{"id":"2","target":"b"}]')).toEqual([
      { id: "1", target: "a" },
      { id: "2", target: "b" },
    ])
  })

  test("accepts a map of id to target", () => {
    expect(parseEdits('{"1":"a","2":"b"}')).toEqual([
      { id: "1", target: "a" },
      { id: "2", target: "b" },
    ])
  })

  test("rejects malformed JSON", () => {
    expect(() => parseEdits("{not json")).toThrow(ParseError)
  })

  test("rejects documents of the wrong shape", () => {
    expect(() => parseEdits('[{"id":1}]')).toThrow(ParseError)
    expect(() => parseEdits('{"1": 5}')).toThrow(ParseError)
  })
})

describe("saveEdits / loadEdits", () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "edits-test-"))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  test("round-trips through a file", () => {
    const path = join(tempDir, "edits.json")
    saveEdits([{ id: "1", target: "a" }], path)

    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual([{ id: "1", target: "a" }])
    expect(loadEdits(path)).toEqual([{ id: "1", target: "a" }])
  })

  test("reports the file on parse errors", () => {
    const path = join(tempDir, "bad.json")
    writeFileSync(path, "[")
    try {
      loadEdits(path)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError)
      if (err instanceof ParseError) expect(err.path).toBe(path)
    }
  })

  test("missing file is a MissingResourceError", () => {
    expect(() => loadEdits(join(tempDir, "nope.json"))).toThrow(MissingResourceError)
  })
})
