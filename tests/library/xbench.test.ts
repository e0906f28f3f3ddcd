import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest"
import { mkdtempSync, rmSync, writeFileSync } from "fs"
import { join } from "path"
import { tmpdir } from "os"
import { checklistStats, checklistToLibrary, loadChecklist, parseChecklist } from "../../tools/lib/library/xbench"
import { MissingResourceError, ParseError } from "../../tools/lib/core/errors"

let errorSpy: MockInstance

beforeEach(() => {
  errorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
})

afterEach(() => {
  errorSpy.mockRestore()
})

const CHECKLIST = `<?xml version="1.0" encoding="UTF-8"?>
<Checklist>
  <ChecklistName>Norsk tegnsetting</ChecklistName>
  <Items>
    <ChecklistItem>
      <Name>Double period</Name>
      <SearchText>\\.\\.(?!\\.)</SearchText>
      <ReplaceText>.</ReplaceText>
      <IsRegEx>true</IsRegEx>
      <Category>Punctuation</Category>
      <Comment>Two periods that are not an ellipsis</Comment>
    </ChecklistItem>
    <PowerSearchItem Name="Straight quotes" Pattern="&quot;(\\w+)&quot;" Replacement="«$1»" RegEx="yes" Group="Tegnsetting"/>
    <QAItem>
      <Name>Literal TODO</Name>
      <FindText>TODO</FindText>
      <UseRegex>0</UseRegex>
    </QAItem>
    <Item>
      <Name>Disabled check</Name>
      <Search>x+</Search>
      <IsRegex>1</IsRegex>
      <Enabled>false</Enabled>
    </Item>
    <Item>
      <Name>No search</Name>
    </Item>
    <Item>
      <Search>\\d+ %</Search>
      <RegularExpression>on</RegularExpression>
      <MatchCase>on</MatchCase>
    </Item>
  </Items>
</Checklist>
`

describe("parseChecklist", () => {
  test("reads the checklist name and items in document order", () => {
    const checklist = parseChecklist(CHECKLIST)

    expect(checklist.name).toBe("Norsk tegnsetting")
    expect(checklist.items.map((i) => i.name)).toEqual([
      "Double period",
      "Straight quotes",
      "Literal TODO",
      "Disabled check",
      "Unnamed Item",
    ])
  })

  test("reads fields from child elements", () => {
    expect(parseChecklist(CHECKLIST).items[0]).toEqual({
      name: "Double period",
      search: "\\.\\.(?!\\.)",
      replace: ".",
      isRegex: true,
      caseSensitive: false,
      enabled: true,
      category: "Punctuation",
      description: "Two periods that are not an ellipsis",
    })
  })

  test("reads fields from attributes", () => {
    expect(parseChecklist(CHECKLIST).items[1]).toMatchObject({
      search: '"(\\w+)"',
      replace: "«$1»",
      isRegex: true,
      category: "Tegnsetting",
    })
  })

  test("flags accept 1, yes and on, and default sensibly", () => {
    const items = parseChecklist(CHECKLIST).items
    expect(items.map((i) => [i.isRegex, i.enabled, i.caseSensitive])).toEqual([
      [true, true, false],
      [true, true, false],
      [false, true, false],
      [true, false, false],
      [true, true, true],
    ])
    expect(items[4]?.category).toBe("Uncategorized")
  })

  test("skips items without a search text with a warning", () => {
    parseChecklist(CHECKLIST)
    expect(errorSpy).toHaveBeenCalledWith("[xbench] warning: skipped 1 checklist item(s) without a search text")
  })

  test("rejects malformed XML", () => {
    expect(() => parseChecklist("<Checklist><Item>&bogus;</Item></Checklist>")).toThrow(ParseError)
  })
})

describe("checklistStats", () => {
  test("counts regex, enabled and replacing items", () => {
    expect(checklistStats(parseChecklist(CHECKLIST))).toEqual({
      totalItems: 5,
      regexItems: 4,
      enabledItems: 4,
      withReplacement: 2,
    })
  })
})

describe("checklistToLibrary", () => {
  test("keeps enabled regex items grouped by category", () => {
    const library = checklistToLibrary(parseChecklist(CHECKLIST))

    expect(library.categories.map((c) => [c.name, c.entries.map((e) => e.name)])).toEqual([
      ["Punctuation", ["Double period"]],
      ["Tegnsetting", ["Straight quotes"]],
      ["Uncategorized", ["Unnamed Item"]],
    ])
    expect(library.categories[1]?.entries[0]).toMatchObject({
      pattern: '"(\\w+)"',
      replace: "«$1»",
      category: "Tegnsetting",
      description: "",
    })
  })

  test("gives every snippet a fresh id", () => {
    const ids = checklistToLibrary(parseChecklist(CHECKLIST)).categories.flatMap((c) => c.entries.map((e) => e.id))
    expect(new Set(ids).size).toBe(3)
  })
})

describe("loadChecklist", () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "xbench-test-"))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  test("reads a checklist file", () => {
    const path = join(tempDir, "norsk.xbckl")
    writeFileSync(path, CHECKLIST)
    expect(loadChecklist(path).items).toHaveLength(5)
  })

  test("a missing file is a missing resource", () => {
    expect(() => loadChecklist(join(tempDir, "none.xbckl"))).toThrow(MissingResourceError)
  })
})
