import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest"
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from "fs"
import { join } from "path"
import { tmpdir } from "os"
import {
  addSnippet,
  defaultLibrary,
  exportLibrary,
  findSnippet,
  importLibrary,
  loadLibrary,
  mergeLibraries,
  parseLibraryXml,
  removeSnippet,
  saveLibrary,
  searchSnippets,
  serializeLibraryXml,
  snippetToRule,
} from "../../tools/lib/library/snippets"
import { MissingResourceError, ParseError } from "../../tools/lib/core/errors"
import type { SnippetLibrary } from "../../tools/lib/core/types"

let errorSpy: MockInstance

beforeEach(() => {
  errorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
})

afterEach(() => {
  errorSpy.mockRestore()
})

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

const library: SnippetLibrary = {
  categories: [
    {
      name: "Tegnsetting",
      entries: [
        {
          id: "snip-1",
          name: "Ellipsis",
          description: "Three dots",
          pattern: "\\.\\.\\.",
          replace: "…",
          category: "Tegnsetting",
        },
      ],
    },
    { name: "Tomt", entries: [] },
  ],
}

const libraryXml = `<?xml version="1.0" encoding="UTF-8"?>
<regex-library>
  <category name="Tegnsetting">
    <entry id="snip-1">
      <name>Ellipsis</name>
      <description>Three dots</description>
      <pattern>\\.\\.\\.</pattern>
      <replace>…</replace>
    </entry>
  </category>
  <category name="Tomt">
  </category>
</regex-library>
`

describe("defaultLibrary", () => {
  test("has the four starter categories, empty", () => {
    expect(defaultLibrary()).toEqual({
      categories: [
        { name: "Tegnsetting", entries: [] },
        { name: "Harde mellomrom", entries: [] },
        { name: "Tall/tallformatering", entries: [] },
        { name: "Spesialtegn", entries: [] },
      ],
    })
  })

  test("returns a fresh value each time", () => {
    const first = defaultLibrary()
    first.categories.pop()
    expect(defaultLibrary().categories).toHaveLength(4)
  })
})

describe("library documents", () => {
  test("serializes categories and entries", () => {
    expect(serializeLibraryXml(library)).toBe(libraryXml)
  })

  test("parses what it writes", () => {
    expect(parseLibraryXml(libraryXml)).toEqual(library)
  })

  test("round-trips reserved characters in names and patterns", () => {
    const tricky: SnippetLibrary = {
      categories: [
        {
          name: `Quotes "&" <more>`,
          entries: [
            {
              id: "a&b",
              name: "<nbsp>",
              description: "it's",
              pattern: "(\\d) (\\d{3})",
              replace: "$1 $2",
              category: `Quotes "&" <more>`,
            },
          ],
        },
      ],
    }
    expect(parseLibraryXml(serializeLibraryXml(tricky))).toEqual(tricky)
  })

  test("entries without an id get a random UUID", () => {
    const parsed = parseLibraryXml(
      "<regex-library><category name='A'><entry><name>x</name><pattern>y</pattern></entry></category></regex-library>"
    )
    const entry = parsed.categories[0]?.entries[0]
    expect(entry?.id).toMatch(UUID)
    expect(entry).toMatchObject({ name: "x", description: "", pattern: "y", replace: "", category: "A" })
  })

  test("keeps duplicate category names apart", () => {
    const parsed = parseLibraryXml(`<regex-library>
      <category name="Dup"><entry id="1"><name>one</name></entry></category>
      <category name="Dup"><entry id="2"><name>two</name></entry></category>
    </regex-library>`)
    expect(parsed.categories.map((c) => [c.name, c.entries.map((e) => e.id)])).toEqual([
      ["Dup", ["1"]],
      ["Dup", ["2"]],
    ])
  })

  test("gathers stray entries and unnamed categories under Uncategorized", () => {
    const parsed = parseLibraryXml(`<regex-library>
      <entry id="stray"><name>stray</name></entry>
      <category><entry id="unnamed"><name>unnamed</name></entry></category>
    </regex-library>`)
    expect(parsed.categories.map((c) => [c.name, c.entries.map((e) => [e.id, e.category])])).toEqual([
      ["Uncategorized", [["unnamed", "Uncategorized"]]],
      ["Uncategorized", [["stray", "Uncategorized"]]],
    ])
  })

  test("rejects other documents", () => {
    expect(() => parseLibraryXml("<qa_profile/>")).toThrow(ParseError)
  })
})

describe("library files", () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "library-test-"))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  test("loadLibrary falls back to the default library", () => {
    expect(loadLibrary(join(tempDir, "library.xml"))).toEqual(defaultLibrary())
  })

  test("saveLibrary then loadLibrary", () => {
    const path = join(tempDir, "library.xml")
    saveLibrary(library, path)
    expect(readFileSync(path, "utf-8")).toBe(libraryXml)
    expect(loadLibrary(path)).toEqual(library)
  })

  test("importLibrary requires the file", () => {
    expect(() => importLibrary(join(tempDir, "missing.xml"))).toThrow(MissingResourceError)
  })

  test("exportLibrary writes a document importLibrary reads", () => {
    const path = join(tempDir, "export.xml")
    exportLibrary(library, path)
    expect(importLibrary(path)).toEqual(library)
  })

  test("loadLibrary reports malformed documents", () => {
    const path = join(tempDir, "library.xml")
    writeFileSync(path, "<something-else/>")
    expect(() => loadLibrary(path)).toThrow(ParseError)
  })
})

describe("editing", () => {
  test("addSnippet appends to an existing category", () => {
    const { library: updated, entry } = addSnippet(library, {
      name: "Dash",
      pattern: " - ",
      replace: " – ",
      category: "Tegnsetting",
    })
    expect(entry.id).toMatch(UUID)
    expect(entry.description).toBe("")
    expect(updated.categories[0]?.entries.map((e) => e.name)).toEqual(["Ellipsis", "Dash"])
    expect(library.categories[0]?.entries).toHaveLength(1)
  })

  test("addSnippet creates a missing category at the end", () => {
    const { library: updated } = addSnippet(library, { name: "Nbsp", pattern: " ", category: "Harde mellomrom" })
    expect(updated.categories.map((c) => c.name)).toEqual(["Tegnsetting", "Tomt", "Harde mellomrom"])
  })

  test("findSnippet and removeSnippet", () => {
    expect(findSnippet(library, "snip-1")?.name).toBe("Ellipsis")
    expect(findSnippet(library, "nope")).toBeNull()

    const removed = removeSnippet(library, "snip-1")
    expect(removed?.categories.map((c) => c.entries.length)).toEqual([0, 0])
    expect(removeSnippet(library, "nope")).toBeNull()
  })

  test("searchSnippets matches name, description and pattern case-insensitively", () => {
    expect(searchSnippets(library, "ELLIP").map((e) => e.id)).toEqual(["snip-1"])
    expect(searchSnippets(library, "three").map((e) => e.id)).toEqual(["snip-1"])
    expect(searchSnippets(library, "\\.").map((e) => e.id)).toEqual(["snip-1"])
    expect(searchSnippets(library, "…")).toEqual([])
  })

  test("snippetToRule copies pattern and replacement", () => {
    const entry = findSnippet(library, "snip-1")
    if (!entry) throw new Error("fixture missing")
    expect(snippetToRule(entry, 7)).toEqual({
      order: 7,
      enabled: true,
      name: "Ellipsis",
      description: "Three dots",
      category: "Tegnsetting",
      pattern: "\\.\\.\\.",
      replacement: "…",
      caseSensitive: false,
      excludePattern: "",
    })
  })

  test("mergeLibraries appends imported categories, duplicates included", () => {
    const merged = mergeLibraries(library, { categories: [{ name: "Tegnsetting", entries: [] }] })
    expect(merged.categories.map((c) => c.name)).toEqual(["Tegnsetting", "Tomt", "Tegnsetting"])
  })
})
