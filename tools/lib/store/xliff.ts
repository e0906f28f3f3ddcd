/**
 * xliff.ts - XLIFF 1.2 documents (and the .mxliff/.mqxliff/.sdlxliff variants)
 *
 * Each trans-unit becomes a record. Source and target text are the inner markup
 * of their elements, so inline tags (<g>, <x/>, <ph>...) survive a round trip.
 * The store is a markup store: rules run over the text between the tags. Writing back re-parses the target markup; text
 * that no longer parses is stored as plain text.
 */

import { XMLSerializer } from "@xmldom/xmldom"
import { registerStore, type StoreFactory } from "./store"
import { FileRecordStore } from "./file-store"
import type { TextRecord } from "../core/types"
import { isQaError } from "../core/errors"
import { childElements, findElements, parseXml, readAttributes, serializeChildren } from "../xml/markup"
import { createLog } from "../log"

const log = createLog("xliff")

const XLIFF_EXTENSIONS = [".xlf", ".xliff", ".mxliff", ".mqxliff", ".sdlxliff"]

function firstChild(unit: Element, localName: string): Element | null {
  return childElements(unit, localName)[0] ?? null
}

function unitMetadata(unit: Element): Record<string, string> | undefined {
  const attributes = readAttributes(unit)
  attributes.delete("id")
  return attributes.size > 0 ? Object.fromEntries(attributes) : undefined
}

function removeChildren(element: Element): void {
  while (element.firstChild) element.removeChild(element.firstChild)
}

function qualifiedName(sibling: Element, localName: string): string {
  return sibling.prefix ? `${sibling.prefix}:${localName}` : localName
}

/**
 * Replace an element's content with the given inner markup.
 */
function setInnerMarkup(element: Element, markup: string): void {
  const doc = element.ownerDocument
  removeChildren(element)

  const ns = element.namespaceURI
  const wrapper = ns ? `<fragment xmlns="${ns}">${markup}</fragment>` : `<fragment>${markup}</fragment>`
  let fragment: Element
  try {
    fragment = parseXml(wrapper).documentElement
  } catch (error) {
    if (!isQaError(error)) throw error
    element.appendChild(doc.createTextNode(markup))
    return
  }

  for (let i = 0; i < fragment.childNodes.length; i++) {
    const child = fragment.childNodes.item(i)
    if (child) element.appendChild(doc.importNode(child, true))
  }
}

// Whitespace outside the root element does not always survive the DOM
function restoreLayout(original: string, serialized: string): string {
  let out = serialized.replace(/^(<\?xml[^>]*\?>)(?!\r?\n)/, "$1\n")
  if (/\n$/.test(original) && !out.endsWith("\n")) out += "\n"
  return out
}

export class XliffRecordStore extends FileRecordStore {
  readonly name = "xliff"
  readonly markup = true

  protected parse(content: string): TextRecord[] {
    const root = parseXml(content, this.location).documentElement
    const records: TextRecord[] = []

    for (const unit of findElements(root, "trans-unit")) {
      const id = readAttributes(unit).get("id")
      const source = firstChild(unit, "source")
      if (id === undefined || !source) {
        log.warn(`skipping trans-unit without ${id === undefined ? "id" : "source"} in ${this.location}`)
        continue
      }
      const target = firstChild(unit, "target")
      const metadata = unitMetadata(unit)
      records.push({
        id,
        source: serializeChildren(source),
        target: target ? serializeChildren(target) : "",
        ...(metadata ? { metadata } : {}),
      })
    }

    return records
  }

  protected render(content: string, records: readonly TextRecord[]): string {
    const doc = parseXml(content, this.location)
    const targets = new Map(records.map((record) => [record.id, record.target]))

    for (const unit of findElements(doc.documentElement, "trans-unit")) {
      const id = readAttributes(unit).get("id")
      const text = id === undefined ? undefined : targets.get(id)
      const source = firstChild(unit, "source")
      if (text === undefined || !source) continue

      let target = firstChild(unit, "target")
      if (!target) {
        if (text === "") continue
        target = doc.createElementNS(source.namespaceURI, qualifiedName(source, "target"))
        unit.insertBefore(target, source.nextSibling)
      }
      if (serializeChildren(target) !== text) setInnerMarkup(target, text)
    }

    return restoreLayout(content, new XMLSerializer().serializeToString(doc))
  }
}

export const XliffStore: StoreFactory = {
  name: "xliff",
  extensions: XLIFF_EXTENSIONS,
  priority: 50,
  open: (file) => new XliffRecordStore(file),
}

// Register the store
registerStore(XliffStore)
