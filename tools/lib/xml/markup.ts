/**
 * markup.ts - XML plumbing shared by the profile, library and XLIFF code
 *
 * Provides:
 *   - escapeXml / unescapeXml: the five reserved markup characters
 *   - escapeText: element text as serializers write it
 *   - parseXml: DOM parse that turns parser complaints into a positioned ParseError
 *   - serializeChildren: inner markup of an element, inline tags kept
 *   - walkXml: flattens an element tree into open/text/close events, so document
 *     readers can be written as small state machines
 *   - extractTag: regex fallback for documents the parser rejects
 */

import { DOMParser } from "@xmldom/xmldom"
import { ParseError } from "../core/errors"
import { createLog } from "../log"

const log = createLog("xml")

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>'

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;")
    .replace(/\r/g, "&#13;") // parsers fold raw CR into LF
}

// Attribute values additionally lose raw tabs and newlines to normalization
export function escapeAttribute(text: string): string {
  return escapeXml(text).replace(/\n/g, "&#10;").replace(/\t/g, "&#9;")
}

const NAMED_ENTITIES: Record<string, string> = {
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  amp: "&",
}

export function unescapeXml(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g, (raw, ref: string) => {
    if (ref.startsWith("#x")) return String.fromCodePoint(parseInt(ref.slice(2), 16))
    if (ref.startsWith("#")) return String.fromCodePoint(parseInt(ref.slice(1), 10))
    return NAMED_ENTITIES[ref] ?? raw
  })
}

// xmldom appends "#[line:N,col:M]" to its messages when a locator is set
const POSITION_PATTERN = /#\[line:(\d+),col:(\d+)\]/

function toParseError(message: string, path?: string): ParseError {
  const position = POSITION_PATTERN.exec(message)
  const text = message
    .replace(/^\[xmldom \w+\]\s*/, "")
    .replace(/\n@.*$/s, "")
    .trim()
  if (!position) return new ParseError(text, undefined, undefined, path)
  return new ParseError(text, Number(position[1]), Number(position[2]), path)
}

/**
 * Parse a complete XML document. Anything the parser reports as an error (not
 * a warning) fails the whole parse.
 */
export function parseXml(content: string, path?: string): Document {
  const problems: string[] = []
  const parser = new DOMParser({
    locator: {},
    errorHandler: {
      warning: (msg: unknown) => log.warn(String(msg)),
      error: (msg: unknown) => problems.push(String(msg)),
      fatalError: (msg: unknown) => problems.push(String(msg)),
    },
  })

  let doc: Document
  try {
    doc = parser.parseFromString(content, "text/xml")
  } catch (error) {
    throw toParseError(error instanceof Error ? error.message : String(error), path)
  }

  const first = problems[0]
  if (first !== undefined) throw toParseError(first, path)
  if (!doc.documentElement) throw new ParseError("Document has no root element", undefined, undefined, path)
  return doc
}

// ============================================================================
// Event walk
// ============================================================================

export type XmlEvent =
  | { type: "open"; name: string; attributes: ReadonlyMap<string, string> }
  | { type: "text"; text: string }
  | { type: "close"; name: string }

const ELEMENT_NODE = 1
const TEXT_NODE = 3
const CDATA_SECTION_NODE = 4

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE
}

export function readAttributes(element: Element): Map<string, string> {
  const attributes = new Map<string, string>()
  for (let i = 0; i < element.attributes.length; i++) {
    const attr = element.attributes.item(i)
    if (attr) attributes.set(attr.name, attr.value)
  }
  return attributes
}

/**
 * Depth-first document-order events for an element and its descendants.
 * Element names are local names (namespace prefixes dropped).
 */
export function* walkXml(element: Element): Generator<XmlEvent> {
  const name = element.localName || element.tagName
  yield { type: "open", name, attributes: readAttributes(element) }

  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i)
    if (!child) continue
    if (isElement(child)) {
      yield* walkXml(child)
    } else if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
      yield { type: "text", text: child.nodeValue ?? "" }
    }
  }

  yield { type: "close", name }
}

/**
 * Child elements with the given local name (direct children only).
 */
export function childElements(parent: Element, localName?: string): Element[] {
  const result: Element[] = []
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes.item(i)
    if (child && isElement(child) && (localName === undefined || (child.localName || child.tagName) === localName)) {
      result.push(child)
    }
  }
  return result
}

/**
 * All descendant elements with the given local name, in document order.
 */
export function findElements(root: Element, localName: string): Element[] {
  const result: Element[] = []
  for (const child of childElements(root)) {
    if ((child.localName || child.tagName) === localName) result.push(child)
    result.push(...findElements(child, localName))
  }
  return result
}

function serializeNode(node: Node): string {
  if (node.nodeType === TEXT_NODE) return escapeText(node.nodeValue ?? "")
  if (node.nodeType === CDATA_SECTION_NODE) return `<![CDATA[${node.nodeValue ?? ""}]]>`
  if (!isElement(node)) return ""

  let attrs = ""
  for (const [name, value] of readAttributes(node)) attrs += ` ${name}="${escapeAttribute(value)}"`
  const inner = serializeChildren(node)
  return inner === "" ? `<${node.tagName}${attrs}/>` : `<${node.tagName}${attrs}>${inner}</${node.tagName}>`
}

// Text content keeps quotes as-is, the way serializers write element text
export function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/\r/g, "&#13;")
}

/**
 * Inner markup of an element: text escaped, inline elements kept as tags.
 */
export function serializeChildren(element: Element): string {
  let out = ""
  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i)
    if (child) out += serializeNode(child)
  }
  return out
}

/**
 * Best-effort extraction of the first <tag>...</tag> text, for documents the
 * parser rejects. Returns null when the tag is absent.
 */
export function extractTag(content: string, tag: string): string | null {
  const match = new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`).exec(content)
  if (!match || match[1] === undefined) return null
  return unescapeXml(match[1].trim())
}
