/**
 * segments.ts - The text runs of inline XML markup
 *
 * Tags, comments, CDATA sections, escaped tags (&lt;b&gt;) and entity
 * references other than the predefined five are opaque. Everything between
 * them is a text segment, decoded (&amp; -> &) and carrying a map from decoded
 * offsets back to raw ones.
 */

import { escapeText } from "./markup"

export interface TextSegment {
  start: number // raw span of the run within the markup
  end: number
  text: string // decoded
  offsets: readonly number[] // raw offset of each decoded code unit, then `end`
}

const OPAQUE = new RegExp(
  [
    "<!\\[CDATA\\[[\\s\\S]*?\\]\\]>",
    "<!--[\\s\\S]*?-->",
    "<[^<>]*>",
    "&lt;\\/?[A-Za-z](?:[^&]|&(?:amp|quot|apos|#\\d+);)*?&gt;",
    "&(?!(?:amp|lt|gt|quot|apos);)[A-Za-z_][\\w.-]*;",
  ].join("|"),
  "g"
)

const REFERENCE = /&(?:(amp|lt|gt|quot|apos)|#x([0-9a-fA-F]+)|#([0-9]+));/g

const PREDEFINED: Record<string, string> = { amp: "&", lt: "<", gt: ">", quot: '"', apos: "'" }

function referenceValue(name: string | undefined, hex: string | undefined, dec: string | undefined): string | null {
  if (name !== undefined) return PREDEFINED[name] ?? null
  const code = hex !== undefined ? parseInt(hex, 16) : parseInt(dec ?? "", 10)
  return Number.isNaN(code) || code > 0x10ffff ? null : String.fromCodePoint(code)
}

function decode(raw: string, base: number): { text: string; offsets: number[] } {
  let text = ""
  const offsets: number[] = []
  const literal = (from: number, to: number): void => {
    text += raw.slice(from, to)
    for (let i = from; i < to; i++) offsets.push(base + i)
  }

  let last = 0
  for (const m of raw.matchAll(REFERENCE)) {
    const value = referenceValue(m[1], m[2], m[3])
    if (value === null) continue // out of range, stays literal
    const at = m.index ?? 0
    literal(last, at)
    text += value
    for (let i = 0; i < value.length; i++) offsets.push(base + at)
    last = at + m[0].length
  }
  literal(last, raw.length)
  offsets.push(base + raw.length)

  return { text, offsets }
}

/**
 * Text runs of the markup in document order. Empty markup is one empty run.
 */
export function textSegments(markup: string): TextSegment[] {
  if (markup === "") return [{ start: 0, end: 0, text: "", offsets: [0] }]

  const segments: TextSegment[] = []
  const push = (start: number, end: number): void => {
    if (end > start) segments.push({ start, end, ...decode(markup.slice(start, end), start) })
  }

  let last = 0
  for (const m of markup.matchAll(OPAQUE)) {
    const at = m.index ?? 0
    push(last, at)
    last = at + m[0].length
  }
  push(last, markup.length)

  return segments
}

/**
 * Rewrite each text run. `rewrite` returns the new decoded text, or null to
 * leave the run as it was; new text is escaped on the way back in.
 */
export function rewriteText(markup: string, rewrite: (text: string) => string | null): string {
  let out = ""
  let last = 0
  for (const segment of textSegments(markup)) {
    const next = rewrite(segment.text)
    if (next === null) continue
    out += markup.slice(last, segment.start) + escapeText(next)
    last = segment.end
  }
  return out + markup.slice(last)
}
