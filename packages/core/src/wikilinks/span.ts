// Locates the [[wikilink]] surrounding a cursor on a single line.

import { WIKILINK_CLOSE, WIKILINK_OPEN } from "./patterns.js"

/**
 * Slice bounds of a wikilink's inner text within a line.
 * `line.slice(start, end)` is the text between `[[` and `]]`.
 */
export interface WikilinkSpan {
  /** 0-based offset immediately after `[[` */
  start: number
  /** 0-based offset where the closing `]]` begins */
  end: number
}

/**
 * Find the innermost `[[...]]` pair enclosing the cursor.
 *
 * Scans backward from the cursor for `[[` and forward for `]]`, so with
 * several links on one line only the one around the cursor matches. The
 * second `[` of the opener and the first `]` of the closer count as inside.
 *
 * @param line The line text
 * @param column 1-based cursor column, from 1 to `line.length + 1`
 */
export function findWikilinkSpan(
  line: string,
  column: number
): WikilinkSpan | null {
  const cursor = column - 1

  let start = -1
  for (let i = cursor - 1; i >= 0; i--) {
    if (line.startsWith(WIKILINK_OPEN, i)) {
      start = i + WIKILINK_OPEN.length
      break
    }
  }
  if (start === -1) return null

  // A closer between the opener and the cursor means the cursor is past this link
  if (line.slice(start, column).includes(WIKILINK_CLOSE)) return null

  const end = line.indexOf(WIKILINK_CLOSE, Math.max(cursor, 0))
  if (end === -1) return null

  return { start, end }
}

/**
 * Get the trimmed wikilink text under the cursor.
 * @returns The inner text, or null when the cursor is not in a non-empty wikilink
 */
export function wikilinkAtCursor(line: string, column: number): string | null {
  const span = findWikilinkSpan(line, column)
  if (!span) return null

  const text = line.slice(span.start, span.end).trim()
  return text !== "" ? text : null
}
