// Wikilink pattern utilities: [[title]] and [[title#heading]].

/** Opening delimiter of a wikilink */
export const WIKILINK_OPEN = "[["

/** Closing delimiter of a wikilink */
export const WIKILINK_CLOSE = "]]"

/** Separates the note title from the heading fragment */
export const HEADING_SEPARATOR = "#"

/**
 * Parsed wikilink structure
 */
export interface ParsedWikilink {
  /** Note title, used as the href when looking the note up */
  title: string
  /** Heading fragment after the first `#`, if any */
  heading: string | null
}

/**
 * Split wikilink text into a title and an optional heading.
 *
 * Only the first `#` separates; `a#b#c` has the heading `b#c`. A bare
 * trailing `#` is dropped, and text starting with `#` is all title.
 * @param text The trimmed inner text of the wikilink, without brackets
 */
export function parseWikilink(text: string): ParsedWikilink {
  const hashIndex = text.indexOf(HEADING_SEPARATOR)

  if (hashIndex > 0 && hashIndex < text.length - 1) {
    return {
      title: text.slice(0, hashIndex),
      heading: text.slice(hashIndex + 1),
    }
  }

  const title = text.endsWith(HEADING_SEPARATOR) ? text.slice(0, -1) : text
  return { title, heading: null }
}

/**
 * Escape special regex characters in a string.
 */
function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Regex matching a markdown ATX heading line that starts with the given text.
 */
export function headingPattern(heading: string): RegExp {
  return new RegExp(`^#+\\s+${escapeRegExp(heading)}`)
}

/**
 * Find the first line that is a heading starting with `heading`.
 * @returns 0-based line index, or null when no heading matches
 */
export function findHeadingLine(
  lines: readonly string[],
  heading: string
): number | null {
  const pattern = headingPattern(heading)
  const index = lines.findIndex((line) => pattern.test(line))
  return index === -1 ? null : index
}
