// Wikilinks module exports
export {
  WIKILINK_OPEN,
  WIKILINK_CLOSE,
  HEADING_SEPARATOR,
  parseWikilink,
  headingPattern,
  findHeadingLine,
  type ParsedWikilink,
} from "./patterns.js"

export {
  findWikilinkSpan,
  wikilinkAtCursor,
  type WikilinkSpan,
} from "./span.js"
