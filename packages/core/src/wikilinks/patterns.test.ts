import { describe, expect, test } from "vitest"
import { findHeadingLine, headingPattern, parseWikilink } from "./patterns.js"

describe("parseWikilink", () => {
  test("plain title", () => {
    expect(parseWikilink("new note")).toEqual({ title: "new note", heading: null })
  })

  test("title with heading", () => {
    expect(parseWikilink("note#heading")).toEqual({ title: "note", heading: "heading" })
  })

  test("trailing # ignored", () => {
    expect(parseWikilink("note#")).toEqual({ title: "note", heading: null })
  })

  test("multiple # splits on first", () => {
    expect(parseWikilink("a#b#c")).toEqual({ title: "a", heading: "b#c" })
  })

  test("heading may itself be a #", () => {
    expect(parseWikilink("a##")).toEqual({ title: "a", heading: "#" })
  })

  test("leading # keeps the whole text as title", () => {
    expect(parseWikilink("#tag")).toEqual({ title: "#tag", heading: null })
  })

  test("only one trailing # is dropped", () => {
    expect(parseWikilink("##")).toEqual({ title: "#", heading: null })
  })
})

describe("headingPattern", () => {
  test("matches any heading level followed by whitespace", () => {
    const pattern = headingPattern("Setup")

    expect(pattern.test("# Setup")).toBe(true)
    expect(pattern.test("###\tSetup steps")).toBe(true)
    expect(pattern.test("#Setup")).toBe(false)
    expect(pattern.test("text ## Setup")).toBe(false)
  })

  test("treats heading text literally", () => {
    const pattern = headingPattern("v1.0 (draft)")

    expect(pattern.test("## v1.0 (draft)")).toBe(true)
    expect(pattern.test("## v1x0 (draft)")).toBe(false)
  })
})

describe("findHeadingLine", () => {
  const lines = ["# Title", "", "## Setup", "text", "### Setup details"]

  test("returns index of the first matching heading", () => {
    expect(findHeadingLine(lines, "Setup")).toBe(2)
  })

  test("finds a longer heading", () => {
    expect(findHeadingLine(lines, "Setup details")).toBe(4)
  })

  test("returns null when no heading matches", () => {
    expect(findHeadingLine(lines, "Missing")).toBeNull()
  })

  test("is case sensitive", () => {
    expect(findHeadingLine(lines, "setup")).toBeNull()
  })
})
