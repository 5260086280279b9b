import { describe, expect, test, vi } from "vitest"
import * as path from "node:path"

import { resolveBufferPath } from "./resolveBufferPath.js"

describe("resolveBufferPath", () => {
  test("normal path is made absolute", () => {
    const result = resolveBufferPath("/tmp/notes/note.md")
    expect(result).toBe(path.resolve("/tmp/notes/note.md"))
  })

  test("relative path goes through the host expansion", () => {
    const toAbsolute = vi.fn((name: string) => `/home/me/notes/${name}`)

    expect(resolveBufferPath("note.md", toAbsolute)).toBe("/home/me/notes/note.md")
    expect(toAbsolute).toHaveBeenCalledWith("note.md")
  })

  test("strips oil:// prefix", () => {
    expect(resolveBufferPath("oil:///Users/foo/notes/")).toBe("/Users/foo/notes/")
  })

  test("strips fugitive:// prefix", () => {
    expect(resolveBufferPath("fugitive:///Users/foo/.git//abc/f.md")).toBe(
      "/Users/foo/.git//abc/f.md"
    )
  })

  test("strips generic scheme://", () => {
    expect(resolveBufferPath("zipfile:///tmp/file.md")).toBe("/tmp/file.md")
  })

  test("accepts digits and + . - in the scheme", () => {
    expect(resolveBufferPath("git+v2.x-fs:///srv/notes/a.md")).toBe("/srv/notes/a.md")
  })

  test("does not expand stripped paths", () => {
    const toAbsolute = vi.fn((name: string) => name)

    resolveBufferPath("oil:///Users/foo/notes/", toAbsolute)
    expect(toAbsolute).not.toHaveBeenCalled()
  })

  test("rejects remote scp://", () => {
    expect(resolveBufferPath("scp://host/path/file.md")).toBeNull()
  })

  test("rejects oil-ssh://", () => {
    expect(resolveBufferPath("oil-ssh://host/notes/")).toBeNull()
  })

  test("empty buffer name returns null", () => {
    expect(resolveBufferPath("")).toBeNull()
  })

  test("scheme must start with a letter", () => {
    const toAbsolute = vi.fn((name: string) => `/cwd/${name}`)

    expect(resolveBufferPath("1abc:///tmp/x.md", toAbsolute)).toBe("/cwd/1abc:///tmp/x.md")
  })
})
