import { describe, expect, test } from "vitest"
import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"

import { TerminalHost, expandPath } from "./terminal-host.js"

describe("expandPath", () => {
  test("expands the home directory", () => {
    expect(expandPath("~/notes/a.md", "/work")).toBe(path.join(os.homedir(), "notes", "a.md"))
  })

  test("resolves relative paths against cwd", () => {
    expect(expandPath("notes/a.md", "/work")).toBe(path.resolve("/work", "notes/a.md"))
  })
})

describe("TerminalHost", () => {
  test("has no target until a file is opened", () => {
    const host = new TerminalHost("a.md", "", 1, "/work", () => {})
    expect(host.openTarget()).toBeNull()
  })

  test("keeps the bare path when the heading is missing", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "zkmake-host-"))
    const note = path.join(tmp, "note.md")
    await fs.writeFile(note, "# Note\n\ntext\n")
    const host = new TerminalHost("a.md", "", 1, tmp, () => {})

    await host.openFile(note)
    await host.revealHeading("Elsewhere")

    expect(host.openTarget()).toBe(note)
  })

  test("formats notifications with their level", () => {
    const lines: string[] = []
    const host = new TerminalHost("a.md", "", 1, "/work", (line) => void lines.push(line))

    host.notify("ZkMake: something", "error")

    expect(lines).toEqual(["error: ZkMake: something"])
  })
})
