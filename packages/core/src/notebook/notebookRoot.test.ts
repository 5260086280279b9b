import { describe, expect, test } from "vitest"
import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"

import { findNotebookRoot } from "./notebookRoot.js"

async function makeNotebook(): Promise<string> {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "zkmake-"))
  const notebook = path.join(tmp, "notebook")
  await fs.mkdir(path.join(notebook, ".zk"), { recursive: true })
  await fs.mkdir(path.join(notebook, "journal", "2026"), { recursive: true })
  await fs.writeFile(path.join(notebook, "index.md"), "# Index\n")
  return tmp
}

describe("findNotebookRoot", () => {
  test("finds the notebook from a file at its root", async () => {
    const tmp = await makeNotebook()
    const root = path.join(tmp, "notebook")

    expect(await findNotebookRoot(path.join(root, "index.md"))).toBe(root)
  })

  test("finds the notebook from a nested directory", async () => {
    const tmp = await makeNotebook()
    const root = path.join(tmp, "notebook")

    expect(await findNotebookRoot(path.join(root, "journal", "2026"))).toBe(root)
  })

  test("accepts a file that does not exist yet", async () => {
    const tmp = await makeNotebook()
    const root = path.join(tmp, "notebook")

    expect(await findNotebookRoot(path.join(root, "journal", "new.md"))).toBe(root)
  })

  test("returns null outside any notebook", async () => {
    const tmp = await makeNotebook()
    const outside = path.join(tmp, "elsewhere")
    await fs.mkdir(outside)

    expect(await findNotebookRoot(path.join(outside, "note.md"))).toBeNull()
  })

  test("ignores a .zk file", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "zkmake-"))
    await fs.writeFile(path.join(tmp, ".zk"), "")

    expect(await findNotebookRoot(path.join(tmp, "note.md"))).toBeNull()
  })
})
