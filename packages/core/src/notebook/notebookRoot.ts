import * as fs from "node:fs/promises"
import * as path from "node:path"

/** Directory that marks the root of a zk notebook */
export const NOTEBOOK_MARKER = ".zk"

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    const st = await fs.stat(candidate)
    return st.isDirectory()
  } catch {
    return false
  }
}

/**
 * Find the notebook containing `target` by walking up until a directory
 * holds a `.zk` directory.
 *
 * `target` may be a file, a directory, or a path that does not exist yet.
 * @returns The notebook root, or null when no ancestor is a notebook
 */
export async function findNotebookRoot(target: string): Promise<string | null> {
  let dir = path.resolve(target)
  if (!(await isDirectory(dir))) {
    dir = path.dirname(dir)
  }

  for (;;) {
    if (await isDirectory(path.join(dir, NOTEBOOK_MARKER))) {
      return dir
    }
    const parent = path.dirname(dir)
    if (parent === dir) return null
    dir = parent
  }
}
