// EditorHost for terminal editors: instead of opening files it remembers the
// target so the caller can print it as `path` or `path:line`.

import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"

import { findHeadingLine, type EditorHost, type NotifyLevel } from "@zkmake/core"

export type LogLine = (line: string) => void

/**
 * Expand `~` and make a path absolute against `cwd`.
 */
export function expandPath(name: string, cwd: string): string {
  if (name === "~" || name.startsWith("~/")) {
    return path.join(os.homedir(), name.slice(1))
  }
  return path.resolve(cwd, name)
}

export class TerminalHost implements EditorHost {
  private target: { path: string; line: number | null } | null = null

  constructor(
    private readonly file: string,
    private readonly lineText: string,
    private readonly column: number,
    private readonly cwd: string,
    private readonly log: LogLine
  ) {}

  bufferName(): string {
    return this.file
  }

  absolutePath(name: string): string {
    return expandPath(name, this.cwd)
  }

  currentLine(): string {
    return this.lineText
  }

  cursorColumn(): number {
    return this.column
  }

  async openFile(filePath: string): Promise<void> {
    this.target = { path: filePath, line: null }
  }

  async revealHeading(heading: string): Promise<void> {
    const target = this.target
    if (!target) return

    const content = await fs.readFile(target.path, "utf8")
    const index = findHeadingLine(content.split(/\r?\n/), heading)
    if (index !== null) {
      target.line = index + 1
    }
  }

  notify(message: string, level: NotifyLevel): void {
    this.log(`${level}: ${message}`)
  }

  /**
   * The file to open, with a 1-based line when a heading was found.
   */
  openTarget(): string | null {
    if (!this.target) return null
    return this.target.line === null
      ? this.target.path
      : `${this.target.path}:${this.target.line}`
  }
}
