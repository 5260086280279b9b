// Notebook service backed by the `zk` command line tool.
// zk owns note templates, IDs and layout; we only ask it to list and create.

import { execFile } from "node:child_process"
import * as path from "node:path"
import { promisify } from "node:util"
import { z } from "zod"

import { NotebookCommandError, NotebookOutputError } from "../errors.js"
import { findNotebookRoot } from "./notebookRoot.js"
import type {
  CreateNoteOptions,
  CreatedNote,
  ListNotesQuery,
  NoteField,
  NoteSummary,
  NotebookService,
} from "./types.js"

export interface CommandResult {
  stdout: string
  stderr: string
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: { cwd: string }
) => Promise<CommandResult>

const execFileAsync = promisify(execFile)

/**
 * Run a command without a shell and collect its output.
 */
export const execFileRunner: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    cwd: options.cwd,
    encoding: "utf8",
    maxBuffer: 16 * 1024 * 1024,
  })
  return { stdout, stderr }
}

/**
 * Schema for `zk list --format json` output. Selected fields must be
 * present; the others fall back to an empty string.
 */
function noteListSchema(select: readonly NoteField[]) {
  const field = (name: NoteField) =>
    select.includes(name) ? z.string() : z.string().default("")

  return z.array(
    z.object({
      title: field("title"),
      absPath: field("absPath"),
    })
  )
}

export interface ZkCliNotebookOptions {
  /** zk executable, defaults to `zk` on PATH */
  executable?: string
  runner?: CommandRunner
}

export class ZkCliNotebook implements NotebookService {
  private readonly executable: string
  private readonly runner: CommandRunner

  constructor(options: ZkCliNotebookOptions = {}) {
    this.executable = options.executable ?? "zk"
    this.runner = options.runner ?? execFileRunner
  }

  notebookRoot(target: string): Promise<string | null> {
    return findNotebookRoot(target)
  }

  async listNotes(
    notebookPath: string,
    query: ListNotesQuery
  ): Promise<NoteSummary[]> {
    if (query.hrefs.length === 0) return []

    const { stdout } = await this.run(notebookPath, [
      "list",
      "--notebook-dir",
      notebookPath,
      "--format",
      "json",
      "--quiet",
      "--no-pager",
      "--no-input",
      "--",
      ...query.hrefs,
    ])

    const output = stdout.trim()
    if (output === "") return []

    let raw: unknown
    try {
      raw = JSON.parse(output)
    } catch (err) {
      throw new NotebookOutputError("zk list printed invalid JSON", { cause: err })
    }

    const parsed = noteListSchema(query.select).safeParse(raw)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue ? issue.path.join(".") : ""
      throw new NotebookOutputError(
        `zk list printed unexpected notes${where ? ` (at ${where})` : ""}`,
        { cause: parsed.error }
      )
    }
    return parsed.data
  }

  async createNote(
    notebookPath: string,
    options: CreateNoteOptions
  ): Promise<CreatedNote | null> {
    const args = [
      "new",
      "--notebook-dir",
      notebookPath,
      "--no-input",
      "--print-path",
      "--title",
      options.title,
    ]
    if (options.group) args.push("--group", options.group)
    if (options.template) args.push("--template", options.template)
    if (options.date) args.push("--date", options.date)

    const extra = Object.entries(options.extra ?? {})
    if (extra.length > 0) {
      args.push("--extra", extra.map(([key, value]) => `${key}=${value}`).join(","))
    }
    if (options.dir) args.push(options.dir)

    const { stdout } = await this.run(notebookPath, args)

    // zk may print template output before the path; the path is the last line
    const printed = stdout.trim().split("\n").pop()?.trim() ?? ""
    if (printed === "") return null

    return { path: path.resolve(notebookPath, printed) }
  }

  private async run(cwd: string, args: string[]): Promise<CommandResult> {
    try {
      return await this.runner(this.executable, args, { cwd })
    } catch (err) {
      throw NotebookCommandError.from(args, err)
    }
  }
}
