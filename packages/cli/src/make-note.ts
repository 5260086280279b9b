import * as fs from "node:fs/promises"

import {
  ZkCliNotebook,
  makeNote,
  parseConfig,
  resolveBufferPath,
  type MakeNoteOutcome,
  type NotebookService,
} from "@zkmake/core"
import { TerminalHost, expandPath, type LogLine } from "./terminal-host.js"

export type MakeNoteCliOptions = {
  /** Buffer name as the editor knows it */
  file: string
  /** 1-based line of the cursor */
  line: number
  /** 1-based column of the cursor */
  column: number
  /** Line text; read from `file` when omitted */
  text?: string
  onExisting?: string
  dir?: string
  group?: string
  template?: string
  date?: string
  extra?: Record<string, string>
  /** zk executable */
  zk?: string
  cwd?: string
  notebook?: NotebookService
  log?: LogLine
}

export type MakeNoteCliResult = {
  outcome: MakeNoteOutcome
  /** `path` or `path:line` for the editor to open */
  target: string | null
}

/**
 * Parse repeated `key=value` arguments into a record.
 */
export function parseExtra(pairs: readonly string[]): Record<string, string> {
  const extra: Record<string, string> = {}
  for (const pair of pairs) {
    const eq = pair.indexOf("=")
    if (eq <= 0) {
      throw new Error(`Invalid --extra value "${pair}", expected key=value`)
    }
    extra[pair.slice(0, eq)] = pair.slice(eq + 1)
  }
  return extra
}

export function exitCodeFor(outcome: MakeNoteOutcome): number {
  switch (outcome.kind) {
    case "opened-existing":
    case "exists":
    case "created":
      return 0
    default:
      return 1
  }
}

async function readLine(filePath: string | null, line: number): Promise<string> {
  if (filePath === null) return ""
  const content = await fs.readFile(filePath, "utf8")
  return content.split(/\r?\n/)[line - 1] ?? ""
}

export async function runMakeNote(
  options: MakeNoteCliOptions
): Promise<MakeNoteCliResult> {
  const newNoteOptions: Record<string, unknown> = {}
  if (options.dir !== undefined) newNoteOptions.dir = options.dir
  if (options.group !== undefined) newNoteOptions.group = options.group
  if (options.template !== undefined) newNoteOptions.template = options.template
  if (options.date !== undefined) newNoteOptions.date = options.date
  if (options.extra !== undefined) newNoteOptions.extra = options.extra

  const config = parseConfig({
    ...(options.onExisting !== undefined ? { onExisting: options.onExisting } : {}),
    newNoteOptions,
  })

  const cwd = options.cwd ?? process.cwd()
  const log = options.log ?? ((line: string) => console.error(line))

  const readable = resolveBufferPath(options.file, (name) => expandPath(name, cwd))
  const text = options.text ?? (await readLine(readable, options.line))
  const host = new TerminalHost(options.file, text, options.column, cwd, log)

  const notebook =
    options.notebook ??
    new ZkCliNotebook(options.zk !== undefined ? { executable: options.zk } : {})

  const outcome = await makeNote({ host, notebook, config })
  return { outcome, target: host.openTarget() }
}
