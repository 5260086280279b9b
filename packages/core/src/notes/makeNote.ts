// Create or open the note named by the [[wikilink]] under the cursor.

import { resolveBufferPath } from "../buffers/resolveBufferPath.js"
import { DEFAULT_CONFIG, type ZkMakeConfig } from "../config/config.js"
import type {
  CreateNoteOptions,
  CreatedNote,
  NoteSummary,
  NotebookService,
} from "../notebook/types.js"
import { parseWikilink } from "../wikilinks/patterns.js"
import { wikilinkAtCursor } from "../wikilinks/span.js"

export const MESSAGE_PREFIX = "ZkMake: "

export type NotifyLevel = "info" | "warn" | "error"

/**
 * What makeNote needs from the editor it runs in.
 */
export interface EditorHost {
  /** Name of the current buffer, possibly `scheme://...` or empty */
  bufferName(): string
  /** Absolute form of a plain buffer name */
  absolutePath(name: string): string
  currentLine(): string
  /** 1-based cursor column on the current line */
  cursorColumn(): number
  openFile(filePath: string): Promise<void>
  /** Move the cursor to the heading in the open file, if present */
  revealHeading(heading: string): Promise<void>
  notify(message: string, level: NotifyLevel): void
}

export type MakeNoteStage = "root" | "list" | "create"

export type MakeNoteOutcome =
  | { kind: "unresolved-buffer" }
  | { kind: "outside-notebook"; bufferPath: string }
  | { kind: "no-wikilink"; bufferPath: string }
  | { kind: "opened-existing"; path: string; heading: string | null }
  | { kind: "exists"; path: string }
  | { kind: "created"; path: string | null }
  | { kind: "failed"; stage: MakeNoteStage; message: string }

export type MakeNoteOptions = {
  host: EditorHost
  notebook: NotebookService
  config?: ZkMakeConfig
}

function fail(
  host: EditorHost,
  stage: MakeNoteStage,
  err: unknown
): MakeNoteOutcome {
  const message = err instanceof Error ? err.message : String(err)
  host.notify(MESSAGE_PREFIX + message, "error")
  return { kind: "failed", stage, message }
}

/**
 * Look up the note for the wikilink under the cursor and open it, or ask
 * the notebook to create it.
 *
 * Notebook failures are reported through `host.notify` and the returned
 * outcome; failures of the host itself (opening a file) propagate.
 */
export async function makeNote(options: MakeNoteOptions): Promise<MakeNoteOutcome> {
  const { host, notebook } = options
  const config = options.config ?? DEFAULT_CONFIG

  const bufferPath = resolveBufferPath(host.bufferName(), (name) =>
    host.absolutePath(name)
  )
  if (!bufferPath) {
    host.notify(`${MESSAGE_PREFIX}cannot resolve buffer path`, "warn")
    return { kind: "unresolved-buffer" }
  }

  let notebookPath: string | null
  try {
    notebookPath = await notebook.notebookRoot(bufferPath)
  } catch (err) {
    return fail(host, "root", err)
  }
  if (!notebookPath) {
    host.notify(`${MESSAGE_PREFIX}not inside a zk notebook`, "warn")
    return { kind: "outside-notebook", bufferPath }
  }

  const raw = wikilinkAtCursor(host.currentLine(), host.cursorColumn())
  const link = raw ? parseWikilink(raw) : null
  if (!link || link.title === "") {
    host.notify(`${MESSAGE_PREFIX}cursor is not inside a [[wikilink]]`, "warn")
    return { kind: "no-wikilink", bufferPath }
  }

  let notes: NoteSummary[]
  try {
    notes = await notebook.listNotes(notebookPath, {
      select: ["title", "absPath"],
      hrefs: [link.title],
    })
  } catch (err) {
    return fail(host, "list", err)
  }

  const existing = notes[0]
  if (existing) {
    switch (config.onExisting) {
      case "edit":
        await host.openFile(existing.absPath)
        if (link.heading) {
          await host.revealHeading(link.heading)
        }
        return { kind: "opened-existing", path: existing.absPath, heading: link.heading }
      case "warn":
        host.notify(`${MESSAGE_PREFIX}note already exists: ${existing.absPath}`, "info")
        return { kind: "exists", path: existing.absPath }
      case "nothing":
        return { kind: "exists", path: existing.absPath }
    }
  }

  const { edit = true, ...newNoteOptions } = config.newNoteOptions
  const createOptions: CreateNoteOptions = {
    ...newNoteOptions,
    title: link.title,
    edit,
  }

  let created: CreatedNote | null
  try {
    created = await notebook.createNote(notebookPath, createOptions)
  } catch (err) {
    return fail(host, "create", err)
  }
  if (!created) {
    return { kind: "created", path: null }
  }

  // The notebook may already have opened the note in this buffer
  if (createOptions.edit && !host.bufferName().includes(created.path)) {
    await host.openFile(created.path)
  }
  return { kind: "created", path: created.path }
}
