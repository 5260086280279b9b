import type { NewNoteOptions } from "../config/config.js"

/** Note fields a listing can select */
export type NoteField = "title" | "absPath"

/**
 * A note as returned by a listing.
 */
export interface NoteSummary {
  title: string
  /** Absolute path of the note file */
  absPath: string
}

export interface ListNotesQuery {
  select: NoteField[]
  /** Notes to match, by href (title or path) */
  hrefs: string[]
}

export type CreateNoteOptions = NewNoteOptions & {
  title: string
  edit: boolean
}

export interface CreatedNote {
  path: string
}

/**
 * The notebook manager that owns note layout and templates.
 * A rejected promise is a failed operation.
 */
export interface NotebookService {
  /** Root of the notebook containing `path`, or null outside any notebook */
  notebookRoot(path: string): Promise<string | null>
  listNotes(notebookPath: string, query: ListNotesQuery): Promise<NoteSummary[]>
  /** Resolves to null when the note was created but no path was reported */
  createNote(
    notebookPath: string,
    options: CreateNoteOptions
  ): Promise<CreatedNote | null>
}
