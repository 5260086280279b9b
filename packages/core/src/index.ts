export * from "./wikilinks/index.js"

export { resolveBufferPath, SCHEME_PREFIX_REGEX } from "./buffers/resolveBufferPath.js"

export {
  DEFAULT_CONFIG,
  NewNoteOptionsSchema,
  OnExistingSchema,
  ZkMakeConfigSchema,
  parseConfig,
  type NewNoteOptions,
  type OnExistingPolicy,
  type ZkMakeConfig,
} from "./config/config.js"

export { ConfigError, NotebookCommandError, NotebookOutputError } from "./errors.js"

export { NOTEBOOK_MARKER, findNotebookRoot } from "./notebook/notebookRoot.js"
export {
  ZkCliNotebook,
  execFileRunner,
  type CommandResult,
  type CommandRunner,
  type ZkCliNotebookOptions,
} from "./notebook/zkCli.js"
export type {
  CreateNoteOptions,
  CreatedNote,
  ListNotesQuery,
  NoteField,
  NoteSummary,
  NotebookService,
} from "./notebook/types.js"

export {
  MESSAGE_PREFIX,
  makeNote,
  type EditorHost,
  type MakeNoteOptions,
  type MakeNoteOutcome,
  type MakeNoteStage,
  type NotifyLevel,
} from "./notes/makeNote.js"
