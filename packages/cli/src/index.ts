export { runMakeNote, parseExtra, exitCodeFor } from "./make-note.js"
export type { MakeNoteCliOptions, MakeNoteCliResult } from "./make-note.js"

export { TerminalHost, expandPath } from "./terminal-host.js"
export type { LogLine } from "./terminal-host.js"
