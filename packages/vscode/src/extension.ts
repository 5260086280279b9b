import type * as vscode from "vscode"

import { registerMakeNoteCommand } from "./commands/makeNoteUnderCursor"

export function activate(context: vscode.ExtensionContext): void {
  registerMakeNoteCommand(context)
}

export function deactivate(): void {
  // Nothing to clean up; the command is disposed through context.subscriptions
}
