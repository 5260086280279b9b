// Command to create or open the zk note named by the [[wikilink]] under the cursor.

import * as vscode from "vscode"
import * as path from "node:path"
import {
  MESSAGE_PREFIX,
  ZkCliNotebook,
  findHeadingLine,
  makeNote,
  parseConfig,
  type EditorHost,
  type NotifyLevel,
} from "@zkmake/core"

/**
 * Buffer name for a document. Non-file documents keep their scheme so the
 * core resolver can tell overlays (git:///...) from remotes (vscode-remote://host/...).
 */
function documentBufferName(document: vscode.TextDocument): string {
  if (document.isUntitled) return ""
  const { uri } = document
  if (uri.scheme === "file") return uri.fsPath
  return `${uri.scheme}://${uri.authority}${uri.path}`
}

class VsCodeEditorHost implements EditorHost {
  constructor(private readonly editor: vscode.TextEditor) {}

  private activeEditor(): vscode.TextEditor {
    return vscode.window.activeTextEditor ?? this.editor
  }

  bufferName(): string {
    return documentBufferName(this.activeEditor().document)
  }

  absolutePath(name: string): string {
    const root = vscode.workspace.workspaceFolders?.[0]?.uri.fsPath ?? process.cwd()
    return path.resolve(root, name)
  }

  currentLine(): string {
    return this.editor.document.lineAt(this.editor.selection.active.line).text
  }

  cursorColumn(): number {
    return this.editor.selection.active.character + 1
  }

  async openFile(filePath: string): Promise<void> {
    const doc = await vscode.workspace.openTextDocument(vscode.Uri.file(filePath))
    await vscode.window.showTextDocument(doc, { preview: false })
  }

  async revealHeading(heading: string): Promise<void> {
    const editor = this.activeEditor()
    const lines = editor.document.getText().split(/\r?\n/)
    const index = findHeadingLine(lines, heading)
    if (index === null) return

    const position = new vscode.Position(index, 0)
    editor.selection = new vscode.Selection(position, position)
    editor.revealRange(
      new vscode.Range(position, position),
      vscode.TextEditorRevealType.InCenter
    )
  }

  notify(message: string, level: NotifyLevel): void {
    switch (level) {
      case "error":
        void vscode.window.showErrorMessage(message)
        break
      case "warn":
        void vscode.window.showWarningMessage(message)
        break
      case "info":
        void vscode.window.showInformationMessage(message)
        break
    }
  }
}

export async function makeNoteUnderCursor(): Promise<void> {
  const editor = vscode.window.activeTextEditor
  if (!editor) {
    void vscode.window.showWarningMessage(`${MESSAGE_PREFIX}no active editor`)
    return
  }

  try {
    // Settings are read per invocation so changes apply without reloading
    const settings = vscode.workspace.getConfiguration("zkmake")
    const config = parseConfig({
      onExisting: settings.get<string>("onExisting", "edit"),
      newNoteOptions: settings.get<Record<string, unknown>>("newNoteOptions", {}),
    })
    const notebook = new ZkCliNotebook({
      executable: settings.get<string>("zkPath", "zk"),
    })

    await makeNote({ host: new VsCodeEditorHost(editor), notebook, config })
  } catch (err) {
    console.error("zkmake: make note failed:", err)
    const message = err instanceof Error ? err.message : String(err)
    await vscode.window.showErrorMessage(MESSAGE_PREFIX + message)
  }
}

export function registerMakeNoteCommand(
  context: vscode.ExtensionContext
): void {
  const disposable = vscode.commands.registerCommand(
    "zkmake.makeNote",
    makeNoteUnderCursor
  )
  context.subscriptions.push(disposable)
}
