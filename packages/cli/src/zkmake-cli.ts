#!/usr/bin/env -S npx tsx
/**
 * zkmake CLI entrypoint
 *
 * Prints the note to open for the [[wikilink]] at a cursor position, as
 * `path` or `path:line`, creating the note with zk when it does not exist.
 */

import { parseArgs } from "node:util"
import { exitCodeFor, parseExtra, runMakeNote, type MakeNoteCliOptions } from "./make-note.js"

function showHelp(): void {
  console.log(`
zkmake - Create or navigate to the zk note under a [[wikilink]]

Usage:
  zkmake <file> --line <n> --column <n> [options]

Options:
  -l, --line <n>                     1-based cursor line
  -c, --column <n>                   1-based cursor column
  --text <line>                      Line text (default: read from <file>)
  --on-existing <edit|warn|nothing>  When the note exists (default: edit)
  --dir <dir>                        Notebook directory for new notes
  --group <name>                     Note group for new notes
  --template <file>                  Template for new notes
  --date <date>                      Date for new notes
  --extra <key=value>                Extra template variable (repeatable)
  --zk <path>                        zk executable (default: $ZKMAKE_ZK_BIN or zk)

Examples:
  zkmake notes/index.md --line 12 --column 8
  zkmake oil:///home/me/notes/ -l 1 -c 4 --text "see [[new idea]]" --dir inbox
`)
}

function parsePosition(name: string, value: string | undefined): number {
  const n = Number(value)
  if (value === undefined || !Number.isInteger(n) || n < 1) {
    throw new Error(`--${name} must be a positive integer`)
  }
  return n
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      line: { type: "string", short: "l" },
      column: { type: "string", short: "c" },
      text: { type: "string" },
      "on-existing": { type: "string" },
      dir: { type: "string" },
      group: { type: "string" },
      template: { type: "string" },
      date: { type: "string" },
      extra: { type: "string", multiple: true },
      zk: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  })

  const file = positionals[0]
  if (values.help || !file) {
    showHelp()
    return values.help ? 0 : 1
  }

  const options: MakeNoteCliOptions = {
    file,
    line: parsePosition("line", values.line),
    column: parsePosition("column", values.column),
  }
  if (values.text !== undefined) options.text = values.text
  if (values["on-existing"] !== undefined) options.onExisting = values["on-existing"]
  if (values.dir !== undefined) options.dir = values.dir
  if (values.group !== undefined) options.group = values.group
  if (values.template !== undefined) options.template = values.template
  if (values.date !== undefined) options.date = values.date
  if (values.extra !== undefined) options.extra = parseExtra(values.extra)

  const zk = values.zk ?? process.env.ZKMAKE_ZK_BIN
  if (zk) options.zk = zk

  const { outcome, target } = await runMakeNote(options)
  if (target) {
    console.log(target)
  }
  return exitCodeFor(outcome)
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err)
    console.error(`error: ${message}`)
    process.exit(1)
  }
)
