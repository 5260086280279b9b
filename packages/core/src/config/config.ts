import { z } from "zod"

import { ConfigError } from "../errors.js"

/**
 * Runtime validation of zkmake settings.
 *
 * Hosts read raw values (VS Code settings, CLI flags) and pass them through
 * `parseConfig()`, which fills in defaults. The result is passed to
 * `makeNote()` on every call; nothing holds it globally.
 */

/** What to do when the note under the cursor already exists */
export const OnExistingSchema = z.enum(["edit", "warn", "nothing"])

export type OnExistingPolicy = z.infer<typeof OnExistingSchema>

/**
 * Options forwarded to note creation, on top of the title.
 */
export const NewNoteOptionsSchema = z
  .object({
    /** Open the created note (default true) */
    edit: z.boolean().optional(),
    /** Notebook subdirectory for the new note */
    dir: z.string().min(1).optional(),
    /** Note group from the notebook config */
    group: z.string().min(1).optional(),
    /** Template file name */
    template: z.string().min(1).optional(),
    /** Natural-language date for the note, e.g. "yesterday" */
    date: z.string().min(1).optional(),
    /** Extra template variables */
    extra: z.record(z.string()).optional(),
  })
  .strict()

export type NewNoteOptions = z.infer<typeof NewNoteOptionsSchema>

export const ZkMakeConfigSchema = z
  .object({
    onExisting: OnExistingSchema.default("edit"),
    newNoteOptions: NewNoteOptionsSchema.default({}),
  })
  .strict()

export type ZkMakeConfig = Readonly<z.output<typeof ZkMakeConfigSchema>>

/**
 * Validate raw settings and apply defaults.
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(raw: unknown = {}): ZkMakeConfig {
  const result = ZkMakeConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)"
      return `${where}: ${issue.message}`
    })
    throw new ConfigError(issues)
  }
  return Object.freeze(result.data)
}

export const DEFAULT_CONFIG: ZkMakeConfig = parseConfig()
