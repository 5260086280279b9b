// Error types shared by the zkmake packages.
// `message` is safe to show to the user as is.

/**
 * Configuration did not match the schema.
 */
export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid zkmake configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
    this.issues = issues
  }
}

/**
 * The notebook command exited with an error or could not be started.
 */
export class NotebookCommandError extends Error {
  readonly args: readonly string[]
  readonly exitCode: number | null
  readonly stderr: string

  constructor(
    args: readonly string[],
    exitCode: number | null,
    stderr: string,
    options?: { cause?: unknown }
  ) {
    const detail = stderr.trim().split("\n")[0] || `exit code ${exitCode ?? "unknown"}`
    super(`zk ${args[0] ?? ""} failed: ${detail}`, options)
    this.name = "NotebookCommandError"
    this.args = args
    this.exitCode = exitCode
    this.stderr = stderr
  }

  /**
   * Wrap an error thrown by a command runner, keeping its exit code and stderr.
   */
  static from(args: readonly string[], err: unknown): NotebookCommandError {
    if (err instanceof NotebookCommandError) return err

    let exitCode: number | null = null
    let stderr = ""
    if (typeof err === "object" && err !== null) {
      if ("code" in err && typeof err.code === "number") {
        exitCode = err.code
      }
      if ("stderr" in err && typeof err.stderr === "string") {
        stderr = err.stderr
      }
    }
    if (!stderr && err instanceof Error) {
      stderr = err.message
    }

    return new NotebookCommandError(args, exitCode, stderr, { cause: err })
  }
}

/**
 * The notebook command succeeded but printed something we cannot use.
 */
export class NotebookOutputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "NotebookOutputError"
  }
}
