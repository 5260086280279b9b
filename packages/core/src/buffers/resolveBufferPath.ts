// Buffer name normalization.
//
// Editor buffers are not always real files: overlay plugins name them
// `scheme://...` (oil://, fugitive://, zipfile://). A scheme wrapping an
// absolute local path is stripped; one wrapping a host name is rejected.

import * as path from "node:path"

/**
 * Generic URI scheme prefix: a letter, then letters, digits, `+`, `.` or `-`,
 * then `://`. Group 1 is the remainder.
 */
export const SCHEME_PREFIX_REGEX = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/(.*)$/s

/**
 * Resolve a buffer name to an absolute filesystem path.
 *
 * No I/O: the path is not checked for existence.
 *
 * @param bufferName The editor's name for the buffer
 * @param toAbsolute Expands a plain path; hosts pass their own expansion
 * @returns The path, or null when the buffer has no usable local path
 */
export function resolveBufferPath(
  bufferName: string,
  toAbsolute: (name: string) => string = path.resolve
): string | null {
  if (bufferName === "") return null

  const match = SCHEME_PREFIX_REGEX.exec(bufferName)
  if (match) {
    const remainder = match[1] ?? ""
    return remainder.startsWith("/") ? remainder : null
  }

  return toAbsolute(bufferName)
}
