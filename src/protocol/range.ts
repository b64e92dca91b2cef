// Byte ranges, remote paths and attachment names for firmware downloads.

import {FUSRangeError} from "../errors.js"

export const CIPHER_BLOCK_SIZE = 16

export interface DownloadRange {
  start: number
  end: number  // inclusive; 0 = open-ended
}

export const INVALID_RANGE: DownloadRange = {start: -1, end: -1}

// "bytes=0-100" -> {0, 100}, "bytes=50-" -> {50, 0}, no '-' -> {-1, -1}.
export function parseRangeHeader(header: string): DownloadRange {
  let value = header.trim()
  if (value.startsWith("bytes=")) value = value.slice("bytes=".length)
  const dash = value.indexOf("-")
  if (dash < 0) return INVALID_RANGE
  const start = parseOffset(value.slice(0, dash))
  const end = parseOffset(value.slice(dash + 1))
  if (start < 0 || end < 0) return INVALID_RANGE
  return {start, end}
}

// Decryption has to run to the end of the file: a bounded end is rejected.
export function validateRange(header: string | null | undefined, decrypt: boolean): DownloadRange {
  const range = parseRangeHeader(header ?? "bytes=0-")
  if (range.start === -1 || range.end === -1 || (decrypt && range.end !== 0)) {
    throw new FUSRangeError("INVALID", header ?? undefined)
  }
  return range
}

// Start offset rounded down to a cipher block boundary.
export function alignToBlock(start: number): number {
  return start - (start % CIPHER_BLOCK_SIZE)
}

// Joins path fragments into "/a/b/c", collapsing separators and blanks.
export function joinPath(...parts: (string | null | undefined)[]): string {
  const segments: string[] = []
  for (const p of parts) {
    if (!p) continue
    for (const s of p.split(/[/\\\s]+/)) if (s) segments.push(s)
  }
  return "/" + segments.join("/")
}

export function fileNameOf(path: string): string {
  const parts = path.split("/")
  return parts[parts.length - 1]
}

export function attachmentName(filename: string, decrypt: boolean, customName?: string | null): string {
  if (customName) return stripSuffix(customName, ".zip") + ".zip"
  return decrypt ? filename.replace(".enc4", "").replace(".enc2", "") : filename
}

export function contentDisposition(name: string): string {
  return `attachment; filename="${name.replace(/["\\]/g, "_")}"`
}

// -- Internal

function parseOffset(s: string): number {
  const t = s.trim()
  if (t === "") return 0
  return /^\d+$/.test(t) ? Number(t) : -1
}

function stripSuffix(s: string, suffix: string): string {
  return s.endsWith(suffix) ? s.slice(0, -suffix.length) : s
}
