// Firmware version strings -- normalization and embedded build info.
//
// A firmware version is four '/'-separated components (AP/CSC/CP/bootloader).
// The last 6 characters of the first component ("pda") encode the bootloader
// class, build year, month and revision.

import {FUSCatalogError} from "../errors.js"

const REVISION_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ"
const BASE_YEAR = 2018

// -- Types

export interface FirmwareBuildInfo {
  classCode: string | null  // e.g. "U1"; null for the suffix form
  index: number | null
  year: number
  month: number             // 0-based
  revision: number
}

export interface FirmwareBuildSummary {
  bl: string | null
  date: string              // "<year>.<month>"
  it: string                // "<index>.<revision>"
}

// -- Normalization

// "A/B/C" -> "A/B/C/A", "A/B/" -> "A/B/A/A".
export function normalizeFirmware(firmware: string): string {
  if (!firmware) throw new FUSCatalogError("UNPARSEABLE", "Invalid firmware format: empty version")
  const parts = firmware.split("/").map(p => p.trim())
  if (parts.length !== 3 && parts.length !== 4) {
    throw new FUSCatalogError("UNPARSEABLE", "Invalid firmware format: " + firmware)
  }
  if (parts.length === 3) parts.push(parts[0])
  if (parts[2] === "") parts[2] = parts[0]
  return parts.join("/")
}

export function countSeparators(s: string): number {
  let n = 0
  for (const c of s) if (c === "/") n++
  return n
}

// -- Build info

export function readFirmwareBuild(firmware: string): FirmwareBuildInfo {
  if (countSeparators(firmware) !== 3) {
    throw new FUSCatalogError("UNPARSEABLE", "Invalid firmware format: " + firmware)
  }
  const pda = firmware.split("/")[0].slice(-6)
  if (pda.length < 6) throw new FUSCatalogError("UNPARSEABLE", "Firmware build code too short: " + pda)
  if (pda[0] === "U" || pda[0] === "S") {
    return {
      classCode: pda.slice(0, 2),
      index: offset(pda[2], "A"),
      year: offset(pda[3], "R") + BASE_YEAR,
      month: offset(pda[4], "A"),
      revision: revisionIndex(pda[5])
    }
  }
  return {
    classCode: null,
    index: null,
    year: offset(pda[pda.length - 3], "R") + BASE_YEAR,
    month: offset(pda[pda.length - 2], "A"),
    revision: revisionIndex(pda[pda.length - 1])
  }
}

export function summarizeBuild(info: FirmwareBuildInfo): FirmwareBuildSummary {
  return {
    bl: info.classCode,
    date: `${info.year}.${info.month}`,
    it: `${info.index}.${info.revision}`
  }
}

export function readFirmwareSummary(firmware: string): FirmwareBuildSummary {
  return summarizeBuild(readFirmwareBuild(firmware))
}

// -- Internal

function offset(c: string, base: string): number {
  return c.charCodeAt(0) - base.charCodeAt(0)
}

function revisionIndex(c: string): number {
  const i = REVISION_ALPHABET.indexOf(c)
  if (i < 0) throw new FUSCatalogError("UNPARSEABLE", "Invalid revision character: " + c)
  return i
}
