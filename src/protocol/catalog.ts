// Firmware version manifest (version.xml) parsing.
//
//   versioninfo > firmware > version > latest          -- current firmware
//   versioninfo > firmware > version > upgrade > value -- zero or more alternates
//
// A single <value> and a list of them both decode to an array.

import {XMLParser} from "fast-xml-parser"
import {FUSCatalogError} from "../errors.js"
import {child, textOf} from "./messages.js"
import {countSeparators, normalizeFirmware} from "./version.js"

const UPGRADE_VALUE_PATH = "versioninfo.firmware.version.upgrade.value"

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (_name, jPath) => jPath === UPGRADE_VALUE_PATH
})

export interface FirmwareManifest {
  latest: string
  alternates: string[]
}

export function decodeVersionManifest(xml: string): FirmwareManifest {
  let doc: unknown
  try {
    doc = parser.parse(xml)
  } catch {
    throw new FUSCatalogError("UNPARSEABLE", "Firmware manifest is not valid XML")
  }
  const versions = child(child(child(doc, "versioninfo"), "firmware"), "version")
  if (versions === undefined || versions === "") throw new FUSCatalogError("EMPTY")
  const latestRaw = textOf(child(versions, "latest"))
  if (latestRaw === null || latestRaw.trim() === "") {
    throw new FUSCatalogError("UNPARSEABLE", "Firmware manifest has no latest version")
  }
  return {
    latest: normalizeFirmware(latestRaw),
    alternates: upgradeValues(child(child(versions, "upgrade"), "value"))
      .filter(v => countSeparators(v) > 1)
      .map(normalizeFirmware)
  }
}

function upgradeValues(v: unknown): string[] {
  const items = Array.isArray(v) ? v : v === undefined ? [] : [v]
  const out: string[] = []
  for (const item of items) {
    const text = textOf(item)
    if (text !== null) out.push(text)
  }
  return out
}
