// FUS XML messages -- request envelopes and response schema.
//
// Requests:  FUSMsg > FUSHdr > ProtoVer, FUSMsg > FUSBody > Put > FIELD > Data
// Responses: the same envelope, plus FUSBody > Results > Status and result fields.
//
// Response fields are read through explicit lookups with ordered fallbacks,
// never by walking the parsed document ad hoc.

import {XMLBuilder, XMLParser} from "fast-xml-parser"
import {FUSProtocolError} from "../errors.js"

export const PROTO_VERSION = "1.0"

// -- Types

export type FieldMap = ReadonlyMap<string, string>

export interface FUSEnvelope {
  status: number | null   // Results.Status
  sessionId: string | null
  put: FieldMap
  results: FieldMap
}

export interface BinaryInformRequest {
  firmware: string
  region: string
  model: string
  imei: string
  logicCheck: string
  clientVersion: string
}

export interface BinaryInformFields {
  binaryName: string | null
  modelPath: string | null
  byteSize: string | null
  crc: string | null
  lastModified: string | null
  displayName: string | null
  osVersion: string | null
  platform: string | null
  description: string | null
  latestFirmwareVersion: string | null
  logicValueFactory: string | null
}

// -- Encoding

const builder = new XMLBuilder({})

export function encodeFUSMessage(fields: Record<string, string>): string {
  const put: Record<string, {Data: string}> = {}
  for (const [name, value] of Object.entries(fields)) put[name] = {Data: value}
  return String(builder.build({
    FUSMsg: {
      FUSHdr: {ProtoVer: PROTO_VERSION},
      FUSBody: {Put: put}
    }
  }))
}

export function encodeBinaryInform(req: BinaryInformRequest): string {
  return encodeFUSMessage({
    ACCESS_MODE: "2",
    BINARY_NATURE: "1",
    CLIENT_PRODUCT: "Smart Switch",
    DEVICE_FW_VERSION: req.firmware,
    DEVICE_LOCAL_CODE: req.region,
    DEVICE_MODEL_NAME: req.model,
    DEVICE_IMEI_PUSH: req.imei,
    CLIENT_VERSION: req.clientVersion,
    LOGIC_CHECK: req.logicCheck
  })
}

export function encodeBinaryInit(filename: string, logicCheck: string): string {
  return encodeFUSMessage({
    BINARY_FILE_NAME: filename,
    LOGIC_CHECK: logicCheck
  })
}

// Input to the logic check of a binary-init request: the last 16 characters
// of the filename before its first '.'.
export function binaryInitCheckInput(filename: string): string {
  return filename.split(".")[0].slice(-16)
}

// -- Decoding

const parser = new XMLParser({ignoreAttributes: true, parseTagValue: false})

export function decodeFUSMessage(xml: string): FUSEnvelope {
  let doc: unknown
  try {
    doc = parser.parse(xml)
  } catch (e) {
    throw new FUSProtocolError("UNKNOWN", undefined, {cause: e})
  }
  const msg = child(doc, "FUSMsg")
  const hdr = child(msg, "FUSHdr")
  const body = child(msg, "FUSBody")
  const results = child(body, "Results")
  const statusText = textOf(child(results, "Status"))
  const status = statusText !== null && /^\d+$/.test(statusText.trim()) ? Number(statusText.trim()) : null
  return {
    status,
    sessionId: textOf(child(hdr, "SessionID")),
    put: fieldsOf(child(body, "Put")),
    results: fieldsOf(results)
  }
}

// First present field among `names`, searched in Put and then in Results.
export function lookupField(env: FUSEnvelope, ...names: string[]): string | null {
  for (const name of names) {
    const v = env.put.get(name) ?? env.results.get(name)
    if (v !== undefined) return v
  }
  return null
}

export function decodeBinaryInform(env: FUSEnvelope): BinaryInformFields {
  return {
    binaryName: lookupField(env, "BINARY_NAME"),
    modelPath: lookupField(env, "MODEL_PATH"),
    byteSize: lookupField(env, "BINARY_BYTE_SIZE"),
    crc: lookupField(env, "BINARY_CRC"),
    lastModified: lookupField(env, "LAST_MODIFIED"),
    displayName: lookupField(env, "DEVICE_MODEL_DISPLAYNAME"),
    osVersion: lookupField(env, "CURRENT_OS_VERSION"),
    platform: lookupField(env, "DEVICE_PLATFORM"),
    description: lookupField(env, "DESCRIPTION", "ADD_DESCRIPTION"),
    latestFirmwareVersion: lookupField(env, "LATEST_FW_VERSION", "ADD_LATEST_FW_VERSION"),
    logicValueFactory: lookupField(env, "LOGIC_VALUE_FACTORY")
  }
}

// -- Internal

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

export function child(v: unknown, name: string): unknown {
  return isRecord(v) ? v[name] : undefined
}

export function textOf(v: unknown): string | null {
  if (typeof v === "string") return v
  if (typeof v === "number" || typeof v === "boolean") return String(v)
  return null
}

// Leaf fields are either {Data: value} or plain text; nested or repeated
// elements are not fields and are skipped. An empty value counts as absent,
// so lookupField moves on to the next name.
function fieldsOf(section: unknown): FieldMap {
  const fields = new Map<string, string>()
  if (!isRecord(section)) return fields
  for (const [name, value] of Object.entries(section)) {
    const text = isRecord(value) ? textOf(value.Data) : textOf(value)
    if (text !== null && text !== "") fields.set(name, text)
  }
  return fields
}
