// FUS orchestration -- firmware listing, binary-info retrieval with identity
// retries, and file key derivation.
//
// Every operation opens its own session; nothing is shared between calls.

import {
  acquireSession, refreshSession, requestBinaryInform, fetchVersionManifest, requireLogicCheckInput,
  type FUSClient, type Session
} from "./client.js"
import {FUSAuthError, FUSProtocolError, FUSRetryError} from "./errors.js"
import {toHex} from "./crypto/encoding.js"
import {v2KeyMaterial, v4KeyMaterial, LOGIC_CHECK_INPUT_LENGTH} from "./crypto/session.js"
import {decodeVersionManifest} from "./protocol/catalog.js"
import {decodeBinaryInform, type FUSEnvelope} from "./protocol/messages.js"
import {generateImei, tacForModel} from "./protocol/identity.js"
import {joinPath} from "./protocol/range.js"
import {normalizeFirmware, readFirmwareSummary, type FirmwareBuildSummary} from "./protocol/version.js"

export const MAX_IDENTITY_ATTEMPTS = 5

// -- Types

export interface FirmwareListing {
  firmware: string
  isLatest: boolean
  build: FirmwareBuildSummary
}

export interface BinaryRequest {
  region: string
  model: string
  firmware: string
  imei?: string | null   // reused on every attempt when given
}

export type EncryptVersion = 2 | 4

export type FileKeyInputs =
  | {version: 2, firmware: string, model: string, region: string}
  | {version: 4, latestFirmwareVersion: string, logicValueFactory: string}

export interface BinaryMetadata {
  filename: string
  path: string
  size: number
  crc: string | null
  lastModified: number | null
  encryptVersion: EncryptVersion
  keyInputs: FileKeyInputs
  displayName: string | null
  osVersion: string | null
  platform: string | null
  changelogUrl: string | null
}

export interface BinaryInfoResult {
  metadata: BinaryMetadata
  session: Session   // refreshed from the binary-inform response
  imei: string
  attempts: number
}

export interface BinaryDetails extends BinaryMetadata {
  decryptKey: string   // hex
  sizeReadable: string
  build: FirmwareBuildSummary
  imei: string
  firmware: string
  downloadPath: string
}

// -- Catalog

export async function listFirmware(client: FUSClient, region: string, model: string): Promise<FirmwareListing[]> {
  const manifest = decodeVersionManifest(await fetchVersionManifest(client, region, model))
  return [manifest.latest, ...manifest.alternates].map((firmware, i) => ({
    firmware,
    isLatest: i === 0,
    build: readFirmwareSummary(firmware)
  }))
}

export async function resolveLatestFirmware(client: FUSClient, region: string, model: string): Promise<string> {
  return decodeVersionManifest(await fetchVersionManifest(client, region, model)).latest
}

// -- Binary info

// Attempts run one after another: 200 returns, 408 moves on to the next
// identity, 401 and any other status fail immediately.
export async function retrieveBinaryInfo(client: FUSClient, req: BinaryRequest): Promise<BinaryInfoResult> {
  const firmware = normalizeFirmware(req.firmware)
  requireLogicCheckInput(firmware, "firmware")
  const nextIdentity = identitySource(client, req)
  for (let attempt = 1; attempt <= MAX_IDENTITY_ATTEMPTS; attempt++) {
    const imei = nextIdentity()
    const session = await acquireSession(client)
    const {envelope, response} = await requestBinaryInform(client, session, {
      region: req.region, model: req.model, firmware, imei
    })
    switch (envelope.status) {
      case 200:
        return {
          metadata: decodeBinaryMetadata(envelope, {firmware, model: req.model, region: req.region}),
          session: refreshSession(client, session, response),
          imei,
          attempts: attempt
        }
      case 408:
        console.log(`[FUS] attempt ${attempt}/${MAX_IDENTITY_ATTEMPTS}: identity ${imei} rejected (408)`)
        break
      case 401:
        throw new FUSAuthError("UNAUTHORIZED", 401)
      default:
        console.error("[FUS] binary inform failed with status %s", envelope.status ?? response.status)
        throw new FUSProtocolError("UNKNOWN", envelope.status ?? response.status)
    }
  }
  throw new FUSRetryError("MAX_ATTEMPTS_EXCEEDED", MAX_IDENTITY_ATTEMPTS)
}

function identitySource(client: FUSClient, req: BinaryRequest): () => string {
  const supplied = req.imei
  if (supplied) return () => supplied
  const tac = tacForModel(client.tacTable, req.model)
  return () => generateImei(tac)
}

export function encryptVersionOf(filename: string): EncryptVersion {
  return filename.endsWith("4") ? 4 : 2
}

export function decodeBinaryMetadata(
  env: FUSEnvelope,
  requested: {firmware: string, model: string, region: string}
): BinaryMetadata {
  const f = decodeBinaryInform(env)
  if (f.binaryName === null || f.modelPath === null || f.byteSize === null || !/^\d+$/.test(f.byteSize)) {
    throw new FUSProtocolError("UNKNOWN", env.status ?? undefined)
  }
  const encryptVersion = encryptVersionOf(f.binaryName)
  let keyInputs: FileKeyInputs
  if (encryptVersion === 4) {
    if (f.latestFirmwareVersion === null || f.logicValueFactory === null
      || f.latestFirmwareVersion.length < LOGIC_CHECK_INPUT_LENGTH) {
      throw new FUSProtocolError("UNKNOWN", env.status ?? undefined)
    }
    keyInputs = {version: 4, latestFirmwareVersion: f.latestFirmwareVersion, logicValueFactory: f.logicValueFactory}
  } else {
    keyInputs = {version: 2, ...requested}
  }
  return {
    filename: f.binaryName,
    path: f.modelPath,
    size: Number(f.byteSize),
    crc: f.crc,
    lastModified: f.lastModified !== null && /^\d+$/.test(f.lastModified) ? Number(f.lastModified) : null,
    encryptVersion,
    keyInputs,
    displayName: f.displayName,
    osVersion: f.osVersion === null ? null : f.osVersion.replace("(", " ("),
    platform: f.platform,
    changelogUrl: f.description
  }
}

// -- Keys

export function deriveFileKey(client: FUSClient, inputs: FileKeyInputs): Uint8Array {
  const material = inputs.version === 2
    ? v2KeyMaterial(inputs.firmware, inputs.model, inputs.region)
    : v4KeyMaterial(client.crypto, inputs.latestFirmwareVersion, inputs.logicValueFactory)
  return client.crypto.deriveKey(material)
}

// -- Details

export async function getBinaryDetails(client: FUSClient, req: BinaryRequest): Promise<BinaryDetails> {
  const {metadata, imei} = await retrieveBinaryInfo(client, req)
  const firmware = normalizeFirmware(req.firmware)
  return {
    ...metadata,
    decryptKey: toHex(deriveFileKey(client, metadata.keyInputs)),
    sizeReadable: formatGigabytes(metadata.size),
    build: readFirmwareSummary(firmware),
    imei,
    firmware,
    downloadPath: joinPath(metadata.path, metadata.filename)
  }
}

export function formatGigabytes(bytes: number): string {
  return (bytes / 1024 / 1024 / 1024).toFixed(2) + " GB"
}
