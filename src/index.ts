export * from "./agent.js"
export * from "./download.js"
export * from "./errors.js"
export {
  newFUSClient, createFetchTransport, acquireSession, refreshSession,
  type FUSClient, type FUSClientOptions, type Session, type Transport, type TransportResponse, type FUSRequest
} from "./client.js"
export {
  DEFAULT_FUS_CONFIG, DEFAULT_ENDPOINTS, configFromEnv, resolveConfig,
  type FUSConfig, type FUSConfigOverrides, type FUSEndpoints
} from "./config.js"
export {fusSessionCrypto, type SessionCrypto} from "./crypto/session.js"
export {FileDecryptor, decryptFile} from "./crypto/file.js"
export {normalizeFirmware, readFirmwareBuild, type FirmwareBuildInfo, type FirmwareBuildSummary} from "./protocol/version.js"
export {decodeVersionManifest, type FirmwareManifest} from "./protocol/catalog.js"
export {parseRangeHeader, validateRange, joinPath, type DownloadRange} from "./protocol/range.js"
export {generateImei, isValidImei, loadTacTable, parseTacTable, type TacTable} from "./protocol/identity.js"
