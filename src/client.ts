// FUS HTTP client -- transport, sessions and authenticated requests.
//
// A session starts with an unauthenticated nonce challenge. Every later request
// carries the raw nonce and its signature in the Authorization header and the
// JSESSIONID cookie. Any response may rotate the nonce; refreshSession derives
// a new Session value from it.
//
// Uses global fetch by default; tests inject an in-process Transport.

import sodium from "libsodium-wrappers-sumo"
import {resolveConfig, versionManifestUrl, type FUSConfig, type FUSConfigOverrides} from "./config.js"
import {fusSessionCrypto, LOGIC_CHECK_INPUT_LENGTH, type SessionCrypto} from "./crypto/session.js"
import {
  FUSAuthError, FUSProtocolError, FUSRequestError, FUSTransportError, isFUSError
} from "./errors.js"
import {
  decodeFUSMessage, encodeBinaryInform, encodeBinaryInit, binaryInitCheckInput,
  type FUSEnvelope
} from "./protocol/messages.js"
import {loadTacTable, DEFAULT_TAC_FILE, type TacTable} from "./protocol/identity.js"

// -- Types

export interface Session {
  readonly rawNonce: string
  readonly decodedNonce: string
  readonly signature: string
  readonly sessionId: string
}

export interface FUSRequest {
  method: "GET" | "POST"
  url: string
  headers: Record<string, string>
  body?: string
}

// Structural subset of the fetch Response.
export interface TransportResponse {
  readonly status: number
  readonly headers: {get(name: string): string | null}
  readonly body: ReadableStream<Uint8Array> | null
  text(): Promise<string>
}

export interface Transport {
  send(request: FUSRequest, signal: AbortSignal): Promise<TransportResponse>
}

export interface FUSClient {
  readonly config: FUSConfig
  readonly transport: Transport
  readonly crypto: SessionCrypto
  readonly tacTable: TacTable
}

export interface FUSClientOptions {
  config?: FUSConfigOverrides
  transport?: Transport
  crypto?: SessionCrypto
  tacTable?: TacTable
}

export interface FUSExchange {
  envelope: FUSEnvelope
  response: TransportResponse
}

// -- Transport

export function createFetchTransport(): Transport {
  return {
    send(request: FUSRequest, signal: AbortSignal): Promise<TransportResponse> {
      return fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal
      })
    }
  }
}

export async function newFUSClient(options?: FUSClientOptions): Promise<FUSClient> {
  await sodium.ready
  const config = resolveConfig(options?.config)
  return {
    config,
    transport: options?.transport ?? createFetchTransport(),
    crypto: options?.crypto ?? fusSessionCrypto,
    tacTable: options?.tacTable ?? loadTacTable(config.tacFile ?? DEFAULT_TAC_FILE)
  }
}

export function categorizeError(e: unknown): Error {
  if (isFUSError(e)) return e
  if (e instanceof Error && e.name === "AbortError") return new FUSTransportError("TIMEOUT", undefined, {cause: e})
  return new FUSProtocolError("UNREACHABLE", undefined, {cause: e})
}

// Sends a request and reads the whole body, both within config.timeoutMs.
export async function sendForText(client: FUSClient, request: FUSRequest): Promise<{response: TransportResponse, text: string}> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), client.config.timeoutMs)
  try {
    const response = await client.transport.send(request, controller.signal)
    const text = await response.text()
    return {response, text}
  } catch (e) {
    const err = categorizeError(e)
    console.error("[FUS] %s %s failed: %s", request.method, request.url, err.message)
    throw err
  } finally {
    clearTimeout(timer)
  }
}

// Sends a request and returns as soon as headers arrive; the timeout covers
// only the wait for headers. Download bodies get an idle timeout of their own.
export async function sendForStream(client: FUSClient, request: FUSRequest): Promise<TransportResponse> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), client.config.timeoutMs)
  try {
    return await client.transport.send(request, controller.signal)
  } catch (e) {
    const err = categorizeError(e)
    console.error("[FUS] %s %s failed: %s", request.method, request.url, err.message)
    throw err
  } finally {
    clearTimeout(timer)
  }
}

// -- Headers

export function authHeaders(client: FUSClient, session: Session | null): Record<string, string> {
  const headers: Record<string, string> = {
    "Authorization": `FUS nonce="${session?.rawNonce ?? ""}", signature="${session?.signature ?? ""}", nc="", type="", realm="", newauth="1"`,
    "User-Agent": client.config.userAgent
  }
  if (session && session.sessionId) headers["Cookie"] = "JSESSIONID=" + session.sessionId
  return headers
}

export function sessionIdFrom(response: TransportResponse): string | null {
  const cookies = response.headers.get("set-cookie")
  if (!cookies) return null
  const m = cookies.match(/(?:^|[;,]\s*)JSESSIONID=([^;,\s]*)/)
  return m ? m[1] : null
}

// -- Session

export function deriveSession(client: FUSClient, rawNonce: string, sessionId: string): Session {
  const decodedNonce = client.crypto.decodeNonce(rawNonce)
  const signature = client.crypto.deriveSignature(decodedNonce)
  return {rawNonce, decodedNonce, signature, sessionId}
}

export async function acquireSession(client: FUSClient): Promise<Session> {
  const {response} = await sendForText(client, {
    method: "POST",
    url: client.config.endpoints.nonceUrl,
    headers: authHeaders(client, null)
  })
  if (response.status < 200 || response.status >= 300) {
    console.error("[FUS] nonce request rejected: %d", response.status)
    throw new FUSProtocolError("SERVER_REJECTED", response.status)
  }
  const rawNonce = response.headers.get("nonce")
  if (!rawNonce) throw new FUSProtocolError("SERVER_REJECTED", response.status)
  return sessionFromNonce(client, rawNonce, sessionIdFrom(response) ?? "", response.status)
}

// Returns the session unchanged unless the response rotates the nonce or the
// session cookie.
export function refreshSession(client: FUSClient, session: Session, response: TransportResponse): Session {
  const sessionId = sessionIdFrom(response) ?? session.sessionId
  const rawNonce = response.headers.get("nonce")
  if (rawNonce && rawNonce !== session.rawNonce) return sessionFromNonce(client, rawNonce, sessionId, response.status)
  if (sessionId !== session.sessionId) return {...session, sessionId}
  return session
}

// A nonce that does not decode is treated as a rejection by the server.
function sessionFromNonce(client: FUSClient, rawNonce: string, sessionId: string, status: number): Session {
  try {
    return deriveSession(client, rawNonce, sessionId)
  } catch (e) {
    throw new FUSProtocolError("SERVER_REJECTED", status, {cause: e})
  }
}

export function logicCheck(client: FUSClient, session: Session, input: string, field?: string): string {
  requireLogicCheckInput(input, field)
  return client.crypto.logicCheck(session.decodedNonce, input)
}

export function requireLogicCheckInput(input: string, field?: string): void {
  if (input.length < LOGIC_CHECK_INPUT_LENGTH) throw new FUSRequestError("INVALID_INPUT", field)
}

// -- Requests

export async function fetchVersionManifest(client: FUSClient, region: string, model: string): Promise<string> {
  const {response, text} = await sendForText(client, {
    method: "GET",
    url: versionManifestUrl(client.config, region, model),
    headers: {"User-Agent": client.config.userAgent}
  })
  if (response.status !== 200) throw new FUSProtocolError("SERVER_REJECTED", response.status)
  return text
}

export interface BinaryInformParams {
  region: string
  model: string
  firmware: string
  imei: string
}

export async function requestBinaryInform(
  client: FUSClient, session: Session, params: BinaryInformParams
): Promise<FUSExchange> {
  const body = encodeBinaryInform({
    ...params,
    clientVersion: client.config.clientVersion,
    logicCheck: logicCheck(client, session, params.firmware, "firmware")
  })
  const {response, text} = await sendForText(client, {
    method: "POST",
    url: client.config.endpoints.binaryInformUrl,
    headers: {...authHeaders(client, session), "Content-Type": "application/xml"},
    body
  })
  return {envelope: decodeFUSMessage(text), response}
}

export async function requestBinaryInit(client: FUSClient, session: Session, filename: string): Promise<FUSExchange> {
  const body = encodeBinaryInit(filename, logicCheck(client, session, binaryInitCheckInput(filename), "filename"))
  const {response, text} = await sendForText(client, {
    method: "POST",
    url: client.config.endpoints.binaryInitUrl,
    headers: {...authHeaders(client, session), "Content-Type": "application/xml"},
    body
  })
  if (response.status !== 200) {
    console.error("[FUS] binary init rejected: %d", response.status)
    throw new FUSProtocolError("SERVER_REJECTED", response.status)
  }
  return {envelope: decodeFUSMessage(text), response}
}

export async function requestBinaryDownload(
  client: FUSClient, session: Session, path: string, range: string | null
): Promise<TransportResponse> {
  const headers = authHeaders(client, session)
  if (range) headers["Range"] = range
  return sendForStream(client, {
    method: "GET",
    url: client.config.endpoints.binaryDownloadUrl + "?file=" + path,
    headers
  })
}

// Status 200 passes, 401 is an auth failure, anything else is unknown.
export function expectProtocolOk(env: FUSEnvelope, httpStatus: number): void {
  if (env.status === 200) return
  if (env.status === 401) throw new FUSAuthError("UNAUTHORIZED", 401)
  throw new FUSProtocolError("UNKNOWN", env.status ?? httpStatus)
}
