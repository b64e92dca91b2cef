import {vi} from 'vitest'
import {createCipheriv} from 'node:crypto'
import {newFUSClient, type FUSClient, type FUSRequest, type TransportResponse} from '../src/client.js'
import {fusSessionCrypto, type SessionCrypto} from '../src/crypto/session.js'
import type {FUSConfigOverrides} from '../src/config.js'

// -- Responses

export interface FakeResponseInit {
  status?: number
  headers?: Record<string, string>
  body?: string | Uint8Array | Uint8Array[]
  // Error the body stream fails with after its chunks are read
  failWith?: Error
  // Body stream never settles another read once its chunks are read
  stall?: boolean
  onCancel?: (reason: unknown) => void
}

export function fakeResponse(init: FakeResponseInit = {}): TransportResponse {
  const headers = new Map<string, string>()
  for (const [k, v] of Object.entries(init.headers ?? {})) headers.set(k.toLowerCase(), v)
  const chunks = toChunks(init.body)
  const body = chunkStream(chunks, init)
  return {
    status: init.status ?? 200,
    headers: {get: (name: string) => headers.get(name.toLowerCase()) ?? null},
    body,
    async text() {
      return new TextDecoder().decode(concatChunks(chunks))
    }
  }
}

export function chunkStream(
  chunks: Uint8Array[],
  opts: Pick<FakeResponseInit, 'failWith' | 'stall' | 'onCancel'> = {}
): ReadableStream<Uint8Array> {
  let i = 0
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (i < chunks.length) {
        controller.enqueue(chunks[i++])
      } else if (opts.stall) {
        return new Promise<void>(() => {})
      } else if (opts.failWith) {
        controller.error(opts.failWith)
      } else {
        controller.close()
      }
    },
    cancel(reason) {
      opts.onCancel?.(reason)
    }
  }, {highWaterMark: 0})
}

export async function readAll(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = stream.getReader()
  const parts: Uint8Array[] = []
  for (;;) {
    const {done, value} = await reader.read()
    if (done) break
    parts.push(value)
  }
  return concatChunks(parts)
}

export function concatChunks(chunks: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(chunks.reduce((n, c) => n + c.length, 0))
  let off = 0
  for (const c of chunks) {
    out.set(c, off)
    off += c.length
  }
  return out
}

export function splitEvery(data: Uint8Array, size: number): Uint8Array[] {
  const out: Uint8Array[] = []
  for (let off = 0; off < data.length; off += size) out.push(data.subarray(off, off + size))
  return out
}

function toChunks(body: string | Uint8Array | Uint8Array[] | undefined): Uint8Array[] {
  if (body === undefined) return []
  if (typeof body === 'string') return [new TextEncoder().encode(body)]
  return Array.isArray(body) ? body : [body]
}

// -- FUS messages

export function fusResponseXml(status: number, fields: Record<string, string> = {}): string {
  const put = Object.entries(fields).map(([k, v]) => `<${k}><Data>${v}</Data></${k}>`).join('')
  return '<FUSMsg><FUSHdr><ProtoVer>1.0</ProtoVer></FUSHdr><FUSBody>'
    + `<Results><Status>${status}</Status></Results><Put>${put}</Put>`
    + '</FUSBody></FUSMsg>'
}

export function versionXml(latest: string | null, values: string[] = []): string {
  const upgrade = values.map(v => `<value rcount="1" fwsize="100">${v}</value>`).join('')
  const latestEl = latest === null ? '' : `<latest o="11">${latest}</latest>`
  return `<?xml version="1.0" encoding="UTF-8"?><versioninfo><url>http://fota-cloud-dn.ospserver.net/firmware/</url>`
    + `<firmware><model>SM-G960F</model><cc>EUX</cc><version>${latestEl}<upgrade>${upgrade}</upgrade></version></firmware></versioninfo>`
}

// -- Crypto

// Plain, predictable session transform so request headers are easy to assert.
export const fakeCrypto: SessionCrypto = {
  decodeNonce: (raw) => 'plain-' + raw,
  deriveSignature: (nonce) => 'sig-' + nonce,
  logicCheck: (nonce, input) => input.slice(0, 4) + ':' + nonce,
  deriveKey: (material) => fusSessionCrypto.deriveKey(material)
}

export const FUS_KEY_1 = 'vicopx7dqu06emacgpnpy8j8zwhduwlh'

// Inverse of fusSessionCrypto.decodeNonce.
export function encodeNonce(plain: string): string {
  const key = Buffer.from(FUS_KEY_1)
  const cipher = createCipheriv('aes-256-cbc', key, key.subarray(0, 16))
  return Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]).toString('base64')
}

export function encryptFirmware(key: Uint8Array, plain: Uint8Array): Uint8Array {
  const cipher = createCipheriv('aes-128-ecb', key, null)
  return new Uint8Array(Buffer.concat([cipher.update(plain), cipher.final()]))
}

export function sequence(n: number): Uint8Array {
  const out = new Uint8Array(n)
  for (let i = 0; i < n; i++) out[i] = (i * 7 + 3) & 0xff
  return out
}

// -- Client

export type Handler = (req: FUSRequest, signal: AbortSignal) => TransportResponse | Promise<TransportResponse>

export const TEST_TACS = new Map([['SM-G960F', '35000110'], ['SM-S918B', '35000162']])

export async function testClient(handler: Handler, config: FUSConfigOverrides = {}, crypto: SessionCrypto = fakeCrypto) {
  const send = vi.fn(async (req: FUSRequest, signal: AbortSignal) => handler(req, signal))
  const client: FUSClient = await newFUSClient({
    transport: {send},
    crypto,
    tacTable: TEST_TACS,
    config: {timeoutMs: 200, ...config}
  })
  return {client, send, requests: () => send.mock.calls.map(c => c[0])}
}

export function endpointOf(req: FUSRequest): 'nonce' | 'inform' | 'init' | 'download' | 'manifest' {
  if (req.url.includes('GenerateNonce')) return 'nonce'
  if (req.url.includes('BinaryInform')) return 'inform'
  if (req.url.includes('BinaryInitForMass')) return 'init'
  if (req.url.includes('BinaryForMass')) return 'download'
  return 'manifest'
}

export function nonceResponse(nonce = 'N1', sessionId = 'S1'): TransportResponse {
  return fakeResponse({headers: {NONCE: nonce, 'Set-Cookie': `JSESSIONID=${sessionId}; Path=/`}})
}
