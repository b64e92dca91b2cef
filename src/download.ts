// Firmware download -- binary init, upstream range request and on-the-fly
// decryption into a web ReadableStream.
//
// Decrypted output is produced on pull: each read of the returned stream reads
// at most as much upstream as it takes to emit one chunk, so a slow consumer
// throttles the network read. Cancelling the stream cancels the upstream body.
// An upstream that delivers nothing for config.timeoutMs errors the stream.

import {
  acquireSession, refreshSession, requestBinaryInit, requestBinaryDownload, expectProtocolOk,
  requireLogicCheckInput, type FUSClient, type Session, type TransportResponse
} from "./client.js"
import {deriveFileKey, retrieveBinaryInfo, type BinaryRequest} from "./agent.js"
import {FUSDecryptError, FUSTransportError} from "./errors.js"
import {fromHex} from "./crypto/encoding.js"
import {FileDecryptor, FILE_KEY_SIZE} from "./crypto/file.js"
import {binaryInitCheckInput} from "./protocol/messages.js"
import {
  alignToBlock, attachmentName, contentDisposition, fileNameOf, joinPath, validateRange
} from "./protocol/range.js"

// -- Types

export interface FileHandle {
  path: string       // remote path including the filename
  filename: string
  session: Session   // refreshed from the binary-init response
}

export interface DownloadOptions {
  range?: string | null          // Range header value, default "bytes=0-"
  decryptKey?: string | Uint8Array | null  // hex or raw; absent = raw ciphertext
  filename?: string | null       // attachment name override
}

export interface DownloadRequest extends DownloadOptions {
  path: string
}

export interface DownloadStream {
  status: number
  headers: Record<string, string>
  contentType: string
  decrypted: boolean
  body: ReadableStream<Uint8Array>
}

// -- Operations

export async function prepareDownload(client: FUSClient, session: Session, path: string): Promise<FileHandle> {
  const filename = fileNameOf(path)
  const {envelope, response} = await requestBinaryInit(client, session, filename)
  expectProtocolOk(envelope, response.status)
  return {path, filename, session: refreshSession(client, session, response)}
}

export async function openDownload(client: FUSClient, handle: FileHandle, options: DownloadOptions = {}): Promise<DownloadStream> {
  const key = resolveDecryptKey(options.decryptKey)
  const decrypt = key !== null
  const range = validateRange(options.range, decrypt)

  // Decryption has to start on a cipher block boundary.
  const upstreamStart = decrypt ? alignToBlock(range.start) : range.start
  const rangeHeader = decrypt && range.start > 0 ? `bytes=${upstreamStart}-` : options.range ?? null

  const upstream = await requestBinaryDownload(client, handle.session, handle.path, rangeHeader)
  if ((upstream.status !== 200 && upstream.status !== 206) || upstream.body === null) {
    console.error("[FUS] download of %s rejected: %d", handle.filename, upstream.status)
    await releaseBody(upstream)
    throw new FUSTransportError("UPSTREAM_REJECTED", upstream.status)
  }

  const headers: Record<string, string> = {
    "Content-Disposition": contentDisposition(attachmentName(handle.filename, decrypt, options.filename)),
    "Accept-Ranges": "bytes"
  }
  const contentLength = upstream.headers.get("content-length")
  if (!decrypt && contentLength) headers["Content-Length"] = contentLength
  const contentRange = upstream.headers.get("content-range")
  if (contentRange && (!decrypt || upstreamStart === range.start)) headers["Content-Range"] = contentRange

  let body = idleTimeout(upstream.body, client.config.timeoutMs)
  if (key !== null) {
    // A server that ignores the Range header sends the file from byte 0.
    const skip = upstream.status === 206 ? range.start - upstreamStart : range.start
    body = decryptStream(body, new FileDecryptor(key, skip))
  }
  // Partial content without a Content-Range is reported as a plain 200.
  const status = upstream.status === 206 && headers["Content-Range"] === undefined ? 200 : upstream.status
  return {
    status,
    headers,
    contentType: decrypt ? "application/zip" : "application/octet-stream",
    decrypted: decrypt,
    body
  }
}

// Range, key and filename are checked before anything goes out on the network.
export async function downloadFirmware(client: FUSClient, req: DownloadRequest): Promise<DownloadStream> {
  validateRange(req.range, resolveDecryptKey(req.decryptKey) !== null)
  requireLogicCheckInput(binaryInitCheckInput(fileNameOf(req.path)), "filename")
  const session = await acquireSession(client)
  const handle = await prepareDownload(client, session, req.path)
  return openDownload(client, handle, req)
}

export interface FirmwareDownloadRequest extends BinaryRequest {
  range?: string | null
  decrypt?: boolean
  filename?: string | null
}

// Binary info, key derivation and download over the session the binary-inform
// exchange left behind.
export async function downloadFirmwareFor(client: FUSClient, req: FirmwareDownloadRequest): Promise<DownloadStream> {
  const decrypt = req.decrypt ?? true
  validateRange(req.range, decrypt)
  const {metadata, session} = await retrieveBinaryInfo(client, req)
  const handle = await prepareDownload(client, session, joinPath(metadata.path, metadata.filename))
  return openDownload(client, handle, {
    range: req.range,
    filename: req.filename,
    decryptKey: decrypt ? deriveFileKey(client, metadata.keyInputs) : null
  })
}

// -- Streams

export function decryptStream(source: ReadableStream<Uint8Array>, decryptor: FileDecryptor): ReadableStream<Uint8Array> {
  const reader = source.getReader()
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      for (;;) {
        const {done, value} = await reader.read()
        if (done) {
          const tail = decryptor.final()
          if (tail.length > 0) controller.enqueue(tail)
          controller.close()
          return
        }
        const out = decryptor.update(value)
        if (out.length > 0) {
          controller.enqueue(out)
          return
        }
      }
    },
    cancel(reason) {
      return reader.cancel(reason)
    }
  }, {highWaterMark: 0})
}

// Errors the stream with FUSTransportError("TIMEOUT") and cancels the source
// when a single read waits longer than timeoutMs.
export function idleTimeout(source: ReadableStream<Uint8Array>, timeoutMs: number): ReadableStream<Uint8Array> {
  const reader = source.getReader()
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const {expired, clear} = expireAfter(timeoutMs)
      try {
        const {done, value} = await Promise.race([reader.read(), expired])
        if (done) controller.close()
        else controller.enqueue(value)
      } catch (e) {
        if (e instanceof FUSTransportError) {
          console.error("[FUS] download stalled for %d ms", timeoutMs)
          await reader.cancel(e)
        }
        throw e
      } finally {
        clear()
      }
    },
    cancel(reason) {
      return reader.cancel(reason)
    }
  }, {highWaterMark: 0})
}

// -- Internal

function expireAfter(timeoutMs: number): {expired: Promise<never>, clear: () => void} {
  let clear = () => {}
  const expired = new Promise<never>((_, reject) => {
    const timer = setTimeout(() => reject(new FUSTransportError("TIMEOUT")), timeoutMs)
    clear = () => clearTimeout(timer)
  })
  return {expired, clear}
}

export function resolveDecryptKey(key: string | Uint8Array | null | undefined): Uint8Array | null {
  if (key === null || key === undefined) return null
  let bytes: Uint8Array
  if (typeof key === "string") {
    try {
      bytes = fromHex(key.trim())
    } catch (e) {
      throw new FUSDecryptError("INVALID_KEY", {cause: e})
    }
  } else {
    bytes = key
  }
  if (bytes.length !== FILE_KEY_SIZE) throw new FUSDecryptError("INVALID_KEY")
  return bytes
}

async function releaseBody(response: TransportResponse): Promise<void> {
  if (response.body !== null) await response.body.cancel()
}
