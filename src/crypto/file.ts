// Firmware file decryption -- AES-128-ECB with PKCS#7 padding.
//
// FileDecryptor works incrementally on network chunks of any size: it keeps at
// most one partial block of ciphertext and holds back the last full plaintext
// block until the end of the stream, where the padding is removed.

import {createDecipheriv, type Decipher} from "node:crypto"
import {FUSDecryptError} from "../errors.js"
import {CIPHER_BLOCK_SIZE} from "../protocol/range.js"

export const FILE_KEY_SIZE = 16

const EMPTY = new Uint8Array(0)

export class FileDecryptor {
  private readonly decipher: Decipher
  private pending: Uint8Array = EMPTY  // ciphertext tail shorter than one block
  private held: Uint8Array = EMPTY     // last full plaintext block
  private skip: number
  private finished = false

  // skip: plaintext bytes to drop from the front (for block-aligned range starts)
  constructor(key: Uint8Array, skip = 0) {
    if (key.length !== FILE_KEY_SIZE) throw new FUSDecryptError("INVALID_KEY")
    this.decipher = createDecipheriv("aes-128-ecb", key, null)
    this.decipher.setAutoPadding(false)
    this.skip = skip
  }

  update(chunk: Uint8Array): Uint8Array {
    if (this.finished) throw new Error("FileDecryptor: update after final")
    const data = this.pending.length > 0 ? concat(this.pending, chunk) : chunk
    const full = data.length - (data.length % CIPHER_BLOCK_SIZE)
    this.pending = new Uint8Array(data.subarray(full))
    if (full === 0) return EMPTY
    const plain = concat(this.held, this.decipher.update(data.subarray(0, full)))
    const keep = plain.length - CIPHER_BLOCK_SIZE
    this.held = new Uint8Array(plain.subarray(keep))
    return this.emit(plain.subarray(0, keep))
  }

  final(): Uint8Array {
    if (this.finished) return EMPTY
    this.finished = true
    if (this.pending.length > 0) throw new FUSDecryptError("TRUNCATED")
    this.decipher.final()
    if (this.held.length === 0) return EMPTY
    return this.emit(this.held.subarray(0, CIPHER_BLOCK_SIZE - paddingLength(this.held)))
  }

  private emit(data: Uint8Array): Uint8Array {
    if (this.skip === 0) return data
    const n = Math.min(this.skip, data.length)
    this.skip -= n
    return data.subarray(n)
  }
}

// One-shot decryption of a complete ciphertext.
export function decryptFile(key: Uint8Array, data: Uint8Array): Uint8Array {
  if (key.length !== FILE_KEY_SIZE) throw new FUSDecryptError("INVALID_KEY")
  if (data.length % CIPHER_BLOCK_SIZE !== 0) throw new FUSDecryptError("TRUNCATED")
  const decipher = createDecipheriv("aes-128-ecb", key, null)
  try {
    return new Uint8Array(Buffer.concat([decipher.update(data), decipher.final()]))
  } catch {
    throw new FUSDecryptError("BAD_PADDING")
  }
}

// -- Internal

function paddingLength(block: Uint8Array): number {
  const n = block[block.length - 1]
  if (n < 1 || n > CIPHER_BLOCK_SIZE) throw new FUSDecryptError("BAD_PADDING")
  for (let i = block.length - n; i < block.length; i++) {
    if (block[i] !== n) throw new FUSDecryptError("BAD_PADDING")
  }
  return n
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length === 0) return b
  const out = new Uint8Array(a.length + b.length)
  out.set(a, 0)
  out.set(b, a.length)
  return out
}
