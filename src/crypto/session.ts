// Session crypto capability -- nonce decoding, request signatures, logic checks
// and file key derivation.
//
// The protocol, retry and download layers only see the SessionCrypto interface;
// fusSessionCrypto is the transform the FUS servers expect.

import {createCipheriv, createDecipheriv, createHash} from "node:crypto"
import {FUSRequestError} from "../errors.js"
import {fromBase64, toBase64, utf8, fromUtf8} from "./encoding.js"

export interface SessionCrypto {
  // Server NONCE header -> plain nonce
  decodeNonce(rawNonce: string): string
  // Plain nonce -> value of the signature field in the Authorization header
  deriveSignature(decodedNonce: string): string
  // Picks input[code(c) & 0xf] for every character c of the nonce
  logicCheck(decodedNonce: string, input: string): string
  // Key material -> 16-byte file key
  deriveKey(material: string): Uint8Array
}

// -- FUS transform

const KEY_1 = "vicopx7dqu06emacgpnpy8j8zwhduwlh"
const KEY_2 = "9u7qab84rpc16gvk"

export const fusSessionCrypto: SessionCrypto = {
  decodeNonce(rawNonce: string): string {
    return fromUtf8(aesCbcDecrypt(utf8(KEY_1), fromBase64(rawNonce)))
  },

  deriveSignature(decodedNonce: string): string {
    let key = ""
    for (const c of decodedNonce) key += KEY_1[c.charCodeAt(0) % 16]
    key += KEY_2
    return toBase64(aesCbcEncrypt(utf8(key), utf8(decodedNonce)))
  },

  logicCheck(decodedNonce: string, input: string): string {
    return logicCheck(decodedNonce, input)
  },

  deriveKey(material: string): Uint8Array {
    return new Uint8Array(createHash("md5").update(material, "utf8").digest())
  }
}

// Every low nibble can index the input, so shorter inputs are refused.
export const LOGIC_CHECK_INPUT_LENGTH = 16

export function logicCheck(nonce: string, input: string): string {
  let out = ""
  for (const c of nonce) {
    const i = c.charCodeAt(0) & 0xf
    if (i >= input.length) throw new FUSRequestError("INVALID_INPUT")
    out += input[i]
  }
  return out
}

// -- File key material

export function v2KeyMaterial(firmware: string, model: string, region: string): string {
  return `${region}:${model}:${firmware}`
}

export function v4KeyMaterial(crypto: SessionCrypto, latestFirmwareVersion: string, logicValueFactory: string): string {
  return crypto.logicCheck(logicValueFactory, latestFirmwareVersion)
}

// -- Internal

// AES-256-CBC with IV = first 16 key bytes and PKCS#7 padding.
function aesCbcEncrypt(key: Uint8Array, data: Uint8Array): Uint8Array {
  const cipher = createCipheriv("aes-256-cbc", key, key.subarray(0, 16))
  return new Uint8Array(Buffer.concat([cipher.update(data), cipher.final()]))
}

function aesCbcDecrypt(key: Uint8Array, data: Uint8Array): Uint8Array {
  const decipher = createDecipheriv("aes-256-cbc", key, key.subarray(0, 16))
  return new Uint8Array(Buffer.concat([decipher.update(data), decipher.final()]))
}
