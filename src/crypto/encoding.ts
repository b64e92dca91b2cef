// Hex and base64 codecs for keys, nonces and signatures.
// All functions require sodium.ready.

import sodium from "libsodium-wrappers-sumo"

export function toHex(data: Uint8Array): string {
  return sodium.to_hex(data)
}

// Throws on odd length or non-hex characters.
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) throw new Error("fromHex: invalid hex string")
  return sodium.from_hex(hex)
}

// Standard alphabet with '=' padding.
export function toBase64(data: Uint8Array): string {
  return sodium.to_base64(data, sodium.base64_variants.ORIGINAL)
}

export function fromBase64(s: string): Uint8Array {
  return sodium.from_base64(s.trim(), sodium.base64_variants.ORIGINAL)
}

export function utf8(s: string): Uint8Array {
  return sodium.from_string(s)
}

export function fromUtf8(data: Uint8Array): string {
  return sodium.to_string(data)
}
