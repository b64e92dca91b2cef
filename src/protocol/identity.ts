// Device identities (IMEI) submitted with binary-inform requests.
//
// An IMEI is 15 digits: a type allocation code (TAC) prefix, a serial part and
// a Luhn check digit. Candidate identities are generated from a per-model TAC
// seed table (data/tacs.json by default).

import {readFileSync} from "node:fs"
import sodium from "libsodium-wrappers-sumo"
import {FUSIdentityError} from "../errors.js"
import {isRecord} from "./messages.js"

export const IMEI_LENGTH = 15

export type TacTable = ReadonlyMap<string, string>

export const DEFAULT_TAC_FILE = new URL("../../data/tacs.json", import.meta.url)

// -- Luhn

export function luhnCheckDigit(digits: string): number {
  let sum = 0
  for (let i = 0; i < digits.length; i++) {
    let d = digits.charCodeAt(digits.length - 1 - i) - 48
    if (i % 2 === 0) {
      d *= 2
      if (d > 9) d -= 9
    }
    sum += d
  }
  return (10 - (sum % 10)) % 10
}

export function isValidImei(imei: string): boolean {
  if (!/^\d{15}$/.test(imei)) return false
  return luhnCheckDigit(imei.slice(0, IMEI_LENGTH - 1)) === imei.charCodeAt(IMEI_LENGTH - 1) - 48
}

// -- Generation

// Requires sodium.ready.
export function generateImei(tac: string): string {
  if (!/^\d{1,14}$/.test(tac)) throw new Error("generateImei: TAC must be 1-14 digits: " + tac)
  let body = tac
  while (body.length < IMEI_LENGTH - 1) body += String(sodium.randombytes_uniform(10))
  return body + String(luhnCheckDigit(body))
}

// -- TAC table

export function parseTacTable(json: string): TacTable {
  const data: unknown = JSON.parse(json)
  if (!isRecord(data)) throw new Error("TAC table must be a JSON object of model -> TAC")
  const table = new Map<string, string>()
  for (const [model, tac] of Object.entries(data)) {
    if (typeof tac !== "string" || !/^\d{1,14}$/.test(tac)) {
      throw new Error(`TAC table: invalid TAC for ${model}`)
    }
    table.set(model.toUpperCase(), tac)
  }
  return table
}

export function loadTacTable(file: string | URL = DEFAULT_TAC_FILE): TacTable {
  return parseTacTable(readFileSync(file, "utf-8"))
}

export function tacForModel(table: TacTable, model: string): string {
  const tac = table.get(model.trim().toUpperCase())
  if (tac === undefined) throw new FUSIdentityError("NO_SEED", model)
  return tac
}
