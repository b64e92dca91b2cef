// FUS error taxonomy.
//
// Every failure carries an errorType tag and, where the server supplied one,
// the HTTP or protocol status code it came with.

export type CatalogErrorType = "EMPTY" | "UNPARSEABLE"
export type AuthErrorType = "UNAUTHORIZED"
export type ProtocolErrorType = "UNREACHABLE" | "SERVER_REJECTED" | "UNKNOWN"
export type RetryErrorType = "MAX_ATTEMPTS_EXCEEDED"
export type RangeErrorType = "INVALID"
export type TransportErrorType = "UPSTREAM_REJECTED" | "TIMEOUT"
export type IdentityErrorType = "NO_SEED"
export type DecryptErrorType = "INVALID_KEY" | "TRUNCATED" | "BAD_PADDING"
export type RequestErrorType = "INVALID_INPUT"

export type FUSErrorType =
  | CatalogErrorType | AuthErrorType | ProtocolErrorType | RetryErrorType
  | RangeErrorType | TransportErrorType | IdentityErrorType | DecryptErrorType
  | RequestErrorType

export class FUSCatalogError extends Error {
  constructor(public readonly errorType: CatalogErrorType, message?: string) {
    super(message ?? humanReadableMessage(errorType))
    this.name = "FUSCatalogError"
  }
}

export class FUSAuthError extends Error {
  constructor(public readonly errorType: AuthErrorType, public readonly code?: number) {
    super(humanReadableMessage(errorType))
    this.name = "FUSAuthError"
  }
}

export class FUSProtocolError extends Error {
  constructor(public readonly errorType: ProtocolErrorType, public readonly code?: number, options?: {cause?: unknown}) {
    super(withCode(humanReadableMessage(errorType), code), options)
    this.name = "FUSProtocolError"
  }
}

export class FUSRetryError extends Error {
  constructor(public readonly errorType: RetryErrorType, public readonly code?: number) {
    super(humanReadableMessage(errorType))
    this.name = "FUSRetryError"
  }
}

export class FUSRangeError extends Error {
  constructor(public readonly errorType: RangeErrorType, public readonly header?: string) {
    super(humanReadableMessage(errorType))
    this.name = "FUSRangeError"
  }
}

export class FUSTransportError extends Error {
  constructor(public readonly errorType: TransportErrorType, public readonly code?: number, options?: {cause?: unknown}) {
    super(withCode(humanReadableMessage(errorType), code), options)
    this.name = "FUSTransportError"
  }
}

export class FUSIdentityError extends Error {
  constructor(public readonly errorType: IdentityErrorType, public readonly model?: string) {
    super(humanReadableMessage(errorType) + (model ? ": " + model : ""))
    this.name = "FUSIdentityError"
  }
}

export class FUSDecryptError extends Error {
  constructor(public readonly errorType: DecryptErrorType, options?: {cause?: unknown}) {
    super(humanReadableMessage(errorType), options)
    this.name = "FUSDecryptError"
  }
}

export class FUSRequestError extends Error {
  constructor(public readonly errorType: RequestErrorType, public readonly field?: string) {
    super(humanReadableMessage(errorType) + (field ? ": " + field : ""))
    this.name = "FUSRequestError"
  }
}

export type FUSError =
  | FUSCatalogError | FUSAuthError | FUSProtocolError | FUSRetryError
  | FUSRangeError | FUSTransportError | FUSIdentityError | FUSDecryptError
  | FUSRequestError

export function isFUSError(e: unknown): e is FUSError {
  return e instanceof FUSCatalogError
    || e instanceof FUSAuthError
    || e instanceof FUSProtocolError
    || e instanceof FUSRetryError
    || e instanceof FUSRangeError
    || e instanceof FUSTransportError
    || e instanceof FUSIdentityError
    || e instanceof FUSDecryptError
    || e instanceof FUSRequestError
}

export function humanReadableMessage(errorType: FUSErrorType): string {
  switch (errorType) {
    case "EMPTY": return "No firmware is listed for this model and region"
    case "UNPARSEABLE": return "Firmware information could not be parsed"
    case "UNAUTHORIZED": return "Firmware server rejected the session"
    case "UNREACHABLE": return "Firmware server is unreachable"
    case "SERVER_REJECTED": return "Firmware server rejected the request"
    case "UNKNOWN": return "Firmware server returned an unexpected status"
    case "MAX_ATTEMPTS_EXCEEDED": return "No device identity was accepted by the firmware server"
    case "INVALID": return "Range header is invalid"
    case "UPSTREAM_REJECTED": return "Firmware download was rejected upstream"
    case "TIMEOUT": return "Firmware server timed out"
    case "NO_SEED": return "No device identity is known for this model"
    case "INVALID_KEY": return "Decryption key must be 16 bytes of hex"
    case "TRUNCATED": return "Encrypted stream ended inside a cipher block"
    case "BAD_PADDING": return "Decrypted stream has invalid padding"
    case "INVALID_INPUT": return "Request value is too short for the logic check"
  }
}

// Status a route layer should answer with for a given failure.
export function httpStatusFor(e: unknown): number {
  if (e instanceof FUSCatalogError) return 404
  if (e instanceof FUSAuthError) return 401
  if (e instanceof FUSRangeError) return 416
  if (e instanceof FUSRetryError) return 500
  if (e instanceof FUSTransportError) return e.errorType === "TIMEOUT" ? 504 : 502
  if (e instanceof FUSProtocolError) return 502
  if (e instanceof FUSIdentityError || e instanceof FUSDecryptError || e instanceof FUSRequestError) return 400
  return 500
}

function withCode(message: string, code: number | undefined): string {
  return code === undefined ? message : `${message} (${code})`
}
