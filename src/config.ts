// Client configuration: endpoints, client identification and request limits.

export interface FUSEndpoints {
  nonceUrl: string
  binaryInformUrl: string
  binaryInitUrl: string
  binaryDownloadUrl: string
  // {region} and {model} are substituted
  versionManifestUrl: string
}

export interface FUSConfig {
  timeoutMs: number        // per request; default 30000 (30s), lower for tests
  clientVersion: string
  userAgent: string
  endpoints: FUSEndpoints
  tacFile: string | null   // model -> TAC table; null uses the bundled data/tacs.json
}

export const DEFAULT_ENDPOINTS: FUSEndpoints = {
  nonceUrl: "https://neofussvr.sslcs.cdngc.net/NF_DownloadGenerateNonce.do",
  binaryInformUrl: "https://neofussvr.sslcs.cdngc.net/NF_DownloadBinaryInform.do",
  binaryInitUrl: "https://neofussvr.sslcs.cdngc.net/NF_DownloadBinaryInitForMass.do",
  binaryDownloadUrl: "http://cloud-neofussvr.samsungmobile.com/NF_DownloadBinaryForMass.do",
  versionManifestUrl: "http://fota-cloud-dn.ospserver.net/firmware/{region}/{model}/version.xml"
}

export const DEFAULT_FUS_CONFIG: FUSConfig = {
  timeoutMs: 30000,
  clientVersion: "4.3.23123_1",
  userAgent: "Kies2.0_FUS",
  endpoints: DEFAULT_ENDPOINTS,
  tacFile: null
}

export type FUSConfigOverrides = Partial<Omit<FUSConfig, "endpoints">> & {endpoints?: Partial<FUSEndpoints>}

export function resolveConfig(overrides?: FUSConfigOverrides): FUSConfig {
  const {endpoints, ...rest} = overrides ?? {}
  return {
    ...DEFAULT_FUS_CONFIG,
    ...rest,
    endpoints: {...DEFAULT_ENDPOINTS, ...endpoints}
  }
}

// Reads FUS_TIMEOUT_MS, FUS_CLIENT_VERSION and FUS_TAC_FILE.
export function configFromEnv(env: Record<string, string | undefined>): FUSConfigOverrides {
  const overrides: FUSConfigOverrides = {}
  const timeout = env.FUS_TIMEOUT_MS
  if (timeout !== undefined && timeout !== "") {
    const n = Number(timeout)
    if (!Number.isInteger(n) || n <= 0) throw new Error("FUS_TIMEOUT_MS must be a positive integer: " + timeout)
    overrides.timeoutMs = n
  }
  if (env.FUS_CLIENT_VERSION) overrides.clientVersion = env.FUS_CLIENT_VERSION
  if (env.FUS_TAC_FILE) overrides.tacFile = env.FUS_TAC_FILE
  return overrides
}

export function versionManifestUrl(config: FUSConfig, region: string, model: string): string {
  return config.endpoints.versionManifestUrl
    .replace("{region}", encodeURIComponent(region))
    .replace("{model}", encodeURIComponent(model))
}
