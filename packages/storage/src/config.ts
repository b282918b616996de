import { Effect } from "effect"
import { existsSync, readFileSync, mkdirSync, writeFileSync } from "node:fs"
import { homedir } from "node:os"
import { dirname, join } from "node:path"
import { Builder } from "./builder.js"
import { DEFAULT_REGION } from "./client.js"
import { ConfigError } from "./errors.js"

// Global config directory
const CONFIG_DIR = join(homedir(), ".config", "r2-operator")
const CONFIG_FILE = join(CONFIG_DIR, "r2.env")

const R2_HOST_SUFFIX = ".r2.cloudflarestorage.com"

export interface R2UrlParts {
  accountId: string
  accessKeyId: string
  secretAccessKey: string
  bucketName: string
  region?: string
}

// =============================================================================
// Connection String
// =============================================================================

/**
 * Parse R2 connection string into a builder
 * Format: r2://ACCESS_KEY_ID:SECRET_ACCESS_KEY@ACCOUNT_ID/BUCKET?region=auto
 */
export const parseR2Url = (url: string): Effect.Effect<Builder, ConfigError> =>
  Effect.gen(function* () {
    const parsed = yield* Effect.try({
      try: () => new URL(url),
      catch: () => new ConfigError({ message: "Invalid R2 URL: not a URL" }),
    })
    if (parsed.protocol !== "r2:") {
      return yield* Effect.fail(
        new ConfigError({ message: "Invalid R2 URL: must start with r2://" }),
      )
    }

    const [accessKeyId, secretAccessKey] = yield* Effect.try({
      try: (): [string, string] => [
        decodeURIComponent(parsed.username),
        decodeURIComponent(parsed.password),
      ],
      catch: () => new ConfigError({ message: "Invalid R2 URL: bad escape in credentials" }),
    })
    const accountId = parsed.hostname
    const bucketName = parsed.pathname.slice(1) // remove leading /

    if (!accessKeyId || !secretAccessKey || !accountId || !bucketName) {
      return yield* Effect.fail(
        new ConfigError({
          message:
            "Invalid R2 URL format. Expected: r2://ACCESS_KEY_ID:SECRET_ACCESS_KEY@ACCOUNT_ID/BUCKET",
        }),
      )
    }

    return new Builder()
      .setAccessKeyId(accessKeyId)
      .setSecretAccessKey(secretAccessKey)
      .setEndpoint(`https://${accountId}${R2_HOST_SUFFIX}`)
      .setBucketName(bucketName)
      .setRegion(parsed.searchParams.get("region") ?? DEFAULT_REGION)
  })

/** Inverse of parseR2Url; region is only written when it is not the default */
export const toR2Url = (parts: R2UrlParts): string => {
  const url = new URL(`r2://${parts.accountId}/${parts.bucketName}`)
  url.username = encodeURIComponent(parts.accessKeyId)
  url.password = encodeURIComponent(parts.secretAccessKey)
  if (parts.region && parts.region !== DEFAULT_REGION) {
    url.searchParams.set("region", parts.region)
  }
  return url.toString()
}

// =============================================================================
// Loading
// =============================================================================

export interface LoadOptions {
  env?: NodeJS.ProcessEnv
  configFile?: string
}

const readUrlFromFile = (file: string): string | undefined => {
  if (!existsSync(file)) return undefined
  const lines = readFileSync(file, "utf-8").split("\n")
  for (const line of lines) {
    const trimmed = line.trim()
    if (trimmed.startsWith("R2_URL=")) {
      return trimmed.slice("R2_URL=".length).trim()
    }
  }
  return undefined
}

/**
 * Load connection settings with fallback chain:
 * 1. R2_URL environment variable
 * 2. BUCKET_NAME, ACCESS_KEY_ID, SECRET_ACCESS_KEY, ENDPOINT_URL, REGION
 * 3. Global config file (~/.config/r2-operator/r2.env)
 *
 * Fields that none of them supply stay empty, so createClient names them.
 */
export const loadBuilder = ({
  env = process.env,
  configFile = CONFIG_FILE,
}: LoadOptions = {}): Effect.Effect<Builder, ConfigError> =>
  Effect.gen(function* () {
    // 1. Try R2_URL env var first
    const r2Url = env.R2_URL
    if (r2Url) return yield* parseR2Url(r2Url)

    // 2. Try individual env vars
    const bucketName = env.BUCKET_NAME
    const accessKeyId = env.ACCESS_KEY_ID
    const secretAccessKey = env.SECRET_ACCESS_KEY
    const endpoint = env.ENDPOINT_URL
    const region = env.REGION

    if (bucketName || accessKeyId || secretAccessKey || endpoint) {
      return new Builder()
        .setBucketName(bucketName ?? "")
        .setAccessKeyId(accessKeyId ?? "")
        .setSecretAccessKey(secretAccessKey ?? "")
        .setEndpoint(endpoint ?? "")
        .setRegion(region ?? DEFAULT_REGION)
    }

    // 3. Try global config file
    const fileUrl = yield* Effect.try({
      try: () => readUrlFromFile(configFile),
      catch: (e) => new ConfigError({ message: `Cannot read ${configFile}: ${e}` }),
    })
    if (fileUrl) return yield* parseR2Url(fileUrl)

    return new Builder()
  })

/**
 * Save R2 URL to global config
 */
export const saveGlobalConfig = (r2Url: string, configFile: string = CONFIG_FILE): void => {
  const dir = dirname(configFile)
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }

  writeFileSync(configFile, `R2_URL=${r2Url}\n`, { encoding: "utf-8", mode: 0o600 })
}

/**
 * Get global config path
 */
export const getConfigPath = (): string => CONFIG_FILE

/**
 * Check if global config exists
 */
export const hasGlobalConfig = (configFile: string = CONFIG_FILE): boolean =>
  existsSync(configFile)
