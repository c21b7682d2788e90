/**
 * Suite configuration.
 *
 * Built once, frozen, and handed to the clients that need it.
 */

import { InvalidConfigError } from "./error"

/**
 * Where the service under test lives and how to authenticate against it.
 */
export interface SuiteConfig {
  /**
   * Base URL of the HTTP API, without a trailing slash.
   */
  readonly baseUrl: string

  /**
   * URL of the push-notification channel.
   */
  readonly wsUrl: string

  readonly adminUsername: string
  readonly adminPassword: string

  /**
   * Per-request timeout for HTTP calls.
   */
  readonly requestTimeoutMs: number
}

/**
 * Environment variables read by loadConfig().
 */
export const CONFIG_ENV = {
  baseUrl: `TODO_API_URL`,
  wsUrl: `TODO_WS_URL`,
  adminUsername: `TODO_ADMIN_USERNAME`,
  adminPassword: `TODO_ADMIN_PASSWORD`,
  requestTimeoutMs: `TODO_REQUEST_TIMEOUT_MS`,
} as const

export const DEFAULT_CONFIG: SuiteConfig = Object.freeze({
  baseUrl: `http://localhost:8080`,
  wsUrl: `ws://localhost:4242/ws`,
  adminUsername: `admin`,
  adminPassword: `admin`,
  requestTimeoutMs: 10_000,
})

export type EnvSource = Record<string, string | undefined>

/**
 * Build a validated, frozen configuration from defaults and overrides.
 *
 * @throws {InvalidConfigError} if a URL or the timeout is unusable
 *
 * @example
 * ```typescript
 * const config = defineConfig({ baseUrl: server.url, wsUrl: server.wsUrl })
 * ```
 */
export function defineConfig(values: Partial<SuiteConfig> = {}): SuiteConfig {
  const merged = { ...DEFAULT_CONFIG, ...definedOnly(values) }

  return Object.freeze({
    baseUrl: normalizeUrl(`baseUrl`, merged.baseUrl, [`http:`, `https:`]),
    wsUrl: normalizeUrl(`wsUrl`, merged.wsUrl, [`ws:`, `wss:`]),
    adminUsername: merged.adminUsername,
    adminPassword: merged.adminPassword,
    requestTimeoutMs: positiveInteger(
      `requestTimeoutMs`,
      merged.requestTimeoutMs
    ),
  })
}

/**
 * Read the configuration from environment variables.
 * Empty variables count as unset. Overrides win over the environment.
 */
export function loadConfig(
  env: EnvSource = process.env,
  overrides: Partial<SuiteConfig> = {}
): SuiteConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim()
    return value ? value : undefined
  }

  const timeout = read(CONFIG_ENV.requestTimeoutMs)

  return defineConfig({
    baseUrl: read(CONFIG_ENV.baseUrl),
    wsUrl: read(CONFIG_ENV.wsUrl),
    adminUsername: read(CONFIG_ENV.adminUsername),
    adminPassword: read(CONFIG_ENV.adminPassword),
    requestTimeoutMs:
      timeout === undefined
        ? undefined
        : parseInteger(CONFIG_ENV.requestTimeoutMs, timeout),
    ...definedOnly(overrides),
  })
}

// ============================================================================
// Validation
// ============================================================================

function definedOnly(values: Partial<SuiteConfig>): Partial<SuiteConfig> {
  const result: { -readonly [K in keyof SuiteConfig]?: SuiteConfig[K] } = {}
  if (values.baseUrl !== undefined) result.baseUrl = values.baseUrl
  if (values.wsUrl !== undefined) result.wsUrl = values.wsUrl
  if (values.adminUsername !== undefined) {
    result.adminUsername = values.adminUsername
  }
  if (values.adminPassword !== undefined) {
    result.adminPassword = values.adminPassword
  }
  if (values.requestTimeoutMs !== undefined) {
    result.requestTimeoutMs = values.requestTimeoutMs
  }
  return result
}

function normalizeUrl(
  key: string,
  value: string,
  protocols: Array<string>
): string {
  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw new InvalidConfigError(key, `"${value}" is not a valid URL`)
  }
  if (!protocols.includes(url.protocol)) {
    throw new InvalidConfigError(
      key,
      `expected ${protocols.join(` or `)} URL, got "${value}"`
    )
  }
  return value.replace(/\/+$/, ``)
}

function parseInteger(key: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidConfigError(key, `"${value}" is not a whole number`)
  }
  return Number(value)
}

function positiveInteger(key: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidConfigError(key, `expected a positive integer, got ${value}`)
  }
  return value
}
