/**
 * Todo Client Types
 */

/**
 * Logging sink used across the probe. `console` satisfies it.
 */
export type Logger = Pick<Console, `debug` | `info` | `warn` | `error`>

/**
 * Logger that drops everything; handy for quiet tests.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

/**
 * HTTP methods the Todo service exposes.
 */
export type HttpMethod = `GET` | `POST` | `PUT` | `DELETE`

/**
 * Username and password for HTTP Basic authentication.
 */
export interface BasicCredentials {
  username: string
  password: string
}

/**
 * Pagination for the list endpoint.
 */
export interface ListTodosQuery {
  /**
   * Number of todos to skip.
   */
  offset?: number

  /**
   * Maximum number of todos to return.
   */
  limit?: number
}

/**
 * Options for the TodoApiClient constructor.
 */
export interface TodoApiClientOptions {
  /**
   * Base URL of the Todo service, e.g. "http://localhost:8080".
   */
  baseUrl: string | URL

  /**
   * Credentials sent with authorized calls (DELETE).
   */
  credentials?: BasicCredentials

  /**
   * Extra headers sent with every request.
   */
  headers?: Record<string, string>

  /**
   * Custom fetch implementation. Defaults to globalThis.fetch.
   */
  fetch?: typeof globalThis.fetch

  /**
   * AbortSignal cancelling every request made by this client.
   */
  signal?: AbortSignal

  /**
   * Per-request timeout in milliseconds. Unbounded when omitted.
   */
  requestTimeoutMs?: number

  /**
   * Defaults to console.
   */
  logger?: Logger
}
