/**
 * Todo Client Error Classes
 */

/**
 * Error thrown when the service answers a helper call with an unexpected status.
 * Plain request methods never throw this; they hand back the response.
 */
export class TodoApiError extends Error {
  readonly status: number
  readonly body: string
  readonly method: string
  readonly url: string

  constructor(
    status: number,
    body: string,
    method: string,
    url: string,
    message?: string
  ) {
    super(message ?? `${method} ${url} failed with status ${status}: ${body}`)
    this.name = `TodoApiError`
    this.status = status
    this.body = body
    this.method = method
    this.url = url
  }
}

/**
 * Error thrown when a response body is not what the contract promises.
 */
export class InvalidResponseError extends Error {
  readonly body: string

  constructor(message: string, body: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = `InvalidResponseError`
    this.body = body
  }
}

/**
 * Error thrown when a client is created without a base URL.
 */
export class MissingBaseUrlError extends Error {
  constructor() {
    super(`Invalid client options: missing required baseUrl`)
    this.name = `MissingBaseUrlError`
  }
}

/**
 * Error thrown when configuration values cannot be used.
 */
export class InvalidConfigError extends Error {
  /**
   * Name of the offending setting.
   */
  readonly key: string

  constructor(key: string, message: string) {
    super(`Invalid configuration for ${key}: ${message}`)
    this.name = `InvalidConfigError`
    this.key = key
  }
}
