/**
 * Waiting Errors
 */

/**
 * Error thrown when a wait exceeds its timeout.
 */
export class TimeoutError extends Error {
  /**
   * The timeout duration in milliseconds that was exceeded.
   */
  readonly timeout: number

  constructor(timeout: number, message?: string) {
    super(message ?? `Operation timed out after ${timeout}ms`)
    this.name = `TimeoutError`
    this.timeout = timeout
  }
}

/**
 * Error thrown when a wait is cancelled through its AbortSignal.
 */
export class AbortedError extends Error {
  constructor(message = `Operation aborted`, options?: { cause?: unknown }) {
    super(message, options)
    this.name = `AbortedError`
  }
}
