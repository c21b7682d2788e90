/**
 * Error thrown when the notification channel cannot be opened.
 */
export class ConnectionError extends Error {
  readonly url: string

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = `ConnectionError`
    this.url = url
  }
}
