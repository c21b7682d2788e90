/**
 * NotificationClient - buffers messages pushed over the notification channel.
 */

import { WebSocket } from "ws"
import { CountdownLatch, sleep } from "@todo-probe/promises"
import { ConnectionError } from "./error"
import type { RawData } from "ws"
import type { Logger, SuiteConfig } from "@todo-probe/client"

/**
 * Lifecycle of the underlying connection.
 * There is no automatic reconnection: a closed client stays disconnected
 * until connect() is called again.
 */
export type ConnectionState = `disconnected` | `connecting` | `open` | `closing`

/**
 * Caller hooks, invoked after the client has updated its own state.
 */
export interface NotificationHandlers {
  onOpen?: () => void
  onMessage?: (message: string) => void
  onClose?: (code: number, reason: string) => void
  onError?: (error: Error) => void
}

export interface NotificationClientOptions {
  /**
   * WebSocket URL of the notification channel.
   */
  url: string | URL

  /**
   * How long connect() waits for the handshake. Default: 5000.
   */
  connectTimeoutMs?: number

  handlers?: NotificationHandlers

  /**
   * Defaults to console.
   */
  logger?: Logger
}

interface PendingConnect {
  socket: WebSocket
  timeoutId: ReturnType<typeof setTimeout>
  resolve: () => void
  reject: (error: ConnectionError) => void
}

/**
 * Long-lived client for the push channel.
 *
 * Every inbound message is appended to an unbounded buffer in arrival order.
 * Tests arm a countdown with waitForMessages() before triggering the action
 * that should push, then inspect or clear the buffer.
 *
 * @example
 * ```typescript
 * const notifications = NotificationClient.fromConfig(config)
 * await notifications.connect()
 *
 * const arrived = notifications.waitForMessages(1, 5)
 * await api.createTodo(createTodoWithText(`Buy milk`))
 *
 * expect(await arrived).toBe(true)
 * expect(notifications.getReceivedMessages()).toHaveLength(1)
 * ```
 */
export class NotificationClient {
  /**
   * Endpoint the client connects to. Never changes, reconnect() included.
   */
  readonly url: string

  #state: ConnectionState = `disconnected`
  #connected = false
  #socket: WebSocket | null = null
  #pendingConnect: PendingConnect | null = null
  #closeWaiters: Array<() => void> = []
  #messages: Array<string> = []
  #latch: CountdownLatch | null = null

  readonly #connectTimeoutMs: number
  readonly #handlers: NotificationHandlers
  readonly #logger: Logger

  constructor(opts: NotificationClientOptions) {
    this.url = opts.url instanceof URL ? opts.url.toString() : opts.url
    this.#connectTimeoutMs = opts.connectTimeoutMs ?? 5_000
    this.#handlers = opts.handlers ?? {}
    this.#logger = opts.logger ?? console
  }

  /**
   * Create a client for the channel named by a suite configuration.
   */
  static fromConfig(
    config: SuiteConfig,
    opts: Omit<NotificationClientOptions, `url`> = {}
  ): NotificationClient {
    return new NotificationClient({ ...opts, url: config.wsUrl })
  }

  get state(): ConnectionState {
    return this.#state
  }

  // ============================================================================
  // Connection
  // ============================================================================

  /**
   * Open the connection. Resolves once the handshake completes.
   * A no-op when already open.
   *
   * @throws {ConnectionError} on timeout, on a transport error before open,
   * or when called while connecting or closing
   */
  connect(): Promise<void> {
    if (this.#state === `open`) {
      return Promise.resolve()
    }
    if (this.#state !== `disconnected`) {
      return Promise.reject(
        new ConnectionError(this.url, `Cannot connect while ${this.#state}`)
      )
    }

    this.#state = `connecting`
    const socket = new WebSocket(this.url)
    this.#socket = socket

    socket.on(`open`, () => {
      if (this.#socket === socket) this.#handleOpen()
    })
    socket.on(`message`, (data: RawData) => {
      if (this.#socket === socket) this.#handleMessage(decodeMessage(data))
    })
    socket.on(`close`, (code: number, reason: Buffer) => {
      if (this.#socket === socket) {
        this.#handleClose(code, reason.toString(`utf8`))
      }
    })
    socket.on(`error`, (error: Error) => {
      if (this.#socket === socket) this.#handleError(error)
    })

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.#abandonConnect(
          `Timed out connecting to ${this.url} after ${this.#connectTimeoutMs}ms`
        )
      }, this.#connectTimeoutMs)

      this.#pendingConnect = { socket, timeoutId, resolve, reject }
    })
  }

  /**
   * Close the connection and wait for the close event.
   * A connection attempt still in progress is abandoned instead.
   * A no-op when nothing is open.
   */
  async close(): Promise<void> {
    const socket = this.#socket
    if (!socket) return

    if (this.#state === `connecting`) {
      this.#abandonConnect(`Connection to ${this.url} closed before it opened`)
      return
    }

    const closed = new Promise<void>((resolve) => {
      this.#closeWaiters.push(resolve)
    })

    if (this.#state === `open`) {
      this.#state = `closing`
      socket.close(1000, `Client closing`)
    }

    await closed
  }

  /**
   * Drop the current connection and reset the buffer.
   * The endpoint is kept and no new connection is opened; call connect()
   * afterwards to resume listening.
   */
  async reconnect(): Promise<void> {
    this.#logger.info(`[NotificationClient] Resetting connection to ${this.url}`)

    await this.close()

    this.#messages = []
    this.#latch = null
    this.#connected = false
    this.#state = `disconnected`
  }

  /**
   * Whether the last connection event was an open.
   */
  isConnected(): boolean {
    return this.#connected
  }

  // ============================================================================
  // Buffer
  // ============================================================================

  /**
   * Wait for `count` messages to arrive after this call.
   *
   * The countdown is armed synchronously, so arm it before triggering the
   * action that pushes. Resolves `false` once `timeoutSeconds` elapse;
   * later arrivals do not change the result. A new call replaces the armed
   * countdown, and an earlier waiter then resolves `false` at its deadline.
   * A fractional count is rounded up; a count that is not finite can never
   * be reached and resolves `false` at the deadline.
   */
  async waitForMessages(count: number, timeoutSeconds: number): Promise<boolean> {
    if (count <= 0) {
      this.#latch = null
      return true
    }

    if (!Number.isFinite(count)) {
      this.#latch = null
      await sleep(timeoutSeconds * 1_000)
      return false
    }

    const latch = new CountdownLatch(Math.ceil(count))
    this.#latch = latch

    const released = await latch.wait(timeoutSeconds * 1_000)
    if (this.#latch === latch) {
      this.#latch = null
    }
    return released
  }

  /**
   * Copy of the buffered messages in arrival order.
   */
  getReceivedMessages(): Array<string> {
    return [...this.#messages]
  }

  /**
   * Empty the buffer. The connection is left alone.
   */
  clearMessages(): void {
    this.#messages = []
  }

  // ============================================================================
  // Event handling
  // ============================================================================

  #handleOpen(): void {
    this.#state = `open`
    this.#connected = true
    this.#logger.info(`[NotificationClient] Connected to ${this.url}`)

    const pending = this.#pendingConnect
    if (pending) {
      clearTimeout(pending.timeoutId)
      this.#pendingConnect = null
      pending.resolve()
    }

    this.#handlers.onOpen?.()
  }

  #handleMessage(message: string): void {
    this.#messages.push(message)
    this.#latch?.countDown()
    this.#handlers.onMessage?.(message)
  }

  #handleClose(code: number, reason: string): void {
    this.#state = `disconnected`
    this.#connected = false
    this.#socket = null
    this.#logger.info(
      `[NotificationClient] Connection closed (${code}${reason ? `: ${reason}` : ``})`
    )

    const pending = this.#pendingConnect
    if (pending) {
      clearTimeout(pending.timeoutId)
      this.#pendingConnect = null
      pending.reject(
        new ConnectionError(
          this.url,
          `Connection to ${this.url} closed before it opened (${code})`
        )
      )
    }

    const waiters = this.#closeWaiters
    this.#closeWaiters = []
    for (const resolve of waiters) {
      resolve()
    }

    this.#handlers.onClose?.(code, reason)
  }

  #handleError(error: Error): void {
    this.#logger.error(`[NotificationClient] Error: ${error.message}`)

    const pending = this.#pendingConnect
    if (pending) {
      clearTimeout(pending.timeoutId)
      this.#pendingConnect = null
      this.#socket = null
      this.#state = `disconnected`
      this.#connected = false
      pending.reject(
        new ConnectionError(
          this.url,
          `Failed to connect to ${this.url}: ${error.message}`,
          { cause: error }
        )
      )
    }

    this.#handlers.onError?.(error)
  }

  /**
   * Give up on the connection attempt in progress and tear its socket down.
   */
  #abandonConnect(message: string): void {
    const pending = this.#pendingConnect
    if (!pending) return

    clearTimeout(pending.timeoutId)
    this.#pendingConnect = null
    if (this.#socket === pending.socket) {
      this.#socket = null
      this.#state = `disconnected`
      this.#connected = false
    }
    pending.socket.terminate()
    pending.reject(new ConnectionError(this.url, message))
  }
}

function decodeMessage(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString(`utf8`)
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString(`utf8`)
  return data.toString(`utf8`)
}
