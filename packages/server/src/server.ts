/**
 * HTTP and WebSocket server for Todo API testing.
 */

import { createServer } from "node:http"
import { WebSocket, WebSocketServer } from "ws"
import {
  APPLICATION_JSON,
  CONTENT_TYPE_HEADER,
  NOTIFICATIONS_PATH,
  STATUS_BAD_REQUEST,
  STATUS_CREATED,
  STATUS_NOT_FOUND,
  STATUS_NO_CONTENT,
  STATUS_OK,
  STATUS_UNAUTHORIZED,
  TODOS_ENDPOINT,
} from "@todo-probe/client"
import { TodoStore } from "./store"
import { FileBackedTodoStore } from "./file-store"
import {
  TodoConflictError,
  TodoNotFoundError,
  TodoValidationError,
} from "./error"
import {
  isAuthorized,
  parsePaging,
  parsePathId,
  parseTodoBody,
} from "./validation"
import type { IncomingMessage, Server, ServerResponse } from "node:http"
import type { Logger, Todo } from "@todo-probe/client"
import type {
  NewTodoMessage,
  TestServerOptions,
  TodoLifecycleEvent,
  TodoLifecycleHook,
} from "./types"

type ResolvedOptions = Required<
  Omit<
    TestServerOptions,
    `dataDir` | `onTodoCreated` | `onTodoUpdated` | `onTodoDeleted` | `logger`
  >
> & {
  dataDir?: string
  onTodoCreated?: TodoLifecycleHook
  onTodoUpdated?: TodoLifecycleHook
  onTodoDeleted?: TodoLifecycleHook
}

/**
 * In-process Todo service.
 *
 * Serves the `/todos` REST API and pushes a `new_todo` message to every
 * WebSocket subscriber of the notification path on each creation.
 * Supports both in-memory and file-backed storage modes.
 */
export class TodoTestServer {
  readonly store: TodoStore | FileBackedTodoStore
  private server: Server | null = null
  private wss: WebSocketServer | null = null
  private options: ResolvedOptions
  private logger: Logger
  private _url: string | null = null
  private _connectionCount = 0

  constructor(options: TestServerOptions = {}) {
    this.logger = options.logger ?? console

    // Choose store based on dataDir option
    if (options.dataDir) {
      this.store = new FileBackedTodoStore({
        dataDir: options.dataDir,
        logger: this.logger,
      })
    } else {
      this.store = new TodoStore()
    }

    this.options = {
      port: options.port ?? 0,
      host: options.host ?? `127.0.0.1`,
      adminUsername: options.adminUsername ?? `admin`,
      adminPassword: options.adminPassword ?? `admin`,
      wsPath: options.wsPath ?? NOTIFICATIONS_PATH,
      dataDir: options.dataDir,
      onTodoCreated: options.onTodoCreated,
      onTodoUpdated: options.onTodoUpdated,
      onTodoDeleted: options.onTodoDeleted,
    }
  }

  /**
   * Start the server.
   * @returns the base URL
   */
  async start(): Promise<string> {
    if (this.server) {
      throw new Error(`Server already started`)
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.logger.error(`[TodoTestServer] Request error:`, err)
        if (!res.headersSent) {
          res.writeHead(500, { "content-type": `text/plain` })
          res.end(`Internal server error`)
        }
      })
    })

    const wss = new WebSocketServer({ server, path: this.options.wsPath })
    wss.on(`connection`, (socket) => {
      this._connectionCount++
      socket.on(`error`, (err) => {
        this.logger.warn(`[TodoTestServer] Subscriber error:`, err)
      })
    })

    this.server = server
    this.wss = wss

    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => {
        this.server = null
        this.wss = null
        reject(err)
      }
      server.once(`error`, onError)

      server.listen(this.options.port, this.options.host, () => {
        server.off(`error`, onError)
        const addr = server.address()
        const url =
          typeof addr === `string`
            ? addr
            : `http://${this.options.host}:${addr?.port ?? this.options.port}`
        this._url = url
        resolve(url)
      })
    })
  }

  /**
   * Stop the server, disconnecting every subscriber.
   */
  async stop(): Promise<void> {
    const { server, wss } = this
    if (!server) {
      return
    }

    if (wss) {
      for (const client of wss.clients) {
        client.terminate()
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()))
      })
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()))
      server.closeAllConnections()
    })

    await this.store.close()

    this.server = null
    this.wss = null
    this._url = null
  }

  /**
   * Get the server URL.
   */
  get url(): string {
    if (!this._url) {
      throw new Error(`Server not started`)
    }
    return this._url
  }

  /**
   * URL of the push-notification channel.
   */
  get wsUrl(): string {
    return `${this.url.replace(/^http/, `ws`)}${this.options.wsPath}`
  }

  /**
   * Number of subscribers currently connected to the push channel.
   */
  get subscriberCount(): number {
    let count = 0
    for (const client of this.wss?.clients ?? []) {
      if (client.readyState === WebSocket.OPEN) count++
    }
    return count
  }

  /**
   * Number of push-channel connections accepted since start.
   */
  get connectionCount(): number {
    return this._connectionCount
  }

  /**
   * Clear all todos.
   */
  clear(): void {
    this.store.clear()
  }

  // ============================================================================
  // Request handling
  // ============================================================================

  private async handleRequest(
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> {
    const url = new URL(req.url ?? `/`, `http://${req.headers.host}`)
    const path = url.pathname
    const method = req.method?.toUpperCase()

    try {
      if (path === TODOS_ENDPOINT) {
        switch (method) {
          case `GET`:
            this.handleList(url, res)
            return
          case `POST`:
            await this.handleCreate(req, res)
            return
          default:
            this.sendText(res, 405, `Method not allowed`)
            return
        }
      }

      const prefix = `${TODOS_ENDPOINT}/`
      const segment = path.startsWith(prefix) ? path.slice(prefix.length) : ``
      if (segment === `` || segment.includes(`/`)) {
        this.sendText(res, STATUS_NOT_FOUND, `Not found`)
        return
      }

      switch (method) {
        case `GET`:
          this.handleGet(segment, res)
          break
        case `PUT`:
          await this.handleUpdate(segment, req, res)
          break
        case `DELETE`:
          await this.handleDelete(segment, req, res)
          break
        default:
          this.sendText(res, 405, `Method not allowed`)
      }
    } catch (err) {
      if (err instanceof TodoValidationError) {
        this.sendText(res, STATUS_BAD_REQUEST, err.message)
      } else if (err instanceof TodoConflictError) {
        this.sendText(res, STATUS_BAD_REQUEST, err.message)
      } else if (err instanceof TodoNotFoundError) {
        this.sendText(res, STATUS_NOT_FOUND, err.message)
      } else {
        throw err
      }
    }
  }

  /**
   * Handle GET /todos
   */
  private handleList(url: URL, res: ServerResponse): void {
    const paging = parsePaging(url.searchParams)
    this.sendJson(res, STATUS_OK, this.store.list(paging))
  }

  /**
   * Handle GET /todos/{id}
   */
  private handleGet(segment: string, res: ServerResponse): void {
    const id = parsePathId(segment)
    const todo = id === undefined ? undefined : this.store.get(id)
    if (!todo) {
      this.sendText(res, STATUS_NOT_FOUND, `Todo not found`)
      return
    }
    this.sendJson(res, STATUS_OK, todo)
  }

  /**
   * Handle POST /todos
   */
  private async handleCreate(
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> {
    const todo = parseTodoBody(await this.readBody(req))
    const created = this.store.create(todo)

    // Every stored todo is pushed, whatever the hook does
    this.broadcastNewTodo(created)

    await this.runHook(this.options.onTodoCreated, {
      type: `created`,
      id: created.id,
      todo: created,
      timestamp: Date.now(),
    })

    res.writeHead(STATUS_CREATED)
    res.end()
  }

  /**
   * Handle PUT /todos/{id}
   * The body is validated before the todo is looked up.
   */
  private async handleUpdate(
    segment: string,
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> {
    const todo = parseTodoBody(await this.readBody(req))

    const id = parsePathId(segment)
    if (id === undefined) {
      this.sendText(res, STATUS_NOT_FOUND, `Todo not found`)
      return
    }

    if (todo.id !== id) {
      this.sendText(
        res,
        STATUS_BAD_REQUEST,
        `Body id ${todo.id} does not match path id ${id}`
      )
      return
    }

    const updated = this.store.update(todo)

    await this.runHook(this.options.onTodoUpdated, {
      type: `updated`,
      id: updated.id,
      todo: updated,
      timestamp: Date.now(),
    })

    res.writeHead(STATUS_OK)
    res.end()
  }

  /**
   * Handle DELETE /todos/{id}
   */
  private async handleDelete(
    segment: string,
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> {
    const { adminUsername, adminPassword } = this.options
    if (!isAuthorized(req.headers.authorization, adminUsername, adminPassword)) {
      res.writeHead(STATUS_UNAUTHORIZED, {
        "content-type": `text/plain`,
        "www-authenticate": `Basic realm="todos"`,
      })
      res.end(`Unauthorized`)
      return
    }

    const id = parsePathId(segment)
    if (id === undefined || !this.store.delete(id)) {
      this.sendText(res, STATUS_NOT_FOUND, `Todo not found`)
      return
    }

    await this.runHook(this.options.onTodoDeleted, {
      type: `deleted`,
      id,
      timestamp: Date.now(),
    })

    res.writeHead(STATUS_NO_CONTENT)
    res.end()
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private broadcastNewTodo(todo: Todo): void {
    const message: NewTodoMessage = {
      type: `new_todo`,
      id: todo.id,
      text: todo.text,
      completed: todo.completed,
    }
    const payload = JSON.stringify(message)

    for (const client of this.wss?.clients ?? []) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload)
      }
    }
  }

  private async runHook(
    hook: TodoLifecycleHook | undefined,
    event: TodoLifecycleEvent
  ): Promise<void> {
    if (hook) {
      await Promise.resolve(hook(event))
    }
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { [CONTENT_TYPE_HEADER]: APPLICATION_JSON })
    res.end(JSON.stringify(body))
  }

  private sendText(res: ServerResponse, status: number, body: string): void {
    res.writeHead(status, { "content-type": `text/plain` })
    res.end(body)
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Array<Buffer> = []

      req.on(`data`, (chunk: Buffer) => {
        chunks.push(chunk)
      })

      req.on(`end`, () => {
        resolve(Buffer.concat(chunks).toString(`utf8`))
      })

      req.on(`error`, reject)
    })
  }
}
