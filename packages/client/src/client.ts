/**
 * TodoApiClient - HTTP access to the Todo service under test.
 */

import { createTimeoutSignal } from "@todo-probe/promises"
import {
  APPLICATION_JSON,
  AUTHORIZATION_HEADER,
  CONTENT_TYPE_HEADER,
  LIMIT_QUERY_PARAM,
  OFFSET_QUERY_PARAM,
  STATUS_CREATED,
  STATUS_NO_CONTENT,
  STATUS_NOT_FOUND,
  STATUS_OK,
  TODOS_ENDPOINT,
  todoPath,
} from "./constants"
import { InvalidResponseError, MissingBaseUrlError, TodoApiError } from "./error"
import { ApiResponse } from "./response"
import { createCustomTodo } from "./todo"
import type { SuiteConfig } from "./config"
import type { Todo, TodoDraft, TodoId } from "./todo"
import type {
  BasicCredentials,
  HttpMethod,
  ListTodosQuery,
  Logger,
  TodoApiClientOptions,
} from "./types"

interface RequestOptions {
  query?: Record<string, string>
  headers?: Record<string, string>
  json?: unknown
}

/**
 * Build an HTTP Basic `Authorization` header value.
 *
 * @example
 * ```typescript
 * basicAuthHeader(`admin`, `admin`) // "Basic YWRtaW46YWRtaW4="
 * ```
 */
export function basicAuthHeader(username: string, password: string): string {
  const token = Buffer.from(`${username}:${password}`, `utf8`).toString(
    `base64`
  )
  return `Basic ${token}`
}

/**
 * Client for the Todo HTTP API.
 *
 * Request methods resolve with an ApiResponse whatever the status, so
 * negative cases can assert on 400/401/404. Helper methods (fetchTodos,
 * createTestTodo, cleanUpAllTodos) throw TodoApiError on unexpected status.
 * Nothing is retried.
 *
 * @example
 * ```typescript
 * const client = TodoApiClient.fromConfig(loadConfig())
 * const response = await client.createTodo(createTodoWithText(`Buy milk`))
 * expect(response.status).toBe(201)
 * ```
 */
export class TodoApiClient {
  /**
   * Base URL without a trailing slash.
   */
  readonly baseUrl: string

  readonly #credentials?: BasicCredentials
  readonly #headers: Record<string, string>
  readonly #fetchClient: typeof fetch
  readonly #signal?: AbortSignal
  readonly #requestTimeoutMs?: number
  readonly #logger: Logger

  constructor(opts: TodoApiClientOptions) {
    if (!opts.baseUrl) {
      throw new MissingBaseUrlError()
    }
    const urlStr =
      opts.baseUrl instanceof URL ? opts.baseUrl.toString() : opts.baseUrl
    this.baseUrl = urlStr.replace(/\/+$/, ``)
    this.#credentials = opts.credentials
    this.#headers = { ...opts.headers }
    this.#fetchClient =
      opts.fetch ?? ((...args: Parameters<typeof fetch>) => fetch(...args))
    this.#signal = opts.signal
    this.#requestTimeoutMs = opts.requestTimeoutMs
    this.#logger = opts.logger ?? console
  }

  /**
   * Create a client for the service described by a suite configuration.
   */
  static fromConfig(
    config: SuiteConfig,
    opts: Omit<TodoApiClientOptions, `baseUrl` | `credentials`> = {}
  ): TodoApiClient {
    return new TodoApiClient({
      requestTimeoutMs: config.requestTimeoutMs,
      ...opts,
      baseUrl: config.baseUrl,
      credentials: {
        username: config.adminUsername,
        password: config.adminPassword,
      },
    })
  }

  // ============================================================================
  // Requests
  // ============================================================================

  /**
   * GET /todos, optionally paginated.
   */
  async listTodos(query: ListTodosQuery = {}): Promise<ApiResponse> {
    const params: Record<string, string> = {}
    if (query.offset !== undefined) {
      params[OFFSET_QUERY_PARAM] = String(query.offset)
    }
    if (query.limit !== undefined) {
      params[LIMIT_QUERY_PARAM] = String(query.limit)
    }
    return this.#request(`GET`, TODOS_ENDPOINT, { query: params })
  }

  /**
   * GET /todos with raw query parameters, for malformed paging.
   */
  async listTodosWithParams(
    params: Record<string, string>
  ): Promise<ApiResponse> {
    return this.#request(`GET`, TODOS_ENDPOINT, { query: params })
  }

  async getTodo(id: TodoId | string): Promise<ApiResponse> {
    return this.#request(`GET`, todoPath(id))
  }

  /**
   * POST /todos. Fields missing from the draft are not sent.
   */
  async createTodo(todo: TodoDraft): Promise<ApiResponse> {
    return this.#request(`POST`, TODOS_ENDPOINT, { json: todo })
  }

  /**
   * POST /todos with an arbitrary JSON body.
   */
  async createTodoRaw(body: unknown): Promise<ApiResponse> {
    return this.#request(`POST`, TODOS_ENDPOINT, { json: body })
  }

  async updateTodo(id: TodoId | string, todo: TodoDraft): Promise<ApiResponse> {
    return this.#request(`PUT`, todoPath(id), { json: todo })
  }

  async updateTodoRaw(id: TodoId | string, body: unknown): Promise<ApiResponse> {
    return this.#request(`PUT`, todoPath(id), { json: body })
  }

  /**
   * DELETE /todos/{id} with the configured admin credentials.
   * Sent without authorization when the client has no credentials.
   */
  async deleteTodo(id: TodoId | string): Promise<ApiResponse> {
    const headers: Record<string, string> = {}
    if (this.#credentials) {
      headers[AUTHORIZATION_HEADER] = basicAuthHeader(
        this.#credentials.username,
        this.#credentials.password
      )
    }
    return this.#request(`DELETE`, todoPath(id), { headers })
  }

  async deleteTodoWithoutAuth(id: TodoId | string): Promise<ApiResponse> {
    return this.#request(`DELETE`, todoPath(id))
  }

  /**
   * DELETE /todos/{id} with a caller-supplied Authorization header.
   */
  async deleteTodoWithAuthorization(
    id: TodoId | string,
    authorization: string
  ): Promise<ApiResponse> {
    return this.#request(`DELETE`, todoPath(id), {
      headers: { [AUTHORIZATION_HEADER]: authorization },
    })
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  /**
   * List todos and decode them.
   * @throws {TodoApiError} if the service does not answer 200
   */
  async fetchTodos(query?: ListTodosQuery): Promise<Array<Todo>> {
    const response = await this.listTodos(query)
    if (response.status !== STATUS_OK) {
      throw apiError(response)
    }
    return response.todos()
  }

  /**
   * Look a todo up in the full list.
   */
  async findTodo(id: TodoId): Promise<Todo | undefined> {
    const todos = await this.fetchTodos()
    return todos.find((todo) => todo.id === id)
  }

  /**
   * Create a todo with a fresh id and read it back from the list.
   *
   * @throws {TodoApiError} if creation is not answered with 201 or 200
   * @throws {InvalidResponseError} if the created todo is not listed
   */
  async createTestTodo(text: string, completed = false): Promise<Todo> {
    const todo = createCustomTodo(text, completed)
    const response = await this.createTodo(todo)

    if (response.status !== STATUS_CREATED && response.status !== STATUS_OK) {
      this.#logger.error(
        `[TodoApiClient] Failed to create test todo ${todo.id}: ${response.status} ${response.body}`
      )
      throw apiError(response, `Failed to create test todo ${todo.id}`)
    }

    const created = await this.findTodo(todo.id)
    if (!created) {
      throw new InvalidResponseError(
        `Created todo ${todo.id} is missing from the todo list`,
        response.body
      )
    }
    return created
  }

  /**
   * Delete every todo the service lists.
   * Todos that vanish in between (404) are skipped.
   *
   * @returns number of todos deleted
   * @throws {TodoApiError} if a delete is answered with anything else
   */
  async cleanUpAllTodos(): Promise<number> {
    const todos = await this.fetchTodos()
    let deleted = 0

    for (const todo of todos) {
      const response = await this.deleteTodo(todo.id)
      if (response.status === STATUS_NO_CONTENT) {
        deleted++
      } else if (response.status !== STATUS_NOT_FOUND) {
        throw apiError(response, `Failed to delete todo ${todo.id}`)
      }
    }

    if (deleted > 0) {
      this.#logger.debug(`[TodoApiClient] Cleaned up ${deleted} todo(s)`)
    }
    return deleted
  }

  // ============================================================================
  // Private
  // ============================================================================

  async #request(
    method: HttpMethod,
    path: string,
    init: RequestOptions = {}
  ): Promise<ApiResponse> {
    const fetchUrl = new URL(`${this.baseUrl}${path}`)
    for (const [key, value] of Object.entries(init.query ?? {})) {
      fetchUrl.searchParams.set(key, value)
    }

    const requestHeaders: Record<string, string> = {
      accept: APPLICATION_JSON,
      ...this.#headers,
      ...init.headers,
    }

    let body: string | undefined
    if (init.json !== undefined) {
      requestHeaders[CONTENT_TYPE_HEADER] = APPLICATION_JSON
      body = JSON.stringify(init.json)
    }

    const { signal, cleanup } = createTimeoutSignal(
      this.#requestTimeoutMs,
      this.#signal
    )

    this.#logger.debug(
      `[TodoApiClient] ${method} ${fetchUrl.pathname}${fetchUrl.search}`
    )

    try {
      const response = await this.#fetchClient(fetchUrl.toString(), {
        method,
        headers: requestHeaders,
        body,
        signal,
      })
      return await ApiResponse.from(method, fetchUrl.toString(), response)
    } finally {
      cleanup()
    }
  }
}

function apiError(response: ApiResponse, message?: string): TodoApiError {
  return new TodoApiError(
    response.status,
    response.body,
    response.method,
    response.url,
    message
  )
}
