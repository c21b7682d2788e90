/**
 * ApiResponse - a fully read HTTP response from the Todo service.
 */

import { CONTENT_TYPE_HEADER } from "./constants"
import { InvalidResponseError } from "./error"
import { parseTodo, parseTodoList } from "./todo"
import type { Todo } from "./todo"

/**
 * Values needed to build an ApiResponse.
 */
export interface ApiResponseInit {
  method: string
  url: string
  status: number
  statusText?: string
  headers?: Headers
  body?: string
}

/**
 * Response of a single request, with the body already read as text.
 *
 * Request methods never throw on HTTP status; tests assert on `status`,
 * `contentType` and the decoded body.
 */
export class ApiResponse {
  readonly method: string
  readonly url: string
  readonly status: number
  readonly statusText: string
  readonly headers: Headers
  readonly body: string

  constructor(init: ApiResponseInit) {
    this.method = init.method
    this.url = init.url
    this.status = init.status
    this.statusText = init.statusText ?? ``
    this.headers = init.headers ?? new Headers()
    this.body = init.body ?? ``
  }

  /**
   * Read a fetch Response to completion.
   * `url` is the requested URL; mocked responses carry none of their own.
   */
  static async from(
    method: string,
    url: string,
    response: Response
  ): Promise<ApiResponse> {
    const body = await response.text()
    return new ApiResponse({
      method,
      url,
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      body,
    })
  }

  /**
   * True for 2xx statuses.
   */
  get ok(): boolean {
    return this.status >= 200 && this.status < 300
  }

  /**
   * Media type of the body without parameters, lower-cased.
   * `application/json; charset=utf-8` becomes `application/json`.
   */
  get contentType(): string | undefined {
    const value = this.headers.get(CONTENT_TYPE_HEADER)
    if (value === null) return undefined
    const mediaType = value.split(`;`)[0]?.trim().toLowerCase()
    return mediaType ? mediaType : undefined
  }

  header(name: string): string | undefined {
    return this.headers.get(name) ?? undefined
  }

  /**
   * Decode the body as JSON.
   * @throws {InvalidResponseError} if the body is not valid JSON
   */
  json(): unknown {
    try {
      const value: unknown = JSON.parse(this.body)
      return value
    } catch (error) {
      throw new InvalidResponseError(
        `${this.toString()} returned a body that is not JSON`,
        this.body,
        { cause: error }
      )
    }
  }

  /**
   * Decode the body as a list of todos.
   */
  todos(): Array<Todo> {
    return parseTodoList(this.json(), this.body)
  }

  /**
   * Decode the body as a single todo.
   */
  todo(): Todo {
    return parseTodo(this.json(), this.body)
  }

  toString(): string {
    return `${this.method} ${this.url} -> ${this.status}`
  }
}
