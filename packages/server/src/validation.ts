/**
 * Request validation for the Todo test server.
 */

import { isTodo } from "@todo-probe/client"
import { TodoValidationError } from "./error"
import type { Todo, TodoId } from "@todo-probe/client"
import type { ListOptions } from "./types"

const TODO_FIELDS = [`id`, `text`, `completed`] as const

/**
 * Decode and validate a todo request body.
 * @throws {TodoValidationError} on invalid JSON, missing or mistyped fields
 */
export function parseTodoBody(body: string): Todo {
  const parsed = decodeJson(body)

  if (typeof parsed !== `object` || parsed === null || Array.isArray(parsed)) {
    throw new TodoValidationError(`Expected a todo object`)
  }

  const missing = TODO_FIELDS.filter((field) => !(field in parsed))
  if (missing.length > 0) {
    throw new TodoValidationError(`Missing field(s): ${missing.join(`, `)}`)
  }

  if (!isTodo(parsed)) {
    throw new TodoValidationError(
      `Expected id to be an integer, text a string and completed a boolean`
    )
  }

  if (!Number.isSafeInteger(parsed.id) || parsed.id < 0) {
    throw new TodoValidationError(`id must be a non-negative integer`)
  }

  return { id: parsed.id, text: parsed.text, completed: parsed.completed }
}

function decodeJson(body: string): unknown {
  try {
    const value: unknown = JSON.parse(body)
    return value
  } catch {
    throw new TodoValidationError(`Invalid JSON`)
  }
}

/**
 * Parse the id segment of `/todos/{id}`.
 * Returns undefined for anything that cannot name a stored todo.
 */
export function parsePathId(segment: string): TodoId | undefined {
  if (!/^\d+$/.test(segment)) return undefined
  const id = Number(segment)
  return Number.isSafeInteger(id) ? id : undefined
}

/**
 * Parse `offset` and `limit` query parameters.
 * @throws {TodoValidationError} if a value is not a non-negative integer or repeats
 */
export function parsePaging(params: URLSearchParams): ListOptions {
  return {
    offset: parseCount(params, `offset`),
    limit: parseCount(params, `limit`),
  }
}

function parseCount(params: URLSearchParams, name: string): number | undefined {
  const values = params.getAll(name)
  if (values.length === 0) return undefined
  if (values.length > 1) {
    throw new TodoValidationError(`Multiple ${name} parameters not allowed`)
  }

  const [value = ``] = values
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(Number(value))) {
    throw new TodoValidationError(`Invalid ${name} parameter: ${value}`)
  }
  return Number(value)
}

/**
 * Check an Authorization header against the admin credentials.
 */
export function isAuthorized(
  header: string | undefined,
  username: string,
  password: string
): boolean {
  const match = /^Basic\s+(\S+)$/i.exec(header ?? ``)
  const token = match?.[1]
  if (!token) return false

  const decoded = Buffer.from(token, `base64`).toString(`utf8`)
  const separator = decoded.indexOf(`:`)
  if (separator < 0) return false

  return (
    decoded.slice(0, separator) === username &&
    decoded.slice(separator + 1) === password
  )
}
