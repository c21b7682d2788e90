/**
 * Store errors, mapped to HTTP statuses by the server.
 */

import type { TodoId } from "@todo-probe/client"

/**
 * A todo with this id already exists.
 */
export class TodoConflictError extends Error {
  readonly id: TodoId

  constructor(id: TodoId) {
    super(`Todo ${id} already exists`)
    this.name = `TodoConflictError`
    this.id = id
  }
}

export class TodoNotFoundError extends Error {
  readonly id: TodoId

  constructor(id: TodoId) {
    super(`Todo ${id} not found`)
    this.name = `TodoNotFoundError`
    this.id = id
  }
}

/**
 * A request body or parameter does not describe a valid todo.
 */
export class TodoValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = `TodoValidationError`
  }
}
