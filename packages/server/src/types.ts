/**
 * Types for the in-process Todo test server.
 */

import type { Logger, Todo, TodoId } from "@todo-probe/client"

/**
 * Pagination applied to list reads.
 */
export interface ListOptions {
  offset?: number
  limit?: number
}

/**
 * Storage contract shared by the in-memory and file-backed stores.
 */
export interface TodoRepository {
  /**
   * Number of stored todos.
   */
  readonly size: number

  list(options?: ListOptions): Array<Todo>
  get(id: TodoId): Todo | undefined
  has(id: TodoId): boolean

  /**
   * @throws {TodoConflictError} if a todo with the same id exists
   */
  create(todo: Todo): Todo

  /**
   * @throws {TodoNotFoundError} if no todo has this id
   */
  update(todo: Todo): Todo

  /**
   * @returns false if no todo had this id
   */
  delete(id: TodoId): boolean

  clear(): void
  close(): Promise<void>
}

/**
 * Event data for todo lifecycle hooks.
 */
export interface TodoLifecycleEvent {
  type: `created` | `updated` | `deleted`

  id: TodoId

  /**
   * Stored todo (absent for `deleted` events).
   */
  todo?: Todo

  timestamp: number
}

/**
 * Hook function called after a todo is created, updated or deleted.
 */
export type TodoLifecycleHook = (
  event: TodoLifecycleEvent
) => void | Promise<void>

/**
 * Options for creating the test server.
 */
export interface TestServerOptions {
  /**
   * Port to listen on. Default: 0 (auto-assign).
   */
  port?: number

  /**
   * Host to bind to. Default: "127.0.0.1".
   */
  host?: string

  /**
   * Data directory for file-backed storage.
   * If provided, todos are kept in LMDB; otherwise in memory.
   */
  dataDir?: string

  /**
   * Credentials required by DELETE. Default: admin / admin.
   */
  adminUsername?: string
  adminPassword?: string

  /**
   * Path of the push-notification channel. Default: "/ws".
   */
  wsPath?: string

  onTodoCreated?: TodoLifecycleHook
  onTodoUpdated?: TodoLifecycleHook
  onTodoDeleted?: TodoLifecycleHook

  /**
   * Defaults to console.
   */
  logger?: Logger
}

/**
 * Payload pushed to subscribers when a todo is created.
 */
export interface NewTodoMessage extends Todo {
  type: `new_todo`
}
