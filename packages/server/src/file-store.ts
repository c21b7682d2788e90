/**
 * File-backed todo storage using LMDB.
 */

import * as path from "node:path"
import { open as openLMDB } from "lmdb"
import { isTodo } from "@todo-probe/client"
import { TodoConflictError, TodoNotFoundError } from "./error"
import type { RootDatabase } from "lmdb"
import type { Logger, Todo, TodoId } from "@todo-probe/client"
import type { ListOptions, TodoRepository } from "./types"

export interface FileBackedTodoStoreOptions {
  dataDir: string

  /**
   * Defaults to console.
   */
  logger?: Logger
}

/**
 * File-backed implementation of TodoStore, keyed by id.
 * Lists in ascending id order and survives a restart on the same dataDir.
 */
export class FileBackedTodoStore implements TodoRepository {
  private db: RootDatabase<unknown, TodoId>
  private logger: Logger

  constructor(options: FileBackedTodoStoreOptions) {
    this.logger = options.logger ?? console
    this.db = openLMDB<unknown, TodoId>({
      path: path.join(options.dataDir, `todos.lmdb`),
      compression: true,
    })

    this.recover()
  }

  /**
   * Drop entries that no longer decode as todos.
   */
  private recover(): void {
    let recovered = 0
    let removed = 0

    // Convert to array to avoid iterator issues while removing
    const entries = Array.from(this.db.getRange())

    for (const { key, value } of entries) {
      if (isTodo(value) && value.id === key) {
        recovered++
      } else {
        this.logger.warn(
          `[FileBackedTodoStore] Recovery: removing unreadable entry ${key}`
        )
        this.db.removeSync(key)
        removed++
      }
    }

    if (recovered > 0 || removed > 0) {
      this.logger.info(
        `[FileBackedTodoStore] Recovery complete: ${recovered} todo(s), ${removed} removed`
      )
    }
  }

  get size(): number {
    return this.db.getKeysCount()
  }

  list(options: ListOptions = {}): Array<Todo> {
    const todos: Array<Todo> = []
    const range = this.db.getRange({
      offset: options.offset,
      limit: options.limit,
    })

    for (const { value } of range) {
      if (isTodo(value)) todos.push(value)
    }
    return todos
  }

  get(id: TodoId): Todo | undefined {
    const value = this.db.get(id)
    return isTodo(value) ? value : undefined
  }

  has(id: TodoId): boolean {
    return this.db.get(id) !== undefined
  }

  create(todo: Todo): Todo {
    if (this.has(todo.id)) {
      throw new TodoConflictError(todo.id)
    }
    this.db.putSync(todo.id, toRecord(todo))
    return toRecord(todo)
  }

  update(todo: Todo): Todo {
    if (!this.has(todo.id)) {
      throw new TodoNotFoundError(todo.id)
    }
    this.db.putSync(todo.id, toRecord(todo))
    return toRecord(todo)
  }

  delete(id: TodoId): boolean {
    if (!this.has(id)) return false
    return this.db.removeSync(id)
  }

  clear(): void {
    this.db.clearSync()
  }

  async close(): Promise<void> {
    await this.db.close()
  }
}

function toRecord(todo: Todo): Todo {
  return { id: todo.id, text: todo.text, completed: todo.completed }
}
