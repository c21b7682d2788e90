/**
 * In-memory todo storage.
 */

import { TodoConflictError, TodoNotFoundError } from "./error"
import type { Todo, TodoId } from "@todo-probe/client"
import type { ListOptions, TodoRepository } from "./types"

/**
 * Apply offset/limit to an ordered list.
 */
export function paginate<T>(items: Array<T>, options: ListOptions = {}): Array<T> {
  const start = options.offset ?? 0
  const end = options.limit === undefined ? undefined : start + options.limit
  return items.slice(start, end)
}

/**
 * In-memory store for todos. Lists in insertion order.
 */
export class TodoStore implements TodoRepository {
  private todos = new Map<TodoId, Todo>()

  get size(): number {
    return this.todos.size
  }

  list(options?: ListOptions): Array<Todo> {
    return paginate(Array.from(this.todos.values()), options).map(copy)
  }

  get(id: TodoId): Todo | undefined {
    const todo = this.todos.get(id)
    return todo ? copy(todo) : undefined
  }

  has(id: TodoId): boolean {
    return this.todos.has(id)
  }

  create(todo: Todo): Todo {
    if (this.todos.has(todo.id)) {
      throw new TodoConflictError(todo.id)
    }
    this.todos.set(todo.id, copy(todo))
    return copy(todo)
  }

  /**
   * Replace a todo. Its position in the listing is kept.
   */
  update(todo: Todo): Todo {
    if (!this.todos.has(todo.id)) {
      throw new TodoNotFoundError(todo.id)
    }
    this.todos.set(todo.id, copy(todo))
    return copy(todo)
  }

  delete(id: TodoId): boolean {
    return this.todos.delete(id)
  }

  clear(): void {
    this.todos.clear()
  }

  close(): Promise<void> {
    return Promise.resolve()
  }
}

function copy(todo: Todo): Todo {
  return { id: todo.id, text: todo.text, completed: todo.completed }
}
