/**
 * Todo model, builders and guards.
 */

import { InvalidResponseError } from "./error"

/**
 * Caller-chosen todo identifier: a non-negative safe integer.
 */
export type TodoId = number

/**
 * A todo as stored by the service.
 */
export interface Todo {
  id: TodoId
  text: string
  completed: boolean
}

/**
 * A todo with any field left out. Omitted fields are not serialized,
 * which is how negative cases send incomplete payloads.
 */
export type TodoDraft = Partial<Todo>

let lastIssuedId = 0

/**
 * Issue a todo id derived from the current time.
 * Ids are strictly increasing within a process, even within one millisecond.
 */
export function nextTodoId(): TodoId {
  const now = Date.now()
  lastIssuedId = now > lastIssuedId ? now : lastIssuedId + 1
  return lastIssuedId
}

/**
 * Build a text that no other call in this process returns.
 */
export function uniqueText(prefix: string): string {
  return `${prefix}_${nextTodoId()}`
}

export function createDefaultTodo(): Todo {
  return createCustomTodo(`Test TODO`, false)
}

export function createTodoWithText(text: string): Todo {
  return createCustomTodo(text, false)
}

export function createCustomTodo(text: string, completed: boolean): Todo {
  return {
    id: nextTodoId(),
    text,
    completed,
  }
}

/**
 * Check that a value has the shape of a Todo.
 */
export function isTodo(value: unknown): value is Todo {
  if (typeof value !== `object` || value === null) return false
  if (!(`id` in value) || !(`text` in value) || !(`completed` in value)) {
    return false
  }
  return (
    typeof value.id === `number` &&
    Number.isInteger(value.id) &&
    typeof value.text === `string` &&
    typeof value.completed === `boolean`
  )
}

/**
 * Narrow a decoded JSON value to a Todo.
 * @throws {InvalidResponseError} if the value is not a todo
 */
export function parseTodo(value: unknown, body = ``): Todo {
  if (!isTodo(value)) {
    throw new InvalidResponseError(`Expected a todo object`, body)
  }
  return { id: value.id, text: value.text, completed: value.completed }
}

/**
 * Narrow a decoded JSON value to a list of todos.
 * @throws {InvalidResponseError} if the value is not an array of todos
 */
export function parseTodoList(value: unknown, body = ``): Array<Todo> {
  if (!Array.isArray(value)) {
    throw new InvalidResponseError(`Expected an array of todos`, body)
  }
  return value.map((item: unknown) => parseTodo(item, body))
}
