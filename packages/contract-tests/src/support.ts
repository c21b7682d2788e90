/**
 * Assertions shared by the contract suite.
 * Every check re-reads the service state instead of trusting a response code.
 */

import { expect } from "vitest"
import { newTodoNotifications } from "@todo-probe/notifications"
import type { ApiResponse, Todo, TodoApiClient, TodoId } from "@todo-probe/client"
import type { NewTodoNotification } from "@todo-probe/notifications"

/**
 * Id that no test ever creates.
 */
export const MISSING_TODO_ID = Number.MAX_SAFE_INTEGER

/**
 * Expect a todo with this text to be listed with the given completion.
 */
export async function verifyTodoExists(
  client: TodoApiClient,
  text: string,
  completed: boolean
): Promise<Todo> {
  const todos = await client.fetchTodos()
  const todo = todos.find((candidate) => candidate.text === text)

  if (!todo) {
    throw new Error(`Todo "${text}" is not listed`)
  }
  expect(todo.completed).toBe(completed)
  return todo
}

/**
 * Expect exactly this todo to be listed under its id.
 */
export async function verifyTodoExistsById(
  client: TodoApiClient,
  expected: Todo
): Promise<void> {
  const todos = await client.fetchTodos()
  const matching = todos.filter((todo) => todo.id === expected.id)

  expect(matching).toEqual([expected])
}

/**
 * Expect exactly one todo with this id and nothing else in the listing,
 * whatever status codes the writers saw.
 */
export async function verifySingleTodo(
  client: TodoApiClient,
  id: TodoId
): Promise<Todo> {
  const todos = await client.fetchTodos()
  const [todo, ...others] = todos.filter((candidate) => candidate.id === id)

  if (!todo) {
    throw new Error(`Todo ${id} is not listed`)
  }
  expect(others, `duplicates of todo ${id}`).toEqual([])
  expect(todos).toHaveLength(1)
  return todo
}

export async function verifyTodoMissing(
  client: TodoApiClient,
  id: TodoId
): Promise<void> {
  expect(await client.findTodo(id)).toBeUndefined()
}

/**
 * Expect every text to be listed.
 */
export async function verifyMultipleTodosExist(
  client: TodoApiClient,
  texts: ReadonlyArray<string>
): Promise<void> {
  const listed = new Set((await client.fetchTodos()).map((todo) => todo.text))
  for (const text of texts) {
    expect(listed.has(text), `todo "${text}" should be listed`).toBe(true)
  }
}

/**
 * Expect a rejected request: the status and no side effect on the listing.
 */
export async function verifyNegativeScenario(
  client: TodoApiClient,
  response: ApiResponse,
  expectedStatus: number,
  expectedTodos: ReadonlyArray<Todo>
): Promise<void> {
  expect(response.status, response.toString()).toBe(expectedStatus)
  expect(await client.fetchTodos()).toEqual(expectedTodos)
}

/**
 * The `new_todo` notifications for one todo found in a message buffer.
 */
export function notificationsFor(
  messages: ReadonlyArray<string>,
  id: TodoId
): Array<NewTodoNotification> {
  return newTodoNotifications(messages).filter(
    (notification) => notification.id === id
  )
}
