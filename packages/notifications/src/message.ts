/**
 * Decoding of pushed notification payloads.
 */

import { isTodo } from "@todo-probe/client"
import type { Todo } from "@todo-probe/client"

/**
 * Message pushed once per successful todo creation.
 */
export interface NewTodoNotification extends Todo {
  type: `new_todo`
}

export function isNewTodoNotification(
  value: unknown
): value is NewTodoNotification {
  return (
    isTodo(value) &&
    `type` in value &&
    value.type === `new_todo`
  )
}

/**
 * Decode a raw message. Returns null for anything that is not a
 * `new_todo` notification, including malformed JSON.
 */
export function parseNotification(
  message: string
): NewTodoNotification | null {
  let value: unknown
  try {
    value = JSON.parse(message)
  } catch {
    return null
  }
  return isNewTodoNotification(value) ? value : null
}

/**
 * Decode every `new_todo` notification in a buffer, skipping the rest.
 */
export function newTodoNotifications(
  messages: ReadonlyArray<string>
): Array<NewTodoNotification> {
  const notifications: Array<NewTodoNotification> = []
  for (const message of messages) {
    const notification = parseNotification(message)
    if (notification) notifications.push(notification)
  }
  return notifications
}
