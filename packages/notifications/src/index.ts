/**
 * @todo-probe/notifications
 *
 * WebSocket client that buffers push notifications from the Todo service.
 *
 * @packageDocumentation
 */

export { NotificationClient } from "./client"
export type {
  ConnectionState,
  NotificationClientOptions,
  NotificationHandlers,
} from "./client"

export {
  isNewTodoNotification,
  newTodoNotifications,
  parseNotification,
} from "./message"
export type { NewTodoNotification } from "./message"

export { ConnectionError } from "./error"
