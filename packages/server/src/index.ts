/**
 * In-process Todo service for end-to-end testing of the probe.
 *
 * @packageDocumentation
 */

export { TodoTestServer } from "./server"
export { TodoStore, paginate } from "./store"
export { FileBackedTodoStore } from "./file-store"
export type { FileBackedTodoStoreOptions } from "./file-store"
export {
  TodoConflictError,
  TodoNotFoundError,
  TodoValidationError,
} from "./error"
export {
  isAuthorized,
  parsePaging,
  parsePathId,
  parseTodoBody,
} from "./validation"
export type {
  ListOptions,
  NewTodoMessage,
  TestServerOptions,
  TodoLifecycleEvent,
  TodoLifecycleHook,
  TodoRepository,
} from "./types"
