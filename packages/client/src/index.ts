/**
 * @todo-probe/client
 *
 * HTTP client, data model and configuration for the Todo service under test.
 *
 * @packageDocumentation
 */

// ============================================================================
// Client
// ============================================================================

export { TodoApiClient, basicAuthHeader } from "./client"

export { ApiResponse } from "./response"
export type { ApiResponseInit } from "./response"

// ============================================================================
// Model
// ============================================================================

export {
  createCustomTodo,
  createDefaultTodo,
  createTodoWithText,
  isTodo,
  nextTodoId,
  parseTodo,
  parseTodoList,
  uniqueText,
} from "./todo"

export type { Todo, TodoDraft, TodoId } from "./todo"

// ============================================================================
// Configuration
// ============================================================================

export { CONFIG_ENV, DEFAULT_CONFIG, defineConfig, loadConfig } from "./config"
export type { EnvSource, SuiteConfig } from "./config"

// ============================================================================
// Types
// ============================================================================

export { silentLogger } from "./types"

export type {
  BasicCredentials,
  HttpMethod,
  ListTodosQuery,
  Logger,
  TodoApiClientOptions,
} from "./types"

// ============================================================================
// Errors
// ============================================================================

export {
  InvalidConfigError,
  InvalidResponseError,
  MissingBaseUrlError,
  TodoApiError,
} from "./error"

// ============================================================================
// Constants
// ============================================================================

export {
  APPLICATION_JSON,
  AUTHORIZATION_HEADER,
  CONTENT_TYPE_HEADER,
  LIMIT_QUERY_PARAM,
  NOTIFICATIONS_PATH,
  OFFSET_QUERY_PARAM,
  STATUS_BAD_REQUEST,
  STATUS_CREATED,
  STATUS_NOT_FOUND,
  STATUS_NO_CONTENT,
  STATUS_OK,
  STATUS_UNAUTHORIZED,
  TODOS_ENDPOINT,
  todoPath,
} from "./constants"
